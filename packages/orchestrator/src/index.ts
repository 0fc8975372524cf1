export * from './components/ActionExecutor';
export * from './KeyedMutex';
export * from './ReconciliationController';
export * from './types';
