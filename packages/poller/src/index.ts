export * from './backoff';
export * from './OperationPoller';
