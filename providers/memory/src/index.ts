export * from './InMemoryProviderClient';
export * from './MemoryClientFactory';
export * from './MemoryCloud';
export * from './MemoryOperation';
export * from './SimulationStore';
