export * from './apiProfiles';
export * from './ArmResourceClient';
export * from './LroOperationHandle';
export * from './policies';
export * from './ProviderClientGateway';
export * from './responses';
