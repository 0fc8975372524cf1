export * from './errors';
export * from './logger';
export * from './ResourceIdentity';
export * from './types';
export * from './values';
