export * from './apply';
export * from './DiffEngine';
export * from './normalize';
export * from './tags';
export * from './types';
