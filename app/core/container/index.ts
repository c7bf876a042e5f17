export * from './types';
export * from './container';
