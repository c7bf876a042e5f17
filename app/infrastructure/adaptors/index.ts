export * from './base';
export * from './fabric';
export * from './direct-api';
export * from './registry';
