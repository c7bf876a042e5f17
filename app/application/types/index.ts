export * from './inference.types';
export * from './batches.types';
export * from './models.types';
