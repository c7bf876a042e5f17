export * from './inference.controller';
export * from './models.controller';
export * from './clusters.controller';
export * from './batches.controller';
