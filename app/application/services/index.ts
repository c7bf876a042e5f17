export * from './inference.service';
export * from './batch.service';
export * from './models.service';
