export * from './auth';
export * from './batches';
export * from './catalog';
export * from './cluster-status';
export * from './metrics-ingestion';
export * from './request-log';
export * from './routing';
export * from './streaming';
export * from './workers';
