export * from './endpoint.entity';
export * from './cluster.entity';
export * from './federated-endpoint.entity';
export * from './identity';
export * from './request-log.entity';
export * from './request-metrics.entity';
export * from './batch-job.entity';
