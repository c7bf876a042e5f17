export * from './request-log.repository';
export * from './request-metrics.repository';
export * from './batch-job.repository';
export * from './federation-config.source';
export * from './identity-provider';
export * from './batch-file.store';
