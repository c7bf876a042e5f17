export * from './request-log.repository';
export * from './request-metrics.repository';
export * from './batch-job.repository';
export * from './federation-config.source';
