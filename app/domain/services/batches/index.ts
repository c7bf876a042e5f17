export * from './batch-status';
export * from './batch-job-manager.service';
