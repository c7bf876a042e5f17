export * from './usage-parser';
export * from './batch-metrics';
export * from './metrics-ingestion.service';
