import { RequestLogCollectionName, RequestLogIndexes } from './request-log.schema';
import {
  RequestMetricsCollectionName,
  RequestMetricsIndexes,
  BatchMetricsCollectionName,
  BatchMetricsIndexes
} from './request-metrics.schema';
import { BatchJobCollectionName, BatchJobIndexes } from './batch-job.schema';
import { FederationIndexes } from './federation.schema';

export * from './request-log.schema';
export * from './request-metrics.schema';
export * from './batch-job.schema';
export * from './federation.schema';

export interface CollectionIndex {
  readonly key: Readonly<Record<string, 1 | -1>>;
  readonly name: string;
  readonly unique?: boolean;
}

export const COLLECTION_INDEXES: Readonly<Record<string, readonly CollectionIndex[]>> = {
  [RequestLogCollectionName]: RequestLogIndexes,
  [RequestMetricsCollectionName]: RequestMetricsIndexes,
  [BatchMetricsCollectionName]: BatchMetricsIndexes,
  [BatchJobCollectionName]: BatchJobIndexes,
  ...FederationIndexes
};
