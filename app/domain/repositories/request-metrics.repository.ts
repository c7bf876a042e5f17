import type { BatchMetrics, RequestMetrics } from '../entities';

export interface RequestMetricsRepository {
  upsertMany(metrics: readonly RequestMetrics[]): Promise<void>;
  findByRequestId(requestId: string): Promise<RequestMetrics | null>;
}

export interface BatchMetricsRepository {
  upsert(metrics: BatchMetrics): Promise<void>;
  findByBatchId(batchId: string): Promise<BatchMetrics | null>;
}
