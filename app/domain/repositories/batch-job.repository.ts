import type { BatchJob, BatchStatus } from '../entities';

/** Position after the last batch of a page, in creation order. */
export interface BatchPageCursor {
  readonly createdAt: Date;
  readonly id: string;
}

export interface BatchJobRepository {
  create(batch: BatchJob): Promise<void>;
  findById(id: string): Promise<BatchJob | null>;
  findByUser(username: string, status?: BatchStatus): Promise<BatchJob[]>;
  /** One page of batches in the given statuses, oldest first, starting after `after`. */
  findByStatus(
    statuses: readonly BatchStatus[],
    limit: number,
    after?: BatchPageCursor
  ): Promise<BatchJob[]>;
  hasActiveBatchForInput(username: string, inputFile: string): Promise<boolean>;
  /**
   * Persists the batch only if the stored status still equals `expectedStatus`.
   * Returns false when another writer got there first.
   */
  saveIfStatus(batch: BatchJob, expectedStatus: BatchStatus): Promise<boolean>;
  findCompletedWithoutMetrics(limit: number): Promise<BatchJob[]>;
  markMetricsProcessed(id: string): Promise<void>;
}

export interface BatchQuotaRepository {
  /** Atomically increments the user's active count if it is below `max`. */
  tryAcquire(username: string, max: number): Promise<boolean>;
  release(username: string): Promise<void>;
  activeCount(username: string): Promise<number>;
}
