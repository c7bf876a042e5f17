import type { MetricsLag, RequestLog } from '../entities';

export interface ClaimOptions {
  readonly workerId: string;
  readonly limit: number;
  readonly leaseMs: number;
  readonly now: Date;
}

/**
 * Rows are eligible for metrics ingestion when `metricsProcessed` is false,
 * the status code is 2xx and the stored result reports `total_tokens`.
 */
export interface RequestLogRepository {
  save(log: RequestLog): Promise<void>;
  findById(id: string): Promise<RequestLog | null>;
  /** Claims up to `limit` eligible rows that no live claim holds, oldest backend response first. */
  claimUnprocessed(options: ClaimOptions): Promise<RequestLog[]>;
  markProcessed(ids: readonly string[], workerId: string): Promise<number>;
  releaseClaims(ids: readonly string[], workerId: string): Promise<void>;
  /** Flags historical eligible rows (`metricsProcessed` null) for ingestion. */
  markHistoricalUnprocessed(): Promise<number>;
  getLag(): Promise<MetricsLag>;
}
