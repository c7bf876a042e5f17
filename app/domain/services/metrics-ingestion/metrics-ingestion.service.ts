import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { toError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ICryptoService } from '../../../core/security';
import { sleep } from '../../../core/utils';
import type { MetricsLag, RequestLog, RequestMetrics } from '../../entities';
import type {
  BatchJobRepository,
  BatchMetricsRepository,
  RequestLogRepository,
  RequestMetricsRepository
} from '../../repositories';
import { computeBatchMetrics } from './batch-metrics';
import { parseUsage } from './usage-parser';

export interface IngestionBatchResult {
  readonly claimed: number;
  readonly processed: number;
  readonly failed: boolean;
}

export interface BackfillSummary {
  readonly marked: number;
  readonly batches: number;
  readonly processed: number;
  readonly completed: boolean;
}

export interface IngestionRunSummary {
  readonly requests: IngestionBatchResult;
  readonly batches: number;
  readonly lag: MetricsLag;
}

export function toRequestMetrics(log: RequestLog): RequestMetrics {
  const snapshot = log.toSnapshot();
  const usage = parseUsage(snapshot.result ?? '');
  const requestedAt = snapshot.timestampBackendRequest;
  const respondedAt = snapshot.timestampBackendResponse;

  return {
    requestId: snapshot.id,
    username: snapshot.username,
    cluster: snapshot.cluster,
    framework: snapshot.framework,
    model: snapshot.model,
    statusCode: snapshot.statusCode ?? 0,
    ...usage,
    responseTimeSec: requestedAt && respondedAt ? (respondedAt.getTime() - requestedAt.getTime()) / 1000 : null,
    timestampCompute: respondedAt ?? snapshot.timestampReceive
  };
}

/**
 * Turns finished request logs into per-request metrics rows. Rows are
 * claimed with a lease before processing and only flagged as processed
 * after their metrics are written; a failed batch gives its claims back.
 */
@injectable()
export class MetricsIngestionService {
  readonly workerId: string;
  private readonly logger: ILogger;
  private readonly settings: GatewayConfig['metricsIngestion'];
  private readonly requestLogs: RequestLogRepository;
  private readonly requestMetrics: RequestMetricsRepository;
  private readonly batchMetrics: BatchMetricsRepository;
  private readonly batches: BatchJobRepository;
  private readonly metrics: IMetricsService;

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.RequestLogRepository) requestLogs: RequestLogRepository,
    @inject(TYPES.RequestMetricsRepository) requestMetrics: RequestMetricsRepository,
    @inject(TYPES.BatchMetricsRepository) batchMetrics: BatchMetricsRepository,
    @inject(TYPES.BatchJobRepository) batches: BatchJobRepository,
    @inject(TYPES.CryptoService) cryptoService: ICryptoService,
    @inject(TYPES.MetricsService) metrics: IMetricsService
  ) {
    this.logger = logger.createChild('MetricsIngestionService');
    this.settings = config.metricsIngestion;
    this.requestLogs = requestLogs;
    this.requestMetrics = requestMetrics;
    this.batchMetrics = batchMetrics;
    this.batches = batches;
    this.metrics = metrics;
    this.workerId = `ingest-${cryptoService.generateId()}`;
  }

  async run(now: Date = new Date()): Promise<IngestionRunSummary> {
    const requests = await this.processBatch(now);
    const batches = await this.processBatchMetrics();
    const lag = await this.getLag(now);
    return { requests, batches, lag };
  }

  async processBatch(now: Date = new Date()): Promise<IngestionBatchResult> {
    const started = Date.now();
    const claimed = await this.requestLogs.claimUnprocessed({
      workerId: this.workerId,
      limit: this.settings.batchSize,
      leaseMs: this.settings.claimLeaseMs,
      now
    });

    if (claimed.length === 0) {
      return { claimed: 0, processed: 0, failed: false };
    }

    const ids = claimed.map(log => log.getId());

    try {
      await this.requestMetrics.upsertMany(claimed.map(toRequestMetrics));
      const processed = await this.requestLogs.markProcessed(ids, this.workerId);

      this.metrics.recordIngestionBatch('requests', processed, Date.now() - started);
      this.logger.debug('Ingested request metrics', {
        duration: Date.now() - started,
        metadata: { workerId: this.workerId, claimed: ids.length, processed }
      });

      return { claimed: ids.length, processed, failed: false };
    } catch (error) {
      this.logger.error('Metrics ingestion batch failed, releasing claims', toError(error), {
        metadata: { workerId: this.workerId, claimed: ids.length }
      });
      await this.releaseClaims(ids);
      return { claimed: ids.length, processed: 0, failed: true };
    }
  }

  async processBatchMetrics(limit: number = this.settings.batchSize): Promise<number> {
    const started = Date.now();
    const completed = await this.batches.findCompletedWithoutMetrics(limit);
    let processed = 0;

    for (const batch of completed) {
      try {
        await this.batchMetrics.upsert(computeBatchMetrics(batch));
        await this.batches.markMetricsProcessed(batch.getId());
        processed += 1;
      } catch (error) {
        this.logger.error('Failed to ingest batch metrics', toError(error), {
          metadata: { batchId: batch.getId() }
        });
      }
    }

    if (completed.length > 0) {
      this.metrics.recordIngestionBatch('batches', processed, Date.now() - started);
    }
    return processed;
  }

  /**
   * Flags historical rows for ingestion and drains them in bounded batches,
   * pausing between batches. Stops early when a batch fails or the signal
   * aborts.
   */
  async backfill(signal?: AbortSignal): Promise<BackfillSummary> {
    const marked = await this.requestLogs.markHistoricalUnprocessed();
    this.logger.info('Backfill started', { metadata: { marked, workerId: this.workerId } });

    let batches = 0;
    let processed = 0;

    while (!signal?.aborted) {
      const result = await this.processBatch();
      if (result.claimed === 0) {
        this.logger.info('Backfill finished', { metadata: { batches, processed } });
        return { marked, batches, processed, completed: true };
      }

      batches += 1;
      processed += result.processed;

      if (result.failed) {
        break;
      }

      try {
        await sleep(this.settings.backfillDelayMs, signal);
      } catch {
        break;
      }
    }

    this.logger.warn('Backfill stopped before draining', { metadata: { batches, processed } });
    return { marked, batches, processed, completed: false };
  }

  async getLag(now: Date = new Date()): Promise<MetricsLag> {
    const lag = await this.requestLogs.getLag();
    const oldestAgeSeconds = lag.oldestUnprocessed ? Math.max(0, (now.getTime() - lag.oldestUnprocessed.getTime()) / 1000) : 0;
    this.metrics.updateIngestionLag(lag.unprocessedCount, oldestAgeSeconds);
    return lag;
  }

  private async releaseClaims(ids: readonly string[]): Promise<void> {
    try {
      await this.requestLogs.releaseClaims(ids, this.workerId);
    } catch (error) {
      this.logger.error('Failed to release metrics claims', toError(error), {
        metadata: { workerId: this.workerId, claimed: ids.length }
      });
    }
  }
}
