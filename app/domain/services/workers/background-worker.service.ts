import { injectable, inject } from 'inversify';
import * as cron from 'node-cron';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { toError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { BatchJobManager } from '../batches';
import type { ClusterStatusCache } from '../cluster-status';
import type { MetricsIngestionService } from '../metrics-ingestion';

export type WorkerJobName = 'cluster-status' | 'batch-poll' | 'batch-cancel' | 'metrics-ingestion';

interface WorkerJob {
  readonly name: WorkerJobName;
  readonly schedule: string;
  readonly run: () => Promise<unknown>;
}

/**
 * Periodic jobs of the gateway. A tick is skipped while the previous run of
 * the same job is still in flight.
 */
@injectable()
export class BackgroundWorkerService {
  private readonly logger: ILogger;
  private readonly jobs: readonly WorkerJob[];
  private readonly running = new Set<WorkerJobName>();
  private readonly tasks: cron.ScheduledTask[] = [];

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.ClusterStatusCache) statusCache: ClusterStatusCache,
    @inject(TYPES.BatchJobManager) batchManager: BatchJobManager,
    @inject(TYPES.MetricsIngestionService) ingestion: MetricsIngestionService
  ) {
    this.logger = logger.createChild('BackgroundWorkerService');
    this.jobs = [
      {
        name: 'cluster-status',
        schedule: config.clusterStatus.refreshSchedule,
        run: () => statusCache.refresh()
      },
      {
        name: 'batch-poll',
        schedule: config.batches.pollSchedule,
        run: () => batchManager.pollAll()
      },
      {
        name: 'batch-cancel',
        schedule: config.batches.pollSchedule,
        run: () => batchManager.processCancellations()
      },
      {
        name: 'metrics-ingestion',
        schedule: config.metricsIngestion.schedule,
        run: () => ingestion.run()
      }
    ];
  }

  start(): void {
    if (this.tasks.length > 0) {
      return;
    }

    for (const job of this.jobs) {
      const task = cron.schedule(
        job.schedule,
        async () => {
          await this.runJob(job.name);
        },
        { scheduled: false, timezone: 'UTC' }
      );
      task.start();
      this.tasks.push(task);
    }

    this.logger.info('Background jobs started', {
      metadata: Object.fromEntries(this.jobs.map(job => [job.name, job.schedule]))
    });
  }

  stop(): void {
    if (this.tasks.length === 0) {
      return;
    }

    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks.length = 0;

    this.logger.info('Background jobs stopped');
  }

  isRunning(name: WorkerJobName): boolean {
    return this.running.has(name);
  }

  /** Returns false when the job was skipped because a previous run is still active. */
  async runJob(name: WorkerJobName): Promise<boolean> {
    const job = this.jobs.find(candidate => candidate.name === name);
    if (!job) {
      return false;
    }

    if (this.running.has(name)) {
      this.logger.debug('Skipping tick, previous run still active', { operation: name });
      return false;
    }

    this.running.add(name);
    const started = Date.now();
    try {
      await job.run();
      this.logger.debug('Job finished', { operation: name, duration: Date.now() - started });
    } catch (error) {
      this.logger.error('Background job failed', toError(error), { operation: name, duration: Date.now() - started });
    } finally {
      this.running.delete(name);
    }
    return true;
  }
}
