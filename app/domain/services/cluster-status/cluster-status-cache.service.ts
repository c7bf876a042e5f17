import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import { errorMessage } from '../../../core/errors';
import { fail } from '../../../core/types';
import { TimeoutError, createLinkedController, raceAbort } from '../../../core/utils';
import type { AdaptorFailure, ClusterAdaptor, ClusterJobsResult } from '../../adaptors';
import { modelAvailability, type ClusterJobs, type ModelAvailability } from '../../entities';
import type { EndpointCatalogService } from '../catalog';

export interface ClusterStatusEntry {
  readonly cluster: string;
  readonly jobs: ClusterJobs;
  readonly fetchedAt: Date;
}

export interface RefreshSummary {
  readonly refreshed: readonly string[];
  readonly failed: readonly string[];
}

/**
 * Snapshot of which models each cluster is running. Only background refresh
 * talks to the clusters; the request path reads the snapshot. A refresh that
 * fails for one cluster keeps that cluster's previous entry, which then ages
 * into the unknown state once it passes `staleAfterMs`.
 */
@injectable()
export class ClusterStatusCache {
  private readonly logger: ILogger;
  private readonly catalog: EndpointCatalogService;
  private readonly metrics: IMetricsService;
  private readonly staleAfterMs: number;
  private readonly fetchTimeoutMs: number;
  private entries: ReadonlyMap<string, ClusterStatusEntry> = new Map();

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.EndpointCatalogService) catalog: EndpointCatalogService,
    @inject(TYPES.MetricsService) metrics: IMetricsService
  ) {
    this.logger = logger.createChild('ClusterStatusCache');
    this.catalog = catalog;
    this.metrics = metrics;
    this.staleAfterMs = config.clusterStatus.staleAfterMs;
    this.fetchTimeoutMs = config.clusterStatus.fetchTimeoutMs;
  }

  async refresh(signal?: AbortSignal): Promise<RefreshSummary> {
    const adaptors = this.catalog.listClusterAdaptors().filter(adaptor => adaptor.hasJobStatus());
    const results = await Promise.all(
      adaptors.map(async adaptor => ({ adaptor, result: await this.fetchWithTimeout(adaptor, signal) }))
    );

    const next = new Map(this.entries);
    const refreshed: string[] = [];
    const failed: string[] = [];
    const fetchedAt = new Date();

    for (const { adaptor, result } of results) {
      const cluster = adaptor.cluster.name;
      if (result.ok) {
        next.set(cluster, Object.freeze({ cluster, jobs: result.value, fetchedAt }));
        refreshed.push(cluster);
      } else {
        failed.push(cluster);
        this.logger.warn('Cluster status refresh failed', {
          operation: 'refresh',
          metadata: { cluster, ...result.error }
        });
      }
    }

    this.entries = next;

    for (const cluster of next.keys()) {
      this.metrics.updateClusterStatus(cluster, this.isFresh(cluster));
    }

    this.logger.debug('Cluster status refreshed', { metadata: { refreshed, failed } });
    return { refreshed, failed };
  }

  getEntry(cluster: string): ClusterStatusEntry | undefined {
    return this.entries.get(cluster);
  }

  isFresh(cluster: string, now: Date = new Date()): boolean {
    const entry = this.entries.get(cluster);
    return entry !== undefined && now.getTime() - entry.fetchedAt.getTime() <= this.staleAfterMs;
  }

  /** Missing and stale entries both report `unknown`. */
  availability(cluster: string, framework: string, model: string, now: Date = new Date()): ModelAvailability {
    const entry = this.entries.get(cluster);
    if (!entry || !this.isFresh(cluster, now)) {
      return 'unknown';
    }
    return modelAvailability(entry.jobs, framework, model);
  }

  private async fetchWithTimeout(adaptor: ClusterAdaptor, parent?: AbortSignal): Promise<ClusterJobsResult> {
    const { controller, dispose } = createLinkedController(parent);
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(`Job status for ${adaptor.cluster.name} exceeded ${this.fetchTimeoutMs}ms`)),
      this.fetchTimeoutMs
    );

    try {
      return await raceAbort(adaptor.getJobs(controller.signal), controller.signal);
    } catch (error) {
      const failure: AdaptorFailure = controller.signal.aborted
        ? { message: errorMessage(error), code: 504, kind: 'timeout' }
        : { message: errorMessage(error), code: 500, kind: 'internal' };
      return fail(failure);
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }
}
