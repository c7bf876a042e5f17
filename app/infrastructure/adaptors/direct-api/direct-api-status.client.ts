import { injectable, inject } from 'inversify';
import { Type, type Static } from '@sinclair/typebox';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { errorMessage } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import { raceAbort } from '../../../core/utils';
import type { ClusterJob, ClusterJobs } from '../../../domain/entities';
import { fetchJson } from '../base/http';

const ModelStatusSchema = Type.Object({
  status: Type.String(),
  experts: Type.Array(Type.String()),
  url: Type.Optional(Type.String()),
  endpoint_id: Type.Optional(Type.String()),
  model: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  model_version: Type.Optional(Type.String())
});

export const DirectApiStatusSchema = Type.Record(Type.String(), ModelStatusSchema);

export type DirectApiModelStatus = Static<typeof ModelStatusSchema>;
export type DirectApiStatus = Static<typeof DirectApiStatusSchema>;

export const LIVE_STATUS = 'Live';

export interface IDirectApiStatusClient {
  fetchStatus(statusUrl: string, signal?: AbortSignal): Promise<DirectApiStatus>;
}

interface CacheEntry {
  readonly expiresAt: number;
  readonly value: Promise<DirectApiStatus>;
}

/**
 * Shared by every direct-API endpoint so one status document serves them all.
 * The fetch belongs to the cache; a caller's signal only ends its own wait.
 */
@injectable()
export class DirectApiStatusClient implements IDirectApiStatusClient {
  private readonly logger: ILogger;
  private readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.createChild('DirectApiStatusClient');
    this.ttlMs = config.fabric.statusCacheTtlMs;
    this.timeoutMs = config.fabric.statusTimeoutMs;
  }

  async fetchStatus(statusUrl: string, signal?: AbortSignal): Promise<DirectApiStatus> {
    const now = Date.now();
    const cached = this.cache.get(statusUrl);
    if (cached && cached.expiresAt > now) {
      return signal ? raceAbort(cached.value, signal) : cached.value;
    }

    const value = fetchJson(statusUrl, DirectApiStatusSchema, { signal: AbortSignal.timeout(this.timeoutMs) });
    const entry: CacheEntry = { expiresAt: now + this.ttlMs, value };
    this.cache.set(statusUrl, entry);

    void value.then(
      status => {
        this.logger.debug('Fetched direct API status', {
          metadata: { statusUrl, models: Object.keys(status).length }
        });
      },
      error => {
        if (this.cache.get(statusUrl) === entry) {
          this.cache.delete(statusUrl);
        }
        this.logger.debug('Direct API status lookup failed', {
          metadata: { statusUrl, error: errorMessage(error) }
        });
      }
    );

    return signal ? raceAbort(value, signal) : value;
  }
}

/**
 * A model may be listed under several entries; the first entry that lists
 * it among its experts decides.
 */
export function findModel(status: DirectApiStatus, model: string): DirectApiModelStatus | undefined {
  return Object.values(status).find(entry => entry.experts.includes(model));
}

export function formatStatusAsJobs(status: DirectApiStatus, cluster: string, framework: string): ClusterJobs {
  const running: ClusterJob[] = [];
  const queued: ClusterJob[] = [];
  const stopped: ClusterJob[] = [];
  let liveModels = 0;
  let stoppedModels = 0;

  for (const info of Object.values(status)) {
    const description =
      info.model && info.description ? `${info.model} - ${info.description}` : info.model || info.description || '';

    const job: ClusterJob = {
      Models: info.experts.join(','),
      Framework: framework,
      Cluster: cluster,
      'Model Status': info.status === LIVE_STATUS ? 'running' : info.status.toLowerCase(),
      Description: description,
      'Model Version': info.model_version ?? ''
    };

    if (info.status === LIVE_STATUS) {
      running.push(job);
      liveModels += 1;
    } else if (info.status === 'Stopped') {
      stopped.push(job);
      stoppedModels += 1;
    } else {
      queued.push(job);
    }
  }

  return {
    running,
    queued,
    stopped,
    others: [],
    private_batch_running: [],
    private_batch_queued: [],
    cluster_status: {
      cluster,
      total_models: Object.keys(status).length,
      live_models: liveModels,
      stopped_models: stoppedModels
    }
  };
}
