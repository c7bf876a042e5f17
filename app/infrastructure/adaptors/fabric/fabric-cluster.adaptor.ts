import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { fail, ok } from '../../../core/types';
import type { ClusterJobsResult } from '../../../domain/adaptors';
import type { Cluster, ClusterJob, ClusterJobs } from '../../../domain/entities';
import type { IFabricClient } from '../../fabric';
import { BaseClusterAdaptor, parseAdaptorSettings, type AdaptorRuntime } from '../base';

export const FabricClusterSettingsSchema = Type.Object({
  statusEndpointId: Type.Optional(Type.String({ minLength: 1 })),
  statusFunctionId: Type.Optional(Type.String({ minLength: 1 }))
});

export type FabricClusterSettings = Static<typeof FabricClusterSettingsSchema>;

const ClusterJobSchema = Type.Object({
  Models: Type.String(),
  Framework: Type.String(),
  Cluster: Type.String()
});

const JOB_LISTS = ['running', 'queued', 'stopped', 'others', 'private_batch_running', 'private_batch_queued'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJobs(value: unknown): ClusterJob[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is ClusterJob => Value.Check(ClusterJobSchema, entry));
}

/**
 * The scheduler status function reports list names with hyphens
 * (`private-batch-running`); they are normalized to underscores here.
 */
export function normalizeClusterJobs(raw: unknown): ClusterJobs | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const normalized = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    normalized.set(key.replace(/-/g, '_'), value);
  }

  const [running, queued, stopped, others, privateBatchRunning, privateBatchQueued] = JOB_LISTS.map(name =>
    readJobs(normalized.get(name))
  );
  const clusterStatus = normalized.get('cluster_status');

  return {
    running,
    queued,
    stopped,
    others,
    private_batch_running: privateBatchRunning,
    private_batch_queued: privateBatchQueued,
    cluster_status: isRecord(clusterStatus) ? clusterStatus : {}
  };
}

export interface FabricClusterRuntime extends AdaptorRuntime {
  readonly fabric: IFabricClient;
}

export class FabricClusterAdaptor extends BaseClusterAdaptor {
  private readonly settings: FabricClusterSettings;
  private readonly fabric: IFabricClient;

  constructor(cluster: Cluster, runtime: FabricClusterRuntime) {
    super(cluster, runtime);
    this.settings = parseAdaptorSettings(FabricClusterSettingsSchema, cluster.name, cluster.settings);
    this.fabric = runtime.fabric;
  }

  override hasJobStatus(): boolean {
    return this.settings.statusEndpointId !== undefined && this.settings.statusFunctionId !== undefined;
  }

  protected async fetchJobs(signal: AbortSignal): Promise<ClusterJobsResult> {
    const { statusEndpointId, statusFunctionId } = this.settings;
    if (statusEndpointId === undefined || statusFunctionId === undefined) {
      return fail({ message: `Cluster ${this.cluster.name} has no status function`, code: 501, kind: 'unsupported' });
    }

    const [taskId] = await this.fabric.submitTasks(statusEndpointId, statusFunctionId, [{}], signal);
    const state = await this.fabric.waitForResult(taskId, signal);

    if (state.status === 'failed' || state.result === undefined) {
      return fail({
        message: state.error ?? `Status task ${taskId} returned no result`,
        code: 502,
        kind: 'remote'
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(state.result);
    } catch {
      return fail({ message: `Status task ${taskId} returned invalid JSON`, code: 502, kind: 'remote' });
    }

    const jobs = normalizeClusterJobs(parsed);
    if (!jobs) {
      return fail({ message: `Status task ${taskId} returned an unexpected payload`, code: 502, kind: 'remote' });
    }

    this.logger.debug('Fetched cluster jobs', {
      metadata: { running: jobs.running.length, queued: jobs.queued.length, stopped: jobs.stopped.length }
    });

    return ok(jobs);
  }
}
