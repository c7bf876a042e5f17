import type { AccessRestrictions, AdaptorSettings, OpenAIEndpoint } from './endpoint.entity';

export interface Cluster extends AccessRestrictions, AdaptorSettings {
  readonly name: string;
  readonly adaptorType: string;
  readonly frameworks: readonly string[];
  readonly openaiEndpoints: readonly OpenAIEndpoint[];
}

export interface ClusterJob {
  readonly Models: string;
  readonly Framework: string;
  readonly Cluster: string;
  readonly [extra: string]: unknown;
}

export interface ClusterJobs {
  readonly running: readonly ClusterJob[];
  readonly queued: readonly ClusterJob[];
  readonly stopped: readonly ClusterJob[];
  readonly others: readonly ClusterJob[];
  readonly private_batch_running: readonly ClusterJob[];
  readonly private_batch_queued: readonly ClusterJob[];
  readonly cluster_status: Readonly<Record<string, unknown>>;
}

export type ModelAvailability = 'running' | 'queued' | 'stopped' | 'unknown';

export function emptyClusterJobs(): ClusterJobs {
  return {
    running: [],
    queued: [],
    stopped: [],
    others: [],
    private_batch_running: [],
    private_batch_queued: [],
    cluster_status: {}
  };
}

function jobServes(job: ClusterJob, framework: string, model: string): boolean {
  if (job.Framework.toLowerCase() !== framework.toLowerCase()) {
    return false;
  }
  return job.Models.split(',').some(entry => entry.trim() === model);
}

/**
 * Running wins over queued, queued over stopped. A model absent from every
 * list has unknown availability.
 */
export function modelAvailability(jobs: ClusterJobs, framework: string, model: string): ModelAvailability {
  if (jobs.running.some(job => jobServes(job, framework, model))) {
    return 'running';
  }
  if (jobs.queued.some(job => jobServes(job, framework, model))) {
    return 'queued';
  }
  if (jobs.stopped.some(job => jobServes(job, framework, model))) {
    return 'stopped';
  }
  return 'unknown';
}
