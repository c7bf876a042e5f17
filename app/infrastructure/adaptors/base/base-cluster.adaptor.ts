import type { ILogger } from '../../../core/logging';
import { fail } from '../../../core/types';
import { isTimeoutReason } from '../../../core/utils';
import type { ClusterAdaptor, ClusterJobsResult } from '../../../domain/adaptors';
import type { Cluster } from '../../../domain/entities';
import type { AdaptorRuntime } from './base-endpoint.adaptor';
import { HttpStatusError } from './http';

export abstract class BaseClusterAdaptor implements ClusterAdaptor {
  readonly cluster: Cluster;
  protected readonly logger: ILogger;

  constructor(cluster: Cluster, runtime: AdaptorRuntime) {
    this.cluster = cluster;
    this.logger = runtime.logger.createChild(`${this.constructor.name}:${cluster.name}`);
  }

  hasJobStatus(): boolean {
    return true;
  }

  async getJobs(signal: AbortSignal): Promise<ClusterJobsResult> {
    if (!this.hasJobStatus()) {
      return fail({ message: `Cluster ${this.cluster.name} does not report job status`, code: 501, kind: 'unsupported' });
    }

    try {
      return await this.fetchJobs(signal);
    } catch (error) {
      if (signal.aborted && isTimeoutReason(signal.reason)) {
        return fail({ message: `Job status for ${this.cluster.name} timed out`, code: 504, kind: 'timeout' });
      }
      if (error instanceof HttpStatusError) {
        return fail({ message: error.message, code: error.status, kind: 'remote' });
      }
      const message = error instanceof Error ? error.message : String(error);
      return fail({ message: `Could not fetch jobs for ${this.cluster.name}: ${message}`, code: 502, kind: 'network' });
    }
  }

  protected abstract fetchJobs(signal: AbortSignal): Promise<ClusterJobsResult>;
}
