import { Type, type Static } from '@sinclair/typebox';
import { ok } from '../../../core/types';
import type { ClusterJobsResult } from '../../../domain/adaptors';
import type { Cluster } from '../../../domain/entities';
import { BaseClusterAdaptor, parseAdaptorSettings } from '../base';
import { formatStatusAsJobs, type IDirectApiStatusClient } from './direct-api-status.client';
import type { DirectApiRuntime } from './direct-api-endpoint.adaptor';

export const DirectApiClusterSettingsSchema = Type.Object({
  statusUrl: Type.Optional(Type.String({ minLength: 1 }))
});

export type DirectApiClusterSettings = Static<typeof DirectApiClusterSettingsSchema>;

export class DirectApiClusterAdaptor extends BaseClusterAdaptor {
  private readonly settings: DirectApiClusterSettings;
  private readonly statusClient: IDirectApiStatusClient;

  constructor(cluster: Cluster, runtime: DirectApiRuntime) {
    super(cluster, runtime);
    this.settings = parseAdaptorSettings(DirectApiClusterSettingsSchema, cluster.name, cluster.settings);
    this.statusClient = runtime.directApiStatus;
  }

  override hasJobStatus(): boolean {
    return this.settings.statusUrl !== undefined;
  }

  protected async fetchJobs(signal: AbortSignal): Promise<ClusterJobsResult> {
    const status = await this.statusClient.fetchStatus(this.settings.statusUrl ?? '', signal);
    const framework = this.cluster.frameworks[0] ?? 'api';
    return ok(formatStatusAsJobs(status, this.cluster.name, framework));
  }
}
