import { injectable, inject } from 'inversify';
import type { TSchema, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { TYPES } from '../../../core/container/types';
import { ConfigError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { AdaptorRegistry } from '../../../infrastructure/adaptors/registry';
import type { ClusterAdaptor, EndpointAdaptor } from '../../adaptors';
import {
  buildEndpointSlug,
  slugify,
  type Cluster,
  type Endpoint,
  type FederatedEndpoint,
  type FederatedTarget
} from '../../entities';
import type { FederationConfigSource, RawFederationConfig } from '../../repositories';
import {
  ClusterConfigSchema,
  EndpointConfigSchema,
  FederatedEndpointConfigSchema
} from './federation-config.schema';

export interface CatalogSnapshot {
  readonly clusters: ReadonlyMap<string, Cluster>;
  readonly endpoints: ReadonlyMap<string, Endpoint>;
  readonly federatedEndpoints: ReadonlyMap<string, FederatedEndpoint>;
  readonly endpointAdaptors: ReadonlyMap<string, EndpointAdaptor>;
  readonly clusterAdaptors: ReadonlyMap<string, ClusterAdaptor>;
  readonly loadedAt: Date;
}

function validateEntry<T extends TSchema>(schema: T, entry: unknown, kind: string, index: number): Static<T> {
  if (Value.Check(schema, entry)) {
    return entry;
  }
  const problems = [...Value.Errors(schema, entry)]
    .slice(0, 5)
    .map(error => `${error.path || '/'} ${error.message}`)
    .join('; ');
  throw new ConfigError(`Invalid ${kind} at index ${index}: ${problems}`);
}

/**
 * Owns the operator configuration and the adaptors built from it. A load
 * builds a complete new snapshot and swaps it in only when every entry is
 * valid, so readers never observe a half-applied configuration.
 */
@injectable()
export class EndpointCatalogService {
  private readonly logger: ILogger;
  private readonly registry: AdaptorRegistry;
  private readonly source: FederationConfigSource;
  private current?: CatalogSnapshot;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.AdaptorRegistry) registry: AdaptorRegistry,
    @inject(TYPES.FederationConfigSource) source: FederationConfigSource
  ) {
    this.logger = logger.createChild('EndpointCatalogService');
    this.registry = registry;
    this.source = source;
  }

  async load(): Promise<CatalogSnapshot> {
    const raw = await this.source.load();
    const snapshot = this.loadFrom(raw);

    this.logger.info('Federation configuration loaded', {
      metadata: {
        source: this.source.description,
        clusters: snapshot.clusters.size,
        endpoints: snapshot.endpoints.size,
        federatedEndpoints: snapshot.federatedEndpoints.size
      }
    });

    return snapshot;
  }

  loadFrom(raw: RawFederationConfig): CatalogSnapshot {
    const clusters = this.buildClusters(raw.clusters);
    const endpoints = this.buildEndpoints(raw.endpoints, clusters);
    const federatedEndpoints = this.buildFederatedEndpoints(raw.federatedEndpoints, clusters, endpoints);

    const clusterAdaptors = new Map<string, ClusterAdaptor>();
    for (const cluster of clusters.values()) {
      clusterAdaptors.set(cluster.name, this.registry.createClusterAdaptor(cluster));
    }

    const endpointAdaptors = new Map<string, EndpointAdaptor>();
    for (const endpoint of endpoints.values()) {
      endpointAdaptors.set(endpoint.slug, this.registry.createEndpointAdaptor(endpoint));
    }

    const snapshot: CatalogSnapshot = Object.freeze({
      clusters,
      endpoints,
      federatedEndpoints,
      endpointAdaptors,
      clusterAdaptors,
      loadedAt: new Date()
    });

    this.current = snapshot;
    return snapshot;
  }

  snapshot(): CatalogSnapshot {
    if (!this.current) {
      throw new ConfigError('Federation configuration has not been loaded');
    }
    return this.current;
  }

  getEndpoint(slug: string): Endpoint | undefined {
    return this.snapshot().endpoints.get(slug);
  }

  getEndpointAdaptor(slug: string): EndpointAdaptor | undefined {
    return this.snapshot().endpointAdaptors.get(slug);
  }

  getCluster(name: string): Cluster | undefined {
    return this.snapshot().clusters.get(name);
  }

  getClusterAdaptor(name: string): ClusterAdaptor | undefined {
    return this.snapshot().clusterAdaptors.get(name);
  }

  listClusterAdaptors(): ClusterAdaptor[] {
    return [...this.snapshot().clusterAdaptors.values()];
  }

  listEndpoints(): Endpoint[] {
    return [...this.snapshot().endpoints.values()];
  }

  listFederatedEndpoints(): FederatedEndpoint[] {
    return [...this.snapshot().federatedEndpoints.values()];
  }

  /** Matches either the federated slug or its target model name. */
  findFederatedEndpoint(model: string): FederatedEndpoint | undefined {
    const { federatedEndpoints } = this.snapshot();
    const bySlug = federatedEndpoints.get(model);
    if (bySlug) {
      return bySlug;
    }
    return [...federatedEndpoints.values()].find(federated => federated.targetModelName === model);
  }

  findEndpointsByModel(model: string): Endpoint[] {
    return this.listEndpoints().filter(endpoint => endpoint.model === model);
  }

  private buildClusters(entries: readonly unknown[]): Map<string, Cluster> {
    const clusters = new Map<string, Cluster>();

    entries.forEach((entry, index) => {
      const config = validateEntry(ClusterConfigSchema, entry, 'cluster', index);

      if (clusters.has(config.name)) {
        throw new ConfigError(`Duplicate cluster name: ${config.name}`);
      }
      if (!this.registry.hasClusterType(config.adaptorType)) {
        throw new ConfigError(`Unknown adaptor type '${config.adaptorType}' for cluster ${config.name}`);
      }

      clusters.set(config.name, {
        name: config.name,
        adaptorType: config.adaptorType,
        frameworks: config.frameworks,
        openaiEndpoints: config.openaiEndpoints,
        settings: config.settings ?? {},
        extensions: config.extensions ?? {},
        allowedGroups: config.allowedGroups ?? [],
        allowedDomains: config.allowedDomains ?? []
      });
    });

    return clusters;
  }

  private buildEndpoints(entries: readonly unknown[], clusters: ReadonlyMap<string, Cluster>): Map<string, Endpoint> {
    const endpoints = new Map<string, Endpoint>();

    entries.forEach((entry, index) => {
      const config = validateEntry(EndpointConfigSchema, entry, 'endpoint', index);
      const slug = buildEndpointSlug(config.cluster, config.framework, config.model);

      if (config.slug !== undefined && config.slug !== slug) {
        throw new ConfigError(`Endpoint slug '${config.slug}' does not match its cluster, framework and model (expected '${slug}')`);
      }
      if (endpoints.has(slug)) {
        throw new ConfigError(`Duplicate endpoint slug: ${slug}`);
      }

      const cluster = clusters.get(config.cluster);
      if (!cluster) {
        throw new ConfigError(`Endpoint ${slug} references unknown cluster '${config.cluster}'`);
      }
      if (!cluster.frameworks.some(framework => framework.toLowerCase() === config.framework.toLowerCase())) {
        throw new ConfigError(`Endpoint ${slug} uses framework '${config.framework}' which cluster ${cluster.name} does not support`);
      }
      if (!this.registry.hasEndpointType(config.adaptorType)) {
        throw new ConfigError(`Unknown adaptor type '${config.adaptorType}' for endpoint ${slug}`);
      }

      endpoints.set(slug, {
        slug,
        cluster: config.cluster,
        framework: config.framework,
        model: config.model,
        adaptorType: config.adaptorType,
        timeoutMs: config.timeoutMs,
        settings: config.settings ?? {},
        extensions: config.extensions ?? {},
        allowedGroups: config.allowedGroups ?? [],
        allowedDomains: config.allowedDomains ?? []
      });
    });

    return endpoints;
  }

  private buildFederatedEndpoints(
    entries: readonly unknown[],
    clusters: ReadonlyMap<string, Cluster>,
    endpoints: ReadonlyMap<string, Endpoint>
  ): Map<string, FederatedEndpoint> {
    const federatedEndpoints = new Map<string, FederatedEndpoint>();

    entries.forEach((entry, index) => {
      const config = validateEntry(FederatedEndpointConfigSchema, entry, 'federated endpoint', index);
      const slug = config.slug ?? slugify(config.name);

      if (federatedEndpoints.has(slug)) {
        throw new ConfigError(`Duplicate federated endpoint slug: ${slug}`);
      }

      const targets: FederatedTarget[] = config.targets.map(target => {
        if (target.model !== config.targetModelName) {
          throw new ConfigError(
            `Federated endpoint ${slug} has a target for model '${target.model}' but serves '${config.targetModelName}'`
          );
        }
        if (!clusters.has(target.cluster)) {
          throw new ConfigError(`Federated endpoint ${slug} references unknown cluster '${target.cluster}'`);
        }

        const endpointSlug = target.endpointSlug ?? buildEndpointSlug(target.cluster, target.framework, target.model);
        const endpoint = endpoints.get(endpointSlug);
        if (!endpoint) {
          throw new ConfigError(`Federated endpoint ${slug} references unknown endpoint '${endpointSlug}'`);
        }
        if (endpoint.model !== target.model || endpoint.cluster !== target.cluster) {
          throw new ConfigError(`Federated endpoint ${slug} target does not match endpoint '${endpointSlug}'`);
        }

        return { cluster: target.cluster, framework: target.framework, model: target.model, endpointSlug };
      });

      federatedEndpoints.set(slug, {
        slug,
        name: config.name,
        targetModelName: config.targetModelName,
        description: config.description,
        targets
      });
    });

    return federatedEndpoints;
  }
}
