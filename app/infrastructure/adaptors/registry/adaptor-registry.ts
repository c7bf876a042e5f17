import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { ConfigError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ClusterAdaptor, EndpointAdaptor, StreamRelay } from '../../../domain/adaptors';
import type { Cluster, Endpoint } from '../../../domain/entities';
import type { IFabricClient } from '../../fabric';
import { DirectApiClusterAdaptor, DirectApiEndpointAdaptor, type IDirectApiStatusClient } from '../direct-api';
import { FabricClusterAdaptor, FabricEndpointAdaptor } from '../fabric';

export interface AdaptorDependencies {
  readonly logger: ILogger;
  readonly metrics: IMetricsService;
  readonly fabric: IFabricClient;
  readonly relay: StreamRelay;
  readonly directApiStatus: IDirectApiStatusClient;
}

export type EndpointAdaptorFactory = (endpoint: Endpoint, deps: AdaptorDependencies) => EndpointAdaptor;
export type ClusterAdaptorFactory = (cluster: Cluster, deps: AdaptorDependencies) => ClusterAdaptor;

const BUILT_IN_ENDPOINT_ADAPTORS = {
  fabric: (endpoint, deps) => new FabricEndpointAdaptor(endpoint, deps),
  'direct-api': (endpoint, deps) => new DirectApiEndpointAdaptor(endpoint, deps)
} satisfies Record<string, EndpointAdaptorFactory>;

const BUILT_IN_CLUSTER_ADAPTORS = {
  fabric: (cluster, deps) => new FabricClusterAdaptor(cluster, deps),
  'direct-api': (cluster, deps) => new DirectApiClusterAdaptor(cluster, deps)
} satisfies Record<string, ClusterAdaptorFactory>;

/**
 * Maps adaptor type identifiers to factories. Built-in types are fixed at
 * compile time; deployments add their own with `registerEndpointAdaptor`
 * before the catalog loads.
 */
@injectable()
export class AdaptorRegistry {
  private readonly logger: ILogger;
  private readonly deps: AdaptorDependencies;
  private readonly endpointFactories = new Map<string, EndpointAdaptorFactory>(Object.entries(BUILT_IN_ENDPOINT_ADAPTORS));
  private readonly clusterFactories = new Map<string, ClusterAdaptorFactory>(Object.entries(BUILT_IN_CLUSTER_ADAPTORS));

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metrics: IMetricsService,
    @inject(TYPES.FabricClient) fabric: IFabricClient,
    @inject(TYPES.StreamRelayService) relay: StreamRelay,
    @inject(TYPES.DirectApiStatusClient) directApiStatus: IDirectApiStatusClient
  ) {
    this.logger = logger.createChild('AdaptorRegistry');
    this.deps = { logger, metrics, fabric, relay, directApiStatus };
  }

  registerEndpointAdaptor(type: string, factory: EndpointAdaptorFactory): void {
    if (this.endpointFactories.has(type)) {
      throw new ConfigError(`Endpoint adaptor type '${type}' is already registered`);
    }
    this.endpointFactories.set(type, factory);
    this.logger.info(`Registered endpoint adaptor type: ${type}`);
  }

  registerClusterAdaptor(type: string, factory: ClusterAdaptorFactory): void {
    if (this.clusterFactories.has(type)) {
      throw new ConfigError(`Cluster adaptor type '${type}' is already registered`);
    }
    this.clusterFactories.set(type, factory);
    this.logger.info(`Registered cluster adaptor type: ${type}`);
  }

  hasEndpointType(type: string): boolean {
    return this.endpointFactories.has(type);
  }

  hasClusterType(type: string): boolean {
    return this.clusterFactories.has(type);
  }

  createEndpointAdaptor(endpoint: Endpoint): EndpointAdaptor {
    const factory = this.endpointFactories.get(endpoint.adaptorType);
    if (!factory) {
      throw new ConfigError(
        `Unknown adaptor type '${endpoint.adaptorType}' for endpoint ${endpoint.slug}. Known types: ${[...this.endpointFactories.keys()].join(', ')}`
      );
    }
    return factory(endpoint, this.deps);
  }

  createClusterAdaptor(cluster: Cluster): ClusterAdaptor {
    const factory = this.clusterFactories.get(cluster.adaptorType);
    if (!factory) {
      throw new ConfigError(
        `Unknown adaptor type '${cluster.adaptorType}' for cluster ${cluster.name}. Known types: ${[...this.clusterFactories.keys()].join(', ')}`
      );
    }
    return factory(cluster, this.deps);
  }
}
