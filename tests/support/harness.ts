import type { GatewayConfig } from '../../app/core/config';
import { ErrorClassificationService } from '../../app/core/error-classification';
import type { IDirectApiStatusClient } from '../../app/infrastructure/adaptors/direct-api';
import { AdaptorRegistry } from '../../app/infrastructure/adaptors/registry';
import type { RawFederationConfig } from '../../app/domain/repositories';
import { AuthorizationService } from '../../app/domain/services/auth';
import { BatchJobManager } from '../../app/domain/services/batches';
import { EndpointCatalogService } from '../../app/domain/services/catalog';
import { ClusterStatusCache } from '../../app/domain/services/cluster-status';
import { RequestLogService } from '../../app/domain/services/request-log';
import { FederatedRouter, TargetHealthService } from '../../app/domain/services/routing';
import { StreamProxyService, StreamRelayService } from '../../app/domain/services/streaming';
import { createTestConfig, SequentialCryptoService } from './config';
import { FakeFabricClient } from './fabric';
import { federationFixture } from './federation';
import { TestLogger } from './logger';
import { RecordingMetricsService } from './metrics';
import {
  InMemoryBatchFileStore,
  InMemoryBatchJobRepository,
  InMemoryBatchQuotaRepository,
  InMemoryRequestLogRepository,
  StaticFederationConfigSource
} from './repositories';
import { ScriptedClusterAdaptor, ScriptedEndpointAdaptor } from './scripted-adaptors';

export interface HarnessOptions {
  readonly env?: Record<string, string>;
  readonly federation?: RawFederationConfig;
}

function lookup<T>(entries: ReadonlyMap<string, T>, key: string): T {
  const value = entries.get(key);
  if (value === undefined) {
    throw new Error(`No scripted adaptor registered for ${key}`);
  }
  return value;
}

export const unusedDirectApiStatus: IDirectApiStatusClient = {
  fetchStatus: async statusUrl => {
    throw new Error(`Unexpected status lookup for ${statusUrl}`);
  }
};

/**
 * The domain services wired the way the container wires them, over
 * in-memory repositories and scripted adaptors.
 */
export function createHarness(options: HarnessOptions = {}) {
  const config: GatewayConfig = createTestConfig(options.env);
  const logger = new TestLogger();
  const metrics = new RecordingMetricsService();
  const cryptoService = new SequentialCryptoService();
  const fabric = new FakeFabricClient();
  const relay = new StreamRelayService(config, logger, cryptoService);

  const registry = new AdaptorRegistry(logger, metrics, fabric, relay, unusedDirectApiStatus);
  const endpointAdaptors = new Map<string, ScriptedEndpointAdaptor>();
  const clusterAdaptors = new Map<string, ScriptedClusterAdaptor>();

  registry.registerEndpointAdaptor('scripted', (endpoint, deps) => {
    const adaptor = new ScriptedEndpointAdaptor(endpoint, deps);
    endpointAdaptors.set(endpoint.slug, adaptor);
    return adaptor;
  });
  registry.registerClusterAdaptor('scripted', (cluster, deps) => {
    const adaptor = new ScriptedClusterAdaptor(cluster, deps);
    clusterAdaptors.set(cluster.name, adaptor);
    return adaptor;
  });

  const federation = options.federation ?? federationFixture();
  const catalog = new EndpointCatalogService(logger, registry, new StaticFederationConfigSource(federation));
  catalog.loadFrom(federation);

  const statusCache = new ClusterStatusCache(config, logger, catalog, metrics);
  const health = new TargetHealthService(config);
  const authorization = new AuthorizationService(config);
  const classifier = new ErrorClassificationService();
  const router = new FederatedRouter(config, logger, catalog, statusCache, health, authorization, classifier, metrics);

  const requestLogRepository = new InMemoryRequestLogRepository();
  const requestLogs = new RequestLogService(logger, requestLogRepository, cryptoService);
  const streamProxy = new StreamProxyService(logger, router, requestLogs, metrics);

  const batchRepository = new InMemoryBatchJobRepository();
  const quota = new InMemoryBatchQuotaRepository();
  const files = new InMemoryBatchFileStore();
  const batchManager = new BatchJobManager(
    config,
    logger,
    catalog,
    authorization,
    batchRepository,
    quota,
    files,
    cryptoService,
    metrics
  );

  return {
    config,
    logger,
    metrics,
    cryptoService,
    fabric,
    relay,
    registry,
    catalog,
    statusCache,
    health,
    authorization,
    classifier,
    router,
    requestLogRepository,
    requestLogs,
    streamProxy,
    batchRepository,
    quota,
    files,
    batchManager,
    endpoint: (slug: string): ScriptedEndpointAdaptor => lookup(endpointAdaptors, slug),
    cluster: (name: string): ScriptedClusterAdaptor => lookup(clusterAdaptors, name)
  };
}

export type GatewayHarness = ReturnType<typeof createHarness>;
