import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import { NotFoundError } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import { emptyClusterJobs, type UserIdentity } from '../../domain/entities';
import type { AuthorizationService } from '../../domain/services/auth';
import type { EndpointCatalogService } from '../../domain/services/catalog';
import type { ClusterStatusCache } from '../../domain/services/cluster-status';
import type { ClusterJobsResponse, ModelInfo, ModelListResponse } from '../types';

@injectable()
export class ModelsService {
  private readonly logger: ILogger;
  private readonly catalog: EndpointCatalogService;
  private readonly statusCache: ClusterStatusCache;
  private readonly authorization: AuthorizationService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.EndpointCatalogService) catalog: EndpointCatalogService,
    @inject(TYPES.ClusterStatusCache) statusCache: ClusterStatusCache,
    @inject(TYPES.AuthorizationService) authorization: AuthorizationService
  ) {
    this.logger = logger.createChild('ModelsService');
    this.catalog = catalog;
    this.statusCache = statusCache;
    this.authorization = authorization;
  }

  /**
   * A federated model is listed when at least one of its targets is
   * accessible. Physical endpoints are listed under their own slug.
   */
  listModels(identity: UserIdentity): ModelListResponse {
    const created = Math.floor(this.catalog.snapshot().loadedAt.getTime() / 1000);

    const federated: ModelInfo[] = this.catalog
      .listFederatedEndpoints()
      .filter(entry =>
        entry.targets.some(target => {
          const endpoint = this.catalog.getEndpoint(target.endpointSlug);
          return endpoint !== undefined && this.authorization.canAccess(identity, endpoint);
        })
      )
      .map((entry): ModelInfo => ({
        id: entry.targetModelName,
        object: 'model',
        created,
        owned_by: 'federated',
        federated: true,
        description: entry.description
      }));

    const endpoints: ModelInfo[] = this.catalog
      .listEndpoints()
      .filter(endpoint => this.authorization.canAccess(identity, endpoint))
      .map((endpoint): ModelInfo => ({
        id: endpoint.slug,
        object: 'model',
        created,
        owned_by: endpoint.cluster,
        federated: false,
        cluster: endpoint.cluster,
        framework: endpoint.framework
      }));

    this.logger.debug('Listed models', {
      userId: identity.username,
      metadata: { federated: federated.length, endpoints: endpoints.length }
    });

    return { object: 'list', data: [...federated, ...endpoints] };
  }

  getClusterJobs(clusterName: string, identity: UserIdentity, now: Date = new Date()): ClusterJobsResponse {
    const cluster = this.catalog.getCluster(clusterName);
    if (!cluster) {
      throw new NotFoundError(`Cluster ${clusterName} not found`);
    }
    this.authorization.assertAccess(identity, cluster, `cluster ${clusterName}`);

    const entry = this.statusCache.getEntry(clusterName);
    return {
      cluster: clusterName,
      fetched_at: entry ? entry.fetchedAt.toISOString() : null,
      fresh: this.statusCache.isFresh(clusterName, now),
      jobs: entry ? entry.jobs : emptyClusterJobs()
    };
  }
}
