import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import type { ErrorClassificationService } from '../../../core/error-classification';
import { AdaptorError, AuthError, RoutingError, ValidationError, errorMessage, type TargetFailure } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import { fail, type Result } from '../../../core/types';
import { TimeoutError, createLinkedController, isTimeoutReason, raceAbort } from '../../../core/utils';
import type {
  AdaptorFailure,
  EndpointAdaptor,
  InferenceRequest,
  StreamHandle,
  TaskContext,
  TaskSuccess
} from '../../adaptors';
import { buildEndpointSlug, type Endpoint, type OpenAIEndpoint, type UserIdentity } from '../../entities';
import type { AuthorizationService } from '../auth';
import type { EndpointCatalogService } from '../catalog';
import type { ClusterStatusCache } from '../cluster-status';
import type { TargetHealthService } from './target-health.service';

export interface RouteRequest {
  readonly model: string;
  readonly openaiEndpoint: OpenAIEndpoint;
  readonly identity: UserIdentity;
  readonly cluster?: string;
  readonly framework?: string;
}

export interface RouteCandidate {
  readonly endpoint: Endpoint;
  readonly adaptor: EndpointAdaptor;
  readonly federated: boolean;
}

export interface RouteOptions {
  readonly requestLogId: string;
  readonly signal?: AbortSignal;
}

export interface RoutedCall<T> {
  readonly candidate: RouteCandidate;
  readonly value: T;
  readonly attempts: number;
  readonly failures: readonly TargetFailure[];
}

type AdaptorCall<T> = (adaptor: EndpointAdaptor, context: TaskContext) => Promise<Result<T, AdaptorFailure>>;

/**
 * Resolves a model name to an ordered list of physical targets and walks the
 * list until one call succeeds. Every attempt runs under its own timeout.
 */
@injectable()
export class FederatedRouter {
  private readonly logger: ILogger;
  private readonly catalog: EndpointCatalogService;
  private readonly statusCache: ClusterStatusCache;
  private readonly health: TargetHealthService;
  private readonly authorization: AuthorizationService;
  private readonly classifier: ErrorClassificationService;
  private readonly metrics: IMetricsService;
  private readonly settings: GatewayConfig['router'];

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.EndpointCatalogService) catalog: EndpointCatalogService,
    @inject(TYPES.ClusterStatusCache) statusCache: ClusterStatusCache,
    @inject(TYPES.TargetHealthService) health: TargetHealthService,
    @inject(TYPES.AuthorizationService) authorization: AuthorizationService,
    @inject(TYPES.ErrorClassificationService) classifier: ErrorClassificationService,
    @inject(TYPES.MetricsService) metrics: IMetricsService
  ) {
    this.logger = logger.createChild('FederatedRouter');
    this.catalog = catalog;
    this.statusCache = statusCache;
    this.health = health;
    this.authorization = authorization;
    this.classifier = classifier;
    this.metrics = metrics;
    this.settings = config.router;
  }

  async routeTask(request: RouteRequest, inference: InferenceRequest, options: RouteOptions): Promise<RoutedCall<TaskSuccess>> {
    const candidates = this.resolveCandidates(request);
    return this.invoke(request, candidates, options, (adaptor, context) => adaptor.submitTask(inference, context));
  }

  async routeStream(request: RouteRequest, inference: InferenceRequest, options: RouteOptions): Promise<RoutedCall<StreamHandle>> {
    const candidates = this.resolveCandidates(request);
    return this.invoke(
      request,
      candidates,
      options,
      (adaptor, context) => adaptor.submitStreamingTask(inference, context),
      handle => handle.cancel()
    );
  }

  resolveCandidates(request: RouteRequest, now: Date = new Date()): RouteCandidate[] {
    const pinned = request.cluster !== undefined && request.framework !== undefined;
    const candidates = pinned ? this.pinnedCandidates(request) : this.federatedCandidates(request, now);

    const permitted = candidates.filter(candidate => this.authorization.canAccess(request.identity, candidate.endpoint));
    if (permitted.length === 0) {
      throw new AuthError(`User ${request.identity.username} is not allowed to access model '${request.model}'`, 403);
    }

    const ordered = this.health.order(permitted, candidate => candidate.endpoint.slug, now.getTime());
    return ordered.slice(0, this.settings.maxAttempts);
  }

  private pinnedCandidates(request: RouteRequest): RouteCandidate[] {
    const slug = buildEndpointSlug(request.cluster ?? '', request.framework ?? '', request.model);
    const endpoint = this.catalog.getEndpoint(slug);
    const adaptor = this.catalog.getEndpointAdaptor(slug);

    if (!endpoint || !adaptor) {
      throw new RoutingError(`Endpoint '${slug}' does not exist`, [], 404);
    }

    if (!this.supportsSurface(endpoint, request.openaiEndpoint)) {
      throw new ValidationError(`Cluster ${endpoint.cluster} does not serve /${request.openaiEndpoint}`);
    }

    return [{ endpoint, adaptor, federated: false }];
  }

  private federatedCandidates(request: RouteRequest, now: Date): RouteCandidate[] {
    const federated = this.catalog.findFederatedEndpoint(request.model);
    const endpoints = federated
      ? federated.targets.flatMap(target => this.catalog.getEndpoint(target.endpointSlug) ?? [])
      : this.catalog.findEndpointsByModel(request.model);

    const candidates = endpoints
      .filter(endpoint => this.supportsSurface(endpoint, request.openaiEndpoint))
      .flatMap(endpoint => {
        const adaptor = this.catalog.getEndpointAdaptor(endpoint.slug);
        return adaptor ? [{ endpoint, adaptor, federated: federated !== undefined }] : [];
      });

    if (candidates.length === 0) {
      throw new RoutingError(`Model '${request.model}' is not available for /${request.openaiEndpoint}`, [], 404);
    }

    const byStatus = candidates.map(candidate => ({
      candidate,
      status: this.statusCache.availability(candidate.endpoint.cluster, candidate.endpoint.framework, candidate.endpoint.model, now)
    }));

    const live = byStatus.filter(entry => entry.status === 'running').map(entry => entry.candidate);
    if (live.length > 0) {
      return live;
    }

    if (this.settings.allowUnknownStatusFallback) {
      const queued = byStatus.filter(entry => entry.status === 'queued').map(entry => entry.candidate);
      const unknown = byStatus.filter(entry => entry.status === 'unknown').map(entry => entry.candidate);
      const fallback = [...queued, ...unknown];
      if (fallback.length > 0) {
        this.logger.debug('No live target, falling back to queued or unknown targets', {
          metadata: { model: request.model, targets: fallback.map(candidate => candidate.endpoint.slug) }
        });
        return fallback;
      }
    }

    throw new RoutingError(`No live target is available for model '${request.model}'`, [], 503);
  }

  private supportsSurface(endpoint: Endpoint, openaiEndpoint: OpenAIEndpoint): boolean {
    const cluster = this.catalog.getCluster(endpoint.cluster);
    return cluster !== undefined && cluster.openaiEndpoints.includes(openaiEndpoint);
  }

  private async invoke<T>(
    request: RouteRequest,
    candidates: readonly RouteCandidate[],
    options: RouteOptions,
    call: AdaptorCall<T>,
    discard?: (value: T) => void
  ): Promise<RoutedCall<T>> {
    const failures: TargetFailure[] = [];

    for (const [index, candidate] of candidates.entries()) {
      this.throwIfCancelled(options.signal);

      const slug = candidate.endpoint.slug;
      const timeoutMs = candidate.endpoint.timeoutMs ?? this.settings.defaultTimeoutMs;
      const result = await this.attempt(request, candidate, timeoutMs, options, call, discard);

      if (result.ok) {
        this.health.markSuccess(slug);
        if (failures.length > 0) {
          this.logger.info('Request served after failover', {
            requestId: options.requestLogId,
            metadata: { model: request.model, endpoint: slug, attempts: index + 1 }
          });
        }
        return { candidate, value: result.value, attempts: index + 1, failures };
      }

      this.throwIfCancelled(options.signal);

      const failure = result.error;
      failures.push({ endpointSlug: slug, message: failure.message, code: failure.code });

      const classification = this.classifier.classify(failure);
      if (classification.shouldRecordFailure) {
        this.health.markFailure(slug);
      }

      this.metrics.recordFailover(request.model, slug);
      this.logger.warn('Target failed, trying next candidate', {
        requestId: options.requestLogId,
        userId: request.identity.username,
        metadata: {
          model: request.model,
          endpoint: slug,
          attempt: index + 1,
          remaining: candidates.length - index - 1,
          classification: classification.classification,
          ...failure
        }
      });
    }

    throw RoutingError.fromFailures(request.model, failures);
  }

  private async attempt<T>(
    request: RouteRequest,
    candidate: RouteCandidate,
    timeoutMs: number,
    options: RouteOptions,
    call: AdaptorCall<T>,
    discard?: (value: T) => void
  ): Promise<Result<T, AdaptorFailure>> {
    const { controller, dispose } = createLinkedController(options.signal);
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(`${candidate.endpoint.slug} did not respond within ${timeoutMs}ms`)),
      timeoutMs
    );

    const pending = call(candidate.adaptor, {
      requestLogId: options.requestLogId,
      username: request.identity.username,
      signal: controller.signal,
      timeoutMs
    });

    try {
      return await raceAbort(pending, controller.signal);
    } catch (error) {
      if (discard) {
        void pending.then(
          late => {
            if (late.ok) discard(late.value);
          },
          lateError => this.logger.debug('Abandoned call settled with an error', { metadata: { error: errorMessage(lateError) } })
        );
      }

      const failure: AdaptorFailure = isTimeoutReason(error)
        ? { message: `${candidate.endpoint.slug} timed out after ${timeoutMs}ms`, code: 504, kind: 'timeout' }
        : { message: errorMessage(error), code: 499, kind: 'cancelled' };
      return fail(failure);
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new AdaptorError('Request was cancelled by the client', 499);
    }
  }
}
