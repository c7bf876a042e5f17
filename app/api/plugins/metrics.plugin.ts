import { Elysia } from 'elysia';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { RequestTracker } from './request-tracker.plugin';

export class MetricsPlugin {
  private readonly pluginName = 'metrics';
  private readonly logger: ILogger;
  private readonly metrics: IMetricsService;
  private readonly requestTracker: RequestTracker;

  constructor(logger: ILogger, metrics: IMetricsService, requestTracker: RequestTracker) {
    this.logger = logger.createChild('HttpAccess');
    this.metrics = metrics;
    this.requestTracker = requestTracker;
  }

  createPlugin() {
    return new Elysia({ name: this.pluginName }).onAfterResponse({ as: 'global' }, ({ request, set }) => {
      this.record(request, typeof set.status === 'number' ? set.status : 200);
    });
  }

  private record(request: Request, status: number): void {
    const { requestId, startTime } = this.requestTracker.track(request);
    const duration = Date.now() - startTime;
    const path = this.extractPath(request);

    this.metrics.recordHttpRequest(request.method, path, status, duration);
    this.logger.info('Request completed', {
      requestId,
      operation: 'http_request',
      duration,
      metadata: { method: request.method, path, status }
    });
  }

  /** Batch ids and other path parameters are collapsed to keep label cardinality bounded. */
  private extractPath(request: Request): string {
    const pathname = new URL(request.url).pathname;
    return pathname.replace(/^\/v1\/batches\/[^/]+$/, '/v1/batches/:id').replace(/^\/v1\/clusters\/[^/]+\/jobs$/, '/v1/clusters/:cluster/jobs');
  }
}
