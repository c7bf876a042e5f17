import { injectable, inject } from 'inversify';
import type { ILogger } from '../logging';
import { TYPES } from '../container/types';
import { toError } from '../errors';
import type {
  AdaptorCallOutcome,
  IMetricsCollector,
  IMetricsService,
  MetricLabels,
  StreamOutcome
} from './types';

@injectable()
export class MetricsService implements IMetricsService {
  private readonly logger: ILogger;
  private readonly collector: IMetricsCollector;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsCollector) collector: IMetricsCollector
  ) {
    this.logger = logger.createChild('MetricsService');
    this.collector = collector;
  }

  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void {
    const labels: MetricLabels = {
      method: method.toUpperCase(),
      route,
      status_code: statusCode.toString()
    };

    this.collector.incrementCounter('http_requests_total', labels);
    this.collector.observeHistogram('http_request_duration_seconds', duration / 1000, labels);
  }

  recordError(type: string, operation?: string): void {
    const labels: MetricLabels = { error_type: type };

    if (operation) {
      labels.operation = operation;
    }

    this.collector.incrementCounter('errors_total', labels);
  }

  recordAdaptorCall(endpointSlug: string, outcome: AdaptorCallOutcome, duration: number): void {
    const labels: MetricLabels = { endpoint: endpointSlug, outcome };

    this.collector.incrementCounter('adaptor_calls_total', labels);
    this.collector.observeHistogram('adaptor_call_duration_seconds', duration / 1000, labels);
  }

  recordFailover(model: string, endpointSlug: string): void {
    this.collector.incrementCounter('router_failovers_total', { model, endpoint: endpointSlug });
  }

  recordStreamOutcome(endpointSlug: string, outcome: StreamOutcome, chunks: number): void {
    this.collector.incrementCounter('streams_total', { endpoint: endpointSlug, outcome });

    if (chunks > 0) {
      this.collector.incrementCounter('stream_chunks_total', { endpoint: endpointSlug }, chunks);
    }
  }

  recordBatchTransition(status: string): void {
    this.collector.incrementCounter('batch_transitions_total', { status });
  }

  recordIngestionBatch(kind: 'requests' | 'batches', rows: number, duration: number): void {
    if (rows > 0) {
      this.collector.incrementCounter('metrics_ingestion_rows_total', { kind }, rows);
    }
    this.collector.observeHistogram('metrics_ingestion_batch_duration_seconds', duration / 1000, { kind });
  }

  updateIngestionLag(unprocessed: number, oldestAgeSeconds: number): void {
    this.collector.setGauge('metrics_ingestion_unprocessed_rows', unprocessed);
    this.collector.setGauge('metrics_ingestion_oldest_unprocessed_age_seconds', oldestAgeSeconds);
  }

  updateClusterStatus(cluster: string, fresh: boolean): void {
    this.collector.setGauge('cluster_status_fresh', fresh ? 1 : 0, { cluster });
  }

  async getMetricsEndpoint(): Promise<string> {
    try {
      return await this.collector.getMetrics();
    } catch (error) {
      this.logger.error('Failed to get metrics endpoint data', toError(error));
      return '';
    }
  }

  getContentType(): string {
    return this.collector.getContentType();
  }
}
