import { injectable, inject } from 'inversify';
import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
import type { ILogger } from '../logging';
import { TYPES } from '../container/types';
import { toError } from '../errors';
import type {
  IMetricsCollector,
  MetricLabels,
  CounterMetric,
  GaugeMetric,
  HistogramMetric,
  MetricsConfig
} from './types';

@injectable()
export class PrometheusCollector implements IMetricsCollector {
  private readonly logger: ILogger;
  private readonly registry: Registry = new Registry();
  private readonly counters: Map<string, Counter<string>> = new Map();
  private readonly gauges: Map<string, Gauge<string>> = new Map();
  private readonly histograms: Map<string, Histogram<string>> = new Map();
  private readonly config: MetricsConfig;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.createChild('PrometheusCollector');
    this.config = this.buildConfig();
    this.registry.setDefaultLabels(this.config.defaultLabels);

    if (this.config.collectDefaultMetrics) {
      collectDefaultMetrics({ prefix: `${this.config.prefix}_`, register: this.registry });
    }

    this.initializeApplicationMetrics();
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    if (!this.config.enabled) {
      return;
    }

    try {
      const counter = this.getOrCreateCounter(name, labels);
      if (labels) {
        counter.inc(labels, value);
      } else {
        counter.inc(value);
      }
    } catch (error) {
      this.logger.error('Failed to increment counter', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    if (!this.config.enabled) {
      return;
    }

    try {
      const gauge = this.getOrCreateGauge(name, labels);
      if (labels) {
        gauge.set(labels, value);
      } else {
        gauge.set(value);
      }
    } catch (error) {
      this.logger.error('Failed to set gauge', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  observeHistogram(name: string, value: number, labels?: MetricLabels): void {
    if (!this.config.enabled) {
      return;
    }

    try {
      const histogram = this.getOrCreateHistogram(name, labels);
      if (labels) {
        histogram.observe(labels, value);
      } else {
        histogram.observe(value);
      }
    } catch (error) {
      this.logger.error('Failed to observe histogram', toError(error), {
        metadata: { name, labels, value }
      });
    }
  }

  async getMetrics(): Promise<string> {
    try {
      return await this.registry.metrics();
    } catch (error) {
      this.logger.error('Failed to get metrics', toError(error));
      return '';
    }
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  reset(): void {
    this.registry.resetMetrics();
    this.logger.info('Metrics registry reset');
  }

  private buildConfig(): MetricsConfig {
    return {
      enabled: process.env.METRICS_ENABLED !== 'false',
      prefix: process.env.METRICS_PREFIX || 'gateway',
      defaultLabels: {
        service: process.env.SERVICE_NAME || 'inference-gateway',
        environment: process.env.NODE_ENV || 'development'
      },
      collectDefaultMetrics: process.env.COLLECT_DEFAULT_METRICS !== 'false'
    };
  }

  private initializeApplicationMetrics(): void {
    this.createCounter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labels: ['method', 'route', 'status_code']
    });

    this.createHistogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labels: ['method', 'route', 'status_code'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120]
    });

    this.createCounter({
      name: 'errors_total',
      help: 'Total number of errors by type',
      labels: ['error_type', 'operation']
    });

    this.createCounter({
      name: 'adaptor_calls_total',
      help: 'Adaptor calls by endpoint and outcome',
      labels: ['endpoint', 'outcome']
    });

    this.createHistogram({
      name: 'adaptor_call_duration_seconds',
      help: 'Adaptor call latency in seconds',
      labels: ['endpoint', 'outcome'],
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300]
    });

    this.createCounter({
      name: 'router_failovers_total',
      help: 'Failover events by model and failed endpoint',
      labels: ['model', 'endpoint']
    });

    this.createCounter({
      name: 'streams_total',
      help: 'Streaming responses by terminal state',
      labels: ['endpoint', 'outcome']
    });

    this.createCounter({
      name: 'stream_chunks_total',
      help: 'Chunks forwarded to clients',
      labels: ['endpoint']
    });

    this.createCounter({
      name: 'batch_transitions_total',
      help: 'Batch status transitions by target status',
      labels: ['status']
    });

    this.createCounter({
      name: 'metrics_ingestion_rows_total',
      help: 'Rows processed by metrics ingestion',
      labels: ['kind']
    });

    this.createHistogram({
      name: 'metrics_ingestion_batch_duration_seconds',
      help: 'Metrics ingestion batch duration in seconds',
      labels: ['kind'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10]
    });

    this.createGauge({
      name: 'metrics_ingestion_unprocessed_rows',
      help: 'Request logs waiting for metrics ingestion'
    });

    this.createGauge({
      name: 'metrics_ingestion_oldest_unprocessed_age_seconds',
      help: 'Age of the oldest unprocessed request log'
    });

    this.createGauge({
      name: 'cluster_status_fresh',
      help: 'Whether the cached cluster status is fresh (1) or stale (0)',
      labels: ['cluster']
    });

    this.logger.debug('Application metrics initialized');
  }

  private createCounter(config: CounterMetric): Counter<string> {
    const counter = new Counter({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      registers: [this.registry]
    });

    this.counters.set(config.name, counter);
    return counter;
  }

  private createGauge(config: GaugeMetric): Gauge<string> {
    const gauge = new Gauge({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      registers: [this.registry]
    });

    this.gauges.set(config.name, gauge);
    return gauge;
  }

  private createHistogram(config: HistogramMetric): Histogram<string> {
    const histogram = new Histogram({
      name: `${this.config.prefix}_${config.name}`,
      help: config.help,
      labelNames: config.labels || [],
      buckets: config.buckets,
      registers: [this.registry]
    });

    this.histograms.set(config.name, histogram);
    return histogram;
  }

  private getOrCreateCounter(name: string, labels?: MetricLabels): Counter<string> {
    return this.counters.get(name) ?? this.createCounter({
      name,
      help: `Auto-generated counter: ${name}`,
      labels: labels ? Object.keys(labels) : []
    });
  }

  private getOrCreateGauge(name: string, labels?: MetricLabels): Gauge<string> {
    return this.gauges.get(name) ?? this.createGauge({
      name,
      help: `Auto-generated gauge: ${name}`,
      labels: labels ? Object.keys(labels) : []
    });
  }

  private getOrCreateHistogram(name: string, labels?: MetricLabels): Histogram<string> {
    return this.histograms.get(name) ?? this.createHistogram({
      name,
      help: `Auto-generated histogram: ${name}`,
      labels: labels ? Object.keys(labels) : [],
      buckets: [0.001, 0.01, 0.1, 1, 2, 5]
    });
  }
}
