export interface MetricLabels {
  [key: string]: string | number;
}

export interface CounterMetric {
  name: string;
  help: string;
  labels?: string[];
}

export interface GaugeMetric {
  name: string;
  help: string;
  labels?: string[];
}

export interface HistogramMetric {
  name: string;
  help: string;
  labels?: string[];
  buckets?: number[];
}

export interface MetricsConfig {
  enabled: boolean;
  prefix: string;
  defaultLabels: Record<string, string>;
  collectDefaultMetrics: boolean;
}

export interface IMetricsCollector {
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
  observeHistogram(name: string, value: number, labels?: MetricLabels): void;
  getMetrics(): Promise<string>;
  getContentType(): string;
  reset(): void;
}

export type AdaptorCallOutcome = 'success' | 'error' | 'timeout';
export type StreamOutcome = 'completed' | 'failed' | 'cancelled';

export interface IMetricsService {
  recordHttpRequest(method: string, route: string, statusCode: number, duration: number): void;
  recordError(type: string, operation?: string): void;
  recordAdaptorCall(endpointSlug: string, outcome: AdaptorCallOutcome, duration: number): void;
  recordFailover(model: string, endpointSlug: string): void;
  recordStreamOutcome(endpointSlug: string, outcome: StreamOutcome, chunks: number): void;
  recordBatchTransition(status: string): void;
  recordIngestionBatch(kind: 'requests' | 'batches', rows: number, duration: number): void;
  updateIngestionLag(unprocessed: number, oldestAgeSeconds: number): void;
  updateClusterStatus(cluster: string, fresh: boolean): void;
  getMetricsEndpoint(): Promise<string>;
  getContentType(): string;
}
