import type { AdaptorCallOutcome, IMetricsService, StreamOutcome } from '../../app/core/metrics';

export class RecordingMetricsService implements IMetricsService {
  readonly httpRequests: Array<{ method: string; route: string; statusCode: number }> = [];
  readonly errors: Array<{ type: string; operation?: string }> = [];
  readonly adaptorCalls: Array<{ endpointSlug: string; outcome: AdaptorCallOutcome }> = [];
  readonly failovers: Array<{ model: string; endpointSlug: string }> = [];
  readonly streamOutcomes: Array<{ endpointSlug: string; outcome: StreamOutcome; chunks: number }> = [];
  readonly batchTransitions: string[] = [];
  readonly ingestionBatches: Array<{ kind: 'requests' | 'batches'; rows: number }> = [];
  readonly clusterStatus = new Map<string, boolean>();
  ingestionLag?: { unprocessed: number; oldestAgeSeconds: number };

  recordHttpRequest(method: string, route: string, statusCode: number): void {
    this.httpRequests.push({ method, route, statusCode });
  }

  recordError(type: string, operation?: string): void {
    this.errors.push({ type, operation });
  }

  recordAdaptorCall(endpointSlug: string, outcome: AdaptorCallOutcome): void {
    this.adaptorCalls.push({ endpointSlug, outcome });
  }

  recordFailover(model: string, endpointSlug: string): void {
    this.failovers.push({ model, endpointSlug });
  }

  recordStreamOutcome(endpointSlug: string, outcome: StreamOutcome, chunks: number): void {
    this.streamOutcomes.push({ endpointSlug, outcome, chunks });
  }

  recordBatchTransition(status: string): void {
    this.batchTransitions.push(status);
  }

  recordIngestionBatch(kind: 'requests' | 'batches', rows: number): void {
    this.ingestionBatches.push({ kind, rows });
  }

  updateIngestionLag(unprocessed: number, oldestAgeSeconds: number): void {
    this.ingestionLag = { unprocessed, oldestAgeSeconds };
  }

  updateClusterStatus(cluster: string, fresh: boolean): void {
    this.clusterStatus.set(cluster, fresh);
  }

  async getMetricsEndpoint(): Promise<string> {
    return '';
  }

  getContentType(): string {
    return 'text/plain';
  }
}
