import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { GatewayError, errorMessage, type GatewayErrorType } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService, StreamOutcome } from '../../../core/metrics';
import type { InferenceRequest, StreamHandle } from '../../adaptors';
import type { RequestLog } from '../../entities';
import type { RequestLogService } from '../request-log';
import type { FederatedRouter, RouteRequest, RoutedCall } from '../routing';
import { StreamAccumulator } from './stream-accumulator';

export type StreamState = 'idle' | 'connecting' | 'streaming' | 'completed' | 'failed' | 'cancelled';

export interface OpenStreamRequest {
  readonly route: RouteRequest;
  readonly inference: InferenceRequest;
  readonly log: RequestLog;
  readonly signal?: AbortSignal;
}

export const DONE_FRAME = 'data: [DONE]\n\n';

export function formatFrame(payload: string): string {
  return `data: ${payload}\n\n`;
}

export function formatErrorFrame(message: string, type: GatewayErrorType, code: number): string {
  return formatFrame(JSON.stringify({ error: { message, type, code } }));
}

interface StreamFailure {
  readonly message: string;
  readonly type: GatewayErrorType;
  readonly code: number;
}

function describeFailure(error: unknown): StreamFailure {
  if (error instanceof GatewayError) {
    return { message: error.message, type: error.type, code: error.statusCode };
  }
  return { message: errorMessage(error), type: 'adaptor_error', code: 502 };
}

interface SessionDependencies {
  readonly logger: ILogger;
  readonly metrics: IMetricsService;
  readonly requestLogs: RequestLogService;
}

/**
 * One proxied stream. Frames are produced lazily as the backend delivers
 * chunks; whichever way the stream ends, the request log is written once.
 */
export class StreamSession {
  readonly endpointSlug: string;
  readonly taskId?: string;
  private readonly handle: StreamHandle;
  private readonly log: RequestLog;
  private readonly signal?: AbortSignal;
  private readonly dependencies: SessionDependencies;
  private readonly accumulator: StreamAccumulator;
  private state: StreamState = 'connecting';
  private failure?: StreamFailure;
  private finalization?: Promise<void>;
  private readonly onAbort = (): void => this.cancel();

  constructor(endpointSlug: string, handle: StreamHandle, log: RequestLog, dependencies: SessionDependencies, signal?: AbortSignal) {
    this.endpointSlug = endpointSlug;
    this.taskId = handle.taskId;
    this.handle = handle;
    this.log = log;
    this.signal = signal;
    this.dependencies = dependencies;
    this.accumulator = new StreamAccumulator(log.getModel());

    signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  getState(): StreamState {
    return this.state;
  }

  async *frames(): AsyncGenerator<string> {
    if (this.getState() !== 'connecting') {
      return;
    }
    this.transition('streaming');

    try {
      for await (const chunk of this.handle.chunks) {
        if (this.state !== 'streaming') {
          break;
        }
        this.accumulator.add(chunk);
        yield formatFrame(chunk);
      }

      if (this.state === 'streaming') {
        this.transition('completed');
        yield DONE_FRAME;
      }
    } catch (error) {
      if (this.state === 'streaming') {
        const failure = describeFailure(error);
        this.failure = failure;
        this.transition('failed');
        yield formatErrorFrame(failure.message, failure.type, failure.code);
        yield DONE_FRAME;
      }
    } finally {
      if (this.state === 'streaming') {
        this.transition('cancelled');
        this.handle.cancel();
      }
      await this.finalize();
    }
  }

  /** Stops the backend. Safe to call at any point, including before `frames()` starts. */
  cancel(): void {
    if (this.state === 'connecting') {
      this.transition('cancelled');
      this.handle.cancel();
      void this.finalize();
      return;
    }

    if (this.state === 'streaming') {
      this.transition('cancelled');
      this.handle.cancel();
    }
  }

  /** Resolves once the request log has been written. */
  finalized(): Promise<void> {
    return this.finalization ?? Promise.resolve();
  }

  private transition(next: StreamState): void {
    this.state = next;
  }

  private finalize(): Promise<void> {
    this.finalization ??= this.writeOutcome();
    return this.finalization;
  }

  private async writeOutcome(): Promise<void> {
    this.signal?.removeEventListener('abort', this.onAbort);

    const now = new Date();
    let outcome: StreamOutcome;

    if (this.state === 'completed') {
      outcome = 'completed';
      this.log.complete(200, JSON.stringify(this.accumulator.buildResponse()), now, this.taskId);
    } else if (this.state === 'failed') {
      outcome = 'failed';
      const failure = this.failure ?? { message: 'Stream failed', type: 'adaptor_error', code: 502 };
      this.log.fail(failure.code, failure.message, now);
    } else {
      outcome = 'cancelled';
      this.log.fail(499, 'Stream cancelled by the client', now);
    }

    this.dependencies.metrics.recordStreamOutcome(this.endpointSlug, outcome, this.accumulator.chunkCount());
    this.dependencies.logger.info('Stream finished', {
      requestId: this.log.getId(),
      userId: this.log.getUsername(),
      metadata: {
        endpoint: this.endpointSlug,
        outcome,
        chunks: this.accumulator.chunkCount(),
        usageReported: this.accumulator.hasReportedUsage()
      }
    });

    await this.dependencies.requestLogs.save(this.log);
  }
}

/**
 * Connects a client stream to a backend through the router. Failover
 * happens while connecting; once chunks flow the target is fixed.
 */
@injectable()
export class StreamProxyService {
  private readonly logger: ILogger;
  private readonly router: FederatedRouter;
  private readonly requestLogs: RequestLogService;
  private readonly metrics: IMetricsService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.FederatedRouter) router: FederatedRouter,
    @inject(TYPES.RequestLogService) requestLogs: RequestLogService,
    @inject(TYPES.MetricsService) metrics: IMetricsService
  ) {
    this.logger = logger.createChild('StreamProxyService');
    this.router = router;
    this.requestLogs = requestLogs;
    this.metrics = metrics;
  }

  async open(request: OpenStreamRequest): Promise<StreamSession> {
    const { log, route, inference, signal } = request;
    log.markBackendRequest(new Date());

    let routed: RoutedCall<StreamHandle>;
    try {
      routed = await this.router.routeStream(route, inference, { requestLogId: log.getId(), signal });
    } catch (error) {
      const failure = describeFailure(error);
      log.fail(failure.code, failure.message, new Date());
      await this.requestLogs.save(log);
      throw error;
    }

    const { endpoint } = routed.candidate;
    log.assignTarget(
      { cluster: endpoint.cluster, framework: endpoint.framework, model: endpoint.model, endpointSlug: endpoint.slug },
      routed.attempts
    );

    this.logger.debug('Stream connected', {
      requestId: log.getId(),
      metadata: { endpoint: endpoint.slug, attempts: routed.attempts, taskId: routed.value.taskId }
    });

    return new StreamSession(
      endpoint.slug,
      routed.value,
      log,
      { logger: this.logger, metrics: this.metrics, requestLogs: this.requestLogs },
      signal
    );
  }
}
