import { toError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import { fail, type Result } from '../../../core/types';
import { isTimeoutReason } from '../../../core/utils';
import type {
  AdaptorFailure,
  BatchCancelResult,
  BatchStatusResult,
  BatchSubmitRequest,
  BatchSubmitResult,
  EndpointAdaptor,
  InferenceRequest,
  StreamResult,
  TaskContext,
  TaskResult
} from '../../../domain/adaptors';
import type { BatchJob, Endpoint, UserIdentity } from '../../../domain/entities';
import { HttpStatusError, UnexpectedResponseError } from './http';

export interface AdaptorRuntime {
  readonly logger: ILogger;
  readonly metrics: IMetricsService;
}

/**
 * Every public operation resolves to a result value. Exceptions thrown by
 * subclasses are converted into an `AdaptorFailure` here so callers can
 * apply the same failover logic to all backends.
 */
export abstract class BaseEndpointAdaptor implements EndpointAdaptor {
  readonly endpoint: Endpoint;
  protected readonly logger: ILogger;
  protected readonly metrics: IMetricsService;

  constructor(endpoint: Endpoint, runtime: AdaptorRuntime) {
    this.endpoint = endpoint;
    this.logger = runtime.logger.createChild(`${this.constructor.name}:${endpoint.slug}`);
    this.metrics = runtime.metrics;
  }

  async submitTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult> {
    return this.track('task', context, () => this.executeTask(request, context));
  }

  async submitStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult> {
    return this.track('stream', context, () => this.executeStreamingTask(request, context));
  }

  hasBatchEnabled(): boolean {
    return false;
  }

  async submitBatch(request: BatchSubmitRequest, user: UserIdentity): Promise<BatchSubmitResult> {
    if (!this.hasBatchEnabled()) {
      return fail(this.unsupported('submitBatch'));
    }

    try {
      return await this.executeSubmitBatch(request, user);
    } catch (error) {
      const failure = this.failureFromError(error);
      this.logger.error('Batch submission failed', toError(error), {
        userId: user.username,
        metadata: { batchId: request.batchId, lines: request.lines.length, failure }
      });
      return fail(failure);
    }
  }

  async getBatchStatus(batch: BatchJob, signal: AbortSignal): Promise<BatchStatusResult> {
    if (!this.hasBatchEnabled()) {
      return fail(this.unsupported('getBatchStatus'));
    }

    try {
      return await this.executeGetBatchStatus(batch, signal);
    } catch (error) {
      return fail(this.failureFromError(error, signal));
    }
  }

  async cancelBatch(batch: BatchJob, signal: AbortSignal): Promise<BatchCancelResult> {
    if (!this.hasBatchEnabled()) {
      return fail(this.unsupported('cancelBatch'));
    }

    try {
      return await this.executeCancelBatch(batch, signal);
    } catch (error) {
      return fail(this.failureFromError(error, signal));
    }
  }

  protected abstract executeTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult>;
  protected abstract executeStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult>;

  protected async executeSubmitBatch(_request: BatchSubmitRequest, _user: UserIdentity): Promise<BatchSubmitResult> {
    return fail(this.unsupported('submitBatch'));
  }

  protected async executeGetBatchStatus(_batch: BatchJob, _signal: AbortSignal): Promise<BatchStatusResult> {
    return fail(this.unsupported('getBatchStatus'));
  }

  protected async executeCancelBatch(_batch: BatchJob, _signal: AbortSignal): Promise<BatchCancelResult> {
    return fail(this.unsupported('cancelBatch'));
  }

  protected unsupported(operation: string): AdaptorFailure {
    return {
      message: `${operation} is not available for endpoint ${this.endpoint.slug}`,
      code: 501,
      kind: 'unsupported'
    };
  }

  protected failureFromError(error: unknown, signal?: AbortSignal): AdaptorFailure {
    if (signal?.aborted) {
      return isTimeoutReason(signal.reason)
        ? { message: `Request to ${this.endpoint.slug} timed out`, code: 504, kind: 'timeout' }
        : { message: `Request to ${this.endpoint.slug} was cancelled`, code: 499, kind: 'cancelled' };
    }

    if (isTimeoutReason(error)) {
      return { message: `Request to ${this.endpoint.slug} timed out`, code: 504, kind: 'timeout' };
    }

    if (error instanceof HttpStatusError) {
      return { message: `${this.endpoint.slug} responded with ${error.message}`, code: error.status, kind: 'remote' };
    }

    if (error instanceof UnexpectedResponseError) {
      return { message: error.message, code: 502, kind: 'remote' };
    }

    if (error instanceof TypeError) {
      return { message: `Network error reaching ${this.endpoint.slug}: ${error.message}`, code: 502, kind: 'network' };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { message: `Unexpected adaptor error: ${message}`, code: 500, kind: 'internal' };
  }

  private async track<T>(
    operation: 'task' | 'stream',
    context: TaskContext,
    run: () => Promise<Result<T, AdaptorFailure>>
  ): Promise<Result<T, AdaptorFailure>> {
    const startedAt = Date.now();

    this.logger.debug('Adaptor call initiated', {
      requestId: context.requestLogId,
      userId: context.username,
      operation
    });

    let result: Result<T, AdaptorFailure>;
    try {
      result = await run();
    } catch (error) {
      result = fail(this.failureFromError(error, context.signal));
    }

    const duration = Date.now() - startedAt;

    if (result.ok) {
      this.metrics.recordAdaptorCall(this.endpoint.slug, 'success', duration);
      this.logger.info('Adaptor call succeeded', {
        requestId: context.requestLogId,
        operation,
        duration
      });
    } else {
      this.metrics.recordAdaptorCall(this.endpoint.slug, result.error.kind === 'timeout' ? 'timeout' : 'error', duration);
      this.logger.warn('Adaptor call failed', {
        requestId: context.requestLogId,
        operation,
        duration,
        metadata: { ...result.error }
      });
    }

    return result;
  }
}
