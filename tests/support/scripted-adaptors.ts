import { emptyClusterJobs, type BatchJob } from '../../app/domain/entities';
import { fail, ok } from '../../app/core/types';
import type {
  AdaptorFailure,
  AdaptorFailureKind,
  BatchCancelResult,
  BatchTaskStatus,
  BatchStatusResult,
  BatchSubmitRequest,
  BatchSubmitResult,
  ClusterJobsResult,
  InferenceRequest,
  StreamHandle,
  StreamResult,
  TaskContext,
  TaskResult
} from '../../app/domain/adaptors';
import { BaseClusterAdaptor, BaseEndpointAdaptor } from '../../app/infrastructure/adaptors/base';

export function adaptorFailure(message: string, code: number, kind: AdaptorFailureKind = 'remote') {
  return fail<AdaptorFailure>({ message, code, kind });
}

export function reportStatuses(statuses: readonly BatchTaskStatus[]): BatchStatusResult {
  return ok(statuses);
}

export type TaskScript = (request: InferenceRequest, context: TaskContext) => Promise<TaskResult>;
export type StreamScript = (request: InferenceRequest, context: TaskContext) => Promise<StreamResult>;

/**
 * Endpoint adaptor whose behaviour each test sets. Batch support is switched
 * on by `settings.batch` in the endpoint config.
 */
export class ScriptedEndpointAdaptor extends BaseEndpointAdaptor {
  readonly requests: InferenceRequest[] = [];
  readonly submittedBatches: BatchSubmitRequest[] = [];
  readonly cancelledBatches: string[] = [];
  batchStatusCalls = 0;

  onTask: TaskScript = async () => ok({ result: JSON.stringify({ served_by: this.endpoint.slug }) });
  onStream: StreamScript = async () => ok(new ChunkFeed().handle());
  onBatchSubmit: (request: BatchSubmitRequest) => Promise<BatchSubmitResult> = async request =>
    ok({ taskIds: request.lines.map(line => `${request.batchId}-task-${line.line}`) });
  onBatchStatus: (batch: BatchJob) => Promise<BatchStatusResult> = async () => ok([]);
  onBatchCancel: (batch: BatchJob, signal: AbortSignal) => Promise<BatchCancelResult> = async batch =>
    ok({ cancelledTasks: batch.getTaskIds().length });

  override hasBatchEnabled(): boolean {
    return this.endpoint.settings.batch === true;
  }

  protected async executeTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult> {
    this.requests.push(request);
    return this.onTask(request, context);
  }

  protected async executeStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult> {
    this.requests.push(request);
    return this.onStream(request, context);
  }

  protected override async executeSubmitBatch(request: BatchSubmitRequest): Promise<BatchSubmitResult> {
    this.submittedBatches.push(request);
    return this.onBatchSubmit(request);
  }

  protected override async executeGetBatchStatus(batch: BatchJob): Promise<BatchStatusResult> {
    this.batchStatusCalls += 1;
    return this.onBatchStatus(batch);
  }

  protected override async executeCancelBatch(batch: BatchJob, signal: AbortSignal): Promise<BatchCancelResult> {
    this.cancelledBatches.push(batch.getId());
    return this.onBatchCancel(batch, signal);
  }
}

/** Cluster adaptor reporting whatever jobs the test sets; `settings.jobStatus: false` turns reporting off. */
export class ScriptedClusterAdaptor extends BaseClusterAdaptor {
  fetchCalls = 0;
  onFetch: (signal: AbortSignal) => Promise<ClusterJobsResult> = async () => ok(emptyClusterJobs());

  override hasJobStatus(): boolean {
    return this.cluster.settings.jobStatus !== false;
  }

  protected async fetchJobs(signal: AbortSignal): Promise<ClusterJobsResult> {
    this.fetchCalls += 1;
    return this.onFetch(signal);
  }
}

/**
 * Backend stream driven by the test: chunks are pushed one at a time and the
 * reader waits in between. Cancelling ends the stream.
 */
export class ChunkFeed {
  private readonly queue: string[] = [];
  private ended = false;
  private failure?: Error;
  private wake?: () => void;
  cancelCount = 0;

  static of(...chunks: string[]): ChunkFeed {
    const feed = new ChunkFeed();
    chunks.forEach(chunk => feed.push(chunk));
    feed.end();
    return feed;
  }

  push(chunk: string): void {
    this.queue.push(chunk);
    this.notify();
  }

  end(): void {
    this.ended = true;
    this.notify();
  }

  fail(error: Error): void {
    this.failure = error;
    this.notify();
  }

  handle(taskId?: string): StreamHandle {
    return {
      taskId,
      chunks: this.read(),
      cancel: () => {
        this.cancelCount += 1;
        this.end();
      }
    };
  }

  private async *read(): AsyncGenerator<string> {
    while (true) {
      const next = this.queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return;
      }
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}
