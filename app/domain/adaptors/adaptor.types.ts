import type { Result } from '../../core/types';
import type {
  BatchJob,
  BatchLineStatus,
  Cluster,
  ClusterJobs,
  Endpoint,
  UserIdentity
} from '../entities';
import type { BatchLineRequest, InferenceRequest } from './inference.types';

export type AdaptorFailureKind =
  | 'timeout'
  | 'network'
  | 'remote'
  | 'unavailable'
  | 'unsupported'
  | 'cancelled'
  | 'internal';

export interface AdaptorFailure {
  readonly message: string;
  readonly code: number;
  readonly kind: AdaptorFailureKind;
}

export interface TaskContext {
  readonly requestLogId: string;
  readonly username: string;
  readonly signal: AbortSignal;
  readonly timeoutMs: number;
}

export interface TaskSuccess {
  readonly result: string;
  readonly taskId?: string;
}

export type TaskResult = Result<TaskSuccess, AdaptorFailure>;

/**
 * Each chunk is the JSON payload of one streaming event, without SSE framing
 * and without the terminal `[DONE]` marker.
 */
export interface StreamHandle {
  readonly taskId?: string;
  readonly chunks: AsyncIterable<string>;
  cancel(): void;
}

export type StreamResult = Result<StreamHandle, AdaptorFailure>;

export interface BatchSubmitRequest {
  readonly batchId: string;
  readonly inputFile: string;
  readonly outputFolder: string;
  readonly lines: readonly BatchLineRequest[];
}

export interface BatchSubmission {
  readonly taskIds: readonly string[];
}

export interface BatchTaskStatus {
  readonly taskId: string;
  readonly status: BatchLineStatus;
  readonly result?: string;
  readonly error?: string;
}

export interface BatchCancellation {
  readonly cancelledTasks: number;
}

export type BatchSubmitResult = Result<BatchSubmission, AdaptorFailure>;
export type BatchStatusResult = Result<readonly BatchTaskStatus[], AdaptorFailure>;
export type BatchCancelResult = Result<BatchCancellation, AdaptorFailure>;
export type ClusterJobsResult = Result<ClusterJobs, AdaptorFailure>;

export interface EndpointAdaptor {
  readonly endpoint: Endpoint;
  submitTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult>;
  submitStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult>;
  hasBatchEnabled(): boolean;
  submitBatch(request: BatchSubmitRequest, user: UserIdentity): Promise<BatchSubmitResult>;
  getBatchStatus(batch: BatchJob, signal: AbortSignal): Promise<BatchStatusResult>;
  /** Stops the backend tasks of a batch. An `unsupported` failure means there is nothing to stop. */
  cancelBatch(batch: BatchJob, signal: AbortSignal): Promise<BatchCancelResult>;
}

export interface ClusterAdaptor {
  readonly cluster: Cluster;
  hasJobStatus(): boolean;
  getJobs(signal: AbortSignal): Promise<ClusterJobsResult>;
}

/**
 * Push-based channel for backends that cannot hold a connection open to the
 * gateway. The remote side posts chunks to `callbackUrl` tagged with the
 * channel id; the gateway reads them from `chunks`.
 */
export interface RelayChannel {
  readonly id: string;
  readonly chunks: AsyncIterable<string>;
  close(): void;
}

export interface StreamRelay {
  readonly callbackUrl: string;
  openChannel(): RelayChannel;
}
