export type BatchStatus = 'pending' | 'running' | 'cancelling' | 'completed' | 'failed' | 'cancelled';

export const BATCH_STATUSES: readonly BatchStatus[] = ['pending', 'running', 'cancelling', 'completed', 'failed', 'cancelled'];

/** Statuses that still hold a quota slot and block reuse of their input file. */
export const NON_TERMINAL_BATCH_STATUSES: readonly BatchStatus[] = ['pending', 'running', 'cancelling'];

/** Statuses the poller asks the backend about. */
export const POLLABLE_BATCH_STATUSES: readonly BatchStatus[] = ['pending', 'running'];

export type BatchLineStatus = 'pending' | 'running' | 'success' | 'failed';

export type BatchErrorKind = 'expired' | 'execution' | 'submission';

export interface BatchLineResult {
  readonly line: number;
  readonly taskId: string;
  readonly status: BatchLineStatus;
  readonly result?: string;
  readonly error?: string;
}

export interface BatchJobIdentity {
  readonly id: string;
  readonly username: string;
  readonly createdAt: Date;
}

export interface BatchJobTarget {
  readonly cluster: string;
  readonly framework: string;
  readonly model: string;
  readonly endpointSlug: string;
  readonly inputFile: string;
  readonly outputFolder: string;
}

export interface BatchJobState {
  status: BatchStatus;
  taskIds: string[];
  lines: BatchLineResult[];
  inProgressAt?: Date;
  completedAt?: Date;
  failedAt?: Date;
  cancellingAt?: Date;
  cancelledAt?: Date;
  error?: string;
  errorKind?: BatchErrorKind;
  resultLocation?: string;
  metricsProcessed: boolean;
}

export interface BatchJobSnapshot extends BatchJobIdentity, BatchJobTarget, BatchJobState {}

const ALLOWED_TRANSITIONS: Readonly<Record<BatchStatus, readonly BatchStatus[]>> = {
  pending: ['running', 'cancelling', 'completed', 'failed'],
  running: ['cancelling', 'completed', 'failed'],
  cancelling: ['cancelled'],
  completed: [],
  failed: [],
  cancelled: []
};

export function isTerminalBatchStatus(status: BatchStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

export function canTransitionBatch(from: BatchStatus, to: BatchStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Batch lifecycle. Status only moves forward: pending to running to a
 * terminal status, and a terminal status is final. A cancel request parks
 * the batch in `cancelling` until the backend work has been stopped.
 */
export class BatchJob {
  private readonly identity: BatchJobIdentity;
  private readonly target: BatchJobTarget;
  private readonly state: BatchJobState;

  constructor(identity: BatchJobIdentity, target: BatchJobTarget, state: BatchJobState) {
    this.identity = identity;
    this.target = target;
    this.state = state;
  }

  static submitted(identity: BatchJobIdentity, target: BatchJobTarget, taskIds: readonly string[]): BatchJob {
    return new BatchJob(identity, target, {
      status: 'pending',
      taskIds: [...taskIds],
      lines: taskIds.map((taskId, index) => ({ line: index + 1, taskId, status: 'pending' })),
      metricsProcessed: false
    });
  }

  static fromSnapshot(snapshot: BatchJobSnapshot): BatchJob {
    return new BatchJob(
      { id: snapshot.id, username: snapshot.username, createdAt: snapshot.createdAt },
      {
        cluster: snapshot.cluster,
        framework: snapshot.framework,
        model: snapshot.model,
        endpointSlug: snapshot.endpointSlug,
        inputFile: snapshot.inputFile,
        outputFolder: snapshot.outputFolder
      },
      {
        status: snapshot.status,
        taskIds: [...snapshot.taskIds],
        lines: [...snapshot.lines],
        inProgressAt: snapshot.inProgressAt,
        completedAt: snapshot.completedAt,
        failedAt: snapshot.failedAt,
        cancellingAt: snapshot.cancellingAt,
        cancelledAt: snapshot.cancelledAt,
        error: snapshot.error,
        errorKind: snapshot.errorKind,
        resultLocation: snapshot.resultLocation,
        metricsProcessed: snapshot.metricsProcessed
      }
    );
  }

  getId(): string {
    return this.identity.id;
  }

  getUsername(): string {
    return this.identity.username;
  }

  getCreatedAt(): Date {
    return this.identity.createdAt;
  }

  getStatus(): BatchStatus {
    return this.state.status;
  }

  getTaskIds(): readonly string[] {
    return this.state.taskIds;
  }

  getLines(): readonly BatchLineResult[] {
    return this.state.lines;
  }

  getTarget(): BatchJobTarget {
    return { ...this.target };
  }

  getError(): string | undefined {
    return this.state.error;
  }

  getErrorKind(): BatchErrorKind | undefined {
    return this.state.errorKind;
  }

  getResultLocation(): string | undefined {
    return this.state.resultLocation;
  }

  isTerminal(): boolean {
    return isTerminalBatchStatus(this.state.status);
  }

  retentionDeadline(retentionMs: number): Date {
    return new Date(this.identity.createdAt.getTime() + retentionMs);
  }

  /** The deadline itself counts as expired. */
  isExpired(now: Date, retentionMs: number): boolean {
    return now.getTime() >= this.retentionDeadline(retentionMs).getTime();
  }

  recordLines(lines: readonly BatchLineResult[]): void {
    this.state.lines = [...lines].sort((a, b) => a.line - b.line);
  }

  markRunning(at: Date): boolean {
    if (this.state.status === 'running') {
      return false;
    }
    if (!canTransitionBatch(this.state.status, 'running')) {
      return false;
    }
    this.state.status = 'running';
    this.state.inProgressAt = at;
    return true;
  }

  complete(at: Date, resultLocation?: string): boolean {
    if (!canTransitionBatch(this.state.status, 'completed')) {
      return false;
    }
    this.state.status = 'completed';
    this.state.completedAt = at;
    this.state.resultLocation = resultLocation;
    return true;
  }

  fail(at: Date, message: string, kind: BatchErrorKind): boolean {
    if (!canTransitionBatch(this.state.status, 'failed')) {
      return false;
    }
    this.state.status = 'failed';
    this.state.failedAt = at;
    this.state.error = message;
    this.state.errorKind = kind;
    return true;
  }

  requestCancel(at: Date): boolean {
    if (!canTransitionBatch(this.state.status, 'cancelling')) {
      return false;
    }
    this.state.status = 'cancelling';
    this.state.cancellingAt = at;
    return true;
  }

  markCancelled(at: Date): boolean {
    if (!canTransitionBatch(this.state.status, 'cancelled')) {
      return false;
    }
    this.state.status = 'cancelled';
    this.state.cancelledAt = at;
    return true;
  }

  markMetricsProcessed(): void {
    this.state.metricsProcessed = true;
  }

  failedLineCount(): number {
    return this.state.lines.filter(line => line.status === 'failed').length;
  }

  toSnapshot(): BatchJobSnapshot {
    return {
      ...this.identity,
      ...this.target,
      ...this.state,
      taskIds: [...this.state.taskIds],
      lines: [...this.state.lines]
    };
  }
}
