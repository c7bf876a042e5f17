import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import { ValidationError } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import { BATCH_STATUSES, type BatchJob, type BatchStatus, type UserIdentity } from '../../domain/entities';
import type { BatchJobManager } from '../../domain/services/batches';
import type { BatchListResponse, BatchView, SubmitBatchBody } from '../types';

function isBatchStatus(value: string): value is BatchStatus {
  return BATCH_STATUSES.some(status => status === value);
}

function isoOrNull(value: Date | undefined): string | null {
  return value ? value.toISOString() : null;
}

export function toBatchView(batch: BatchJob): BatchView {
  const snapshot = batch.toSnapshot();
  const failedLines = snapshot.lines.filter(line => line.status === 'failed');

  return {
    id: snapshot.id,
    object: 'batch',
    status: snapshot.status,
    model: snapshot.model,
    cluster: snapshot.cluster,
    framework: snapshot.framework,
    input_file: snapshot.inputFile,
    output_folder_path: snapshot.outputFolder,
    created_at: snapshot.createdAt.toISOString(),
    in_progress_at: isoOrNull(snapshot.inProgressAt),
    completed_at: isoOrNull(snapshot.completedAt),
    failed_at: isoOrNull(snapshot.failedAt),
    cancelling_at: isoOrNull(snapshot.cancellingAt),
    cancelled_at: isoOrNull(snapshot.cancelledAt),
    result_location: snapshot.resultLocation ?? null,
    error: snapshot.error ?? null,
    error_kind: snapshot.errorKind ?? null,
    request_counts: {
      total: snapshot.taskIds.length,
      completed: snapshot.lines.filter(line => line.status === 'success').length,
      failed: failedLines.length
    },
    errors: failedLines.map(line => ({ line: line.line, task_id: line.taskId, error: line.error ?? 'unknown error' }))
  };
}

@injectable()
export class BatchService {
  private readonly logger: ILogger;
  private readonly manager: BatchJobManager;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.BatchJobManager) manager: BatchJobManager
  ) {
    this.logger = logger.createChild('BatchService');
    this.manager = manager;
  }

  async submit(body: SubmitBatchBody, identity: UserIdentity): Promise<BatchView> {
    if ((body.cluster === undefined) !== (body.framework === undefined)) {
      throw new ValidationError('cluster and framework must be given together');
    }

    const batch = await this.manager.submit({
      identity,
      model: body.model,
      inputFile: body.input_file,
      outputFolder: body.output_folder_path,
      cluster: body.cluster,
      framework: body.framework
    });

    this.logger.info('Batch submitted', {
      userId: identity.username,
      metadata: { batchId: batch.getId(), model: body.model, tasks: batch.getTaskIds().length }
    });

    return toBatchView(batch);
  }

  async get(id: string, identity: UserIdentity): Promise<BatchView> {
    return toBatchView(await this.manager.getBatch(id, identity));
  }

  async cancel(id: string, identity: UserIdentity): Promise<BatchView> {
    return toBatchView(await this.manager.cancel(id, identity));
  }

  async list(identity: UserIdentity, status?: string): Promise<BatchListResponse> {
    if (status !== undefined && !isBatchStatus(status)) {
      throw new ValidationError(`Unknown batch status '${status}'`);
    }
    const batches = await this.manager.listBatches(identity, status);
    return { object: 'list', data: batches.map(toBatchView) };
  }
}
