import type { BatchTaskStatus } from '../../adaptors';
import type { BatchJob, BatchLineResult } from '../../entities';

export type AggregateBatchStatus = 'pending' | 'running' | 'completed';

/**
 * Every line finished (successfully or not) completes the batch. Any line
 * that has started or finished while others remain means running.
 */
export function aggregateBatchStatus(lines: readonly BatchLineResult[]): AggregateBatchStatus {
  if (lines.length > 0 && lines.every(line => line.status === 'success' || line.status === 'failed')) {
    return 'completed';
  }
  if (lines.some(line => line.status !== 'pending')) {
    return 'running';
  }
  return 'pending';
}

/** Lines the backend did not report on keep their previous state. */
export function mergeLineStatuses(batch: BatchJob, statuses: readonly BatchTaskStatus[]): BatchLineResult[] {
  const byTaskId = new Map(statuses.map(status => [status.taskId, status]));
  const previous = new Map(batch.getLines().map(line => [line.taskId, line]));

  return batch.getTaskIds().map((taskId, index): BatchLineResult => {
    const reported = byTaskId.get(taskId);
    if (!reported) {
      return previous.get(taskId) ?? { line: index + 1, taskId, status: 'pending' };
    }
    return {
      line: previous.get(taskId)?.line ?? index + 1,
      taskId,
      status: reported.status,
      result: reported.result,
      error: reported.error
    };
  });
}
