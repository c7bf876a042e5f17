import type { BatchTaskStatus } from '../../app/domain/adaptors';
import { BatchJob, canTransitionBatch, type BatchLineResult } from '../../app/domain/entities';
import { aggregateBatchStatus, mergeLineStatuses } from '../../app/domain/services/batches';

const createdAt = new Date('2026-03-01T12:00:00.000Z');

function newBatch(taskIds: string[] = ['t1', 't2']): BatchJob {
  return BatchJob.submitted(
    { id: 'batch-1', username: 'alice@example.org', createdAt },
    {
      cluster: 'alpha',
      framework: 'vllm',
      model: 'facebook/opt-125m',
      endpointSlug: 'alpha-vllm-facebookopt-125m',
      inputFile: '/data/in.jsonl',
      outputFolder: '/results'
    },
    taskIds
  );
}

describe('BatchJob', () => {
  it('starts pending with one pending line per task', () => {
    const batch = newBatch();

    expect(batch.getStatus()).toBe('pending');
    expect(batch.getLines()).toEqual([
      { line: 1, taskId: 't1', status: 'pending' },
      { line: 2, taskId: 't2', status: 'pending' }
    ]);
  });

  it('only moves forward', () => {
    const batch = newBatch();
    const later = new Date('2026-03-01T13:00:00.000Z');

    expect(batch.markRunning(later)).toBe(true);
    expect(batch.markRunning(later)).toBe(false);
    expect(batch.complete(later, '/results/batch-1.jsonl')).toBe(true);
    expect(batch.fail(later, 'too late', 'execution')).toBe(false);
    expect(batch.markRunning(later)).toBe(false);
    expect(batch.getStatus()).toBe('completed');
    expect(batch.getError()).toBeUndefined();
  });

  it('allows a pending batch to fail directly', () => {
    const batch = newBatch();

    expect(batch.fail(createdAt, 'rejected', 'submission')).toBe(true);
    expect(batch.isTerminal()).toBe(true);
    expect(batch.getErrorKind()).toBe('submission');
  });

  it('parks a cancelled batch in cancelling until its backend work is stopped', () => {
    const batch = newBatch();
    const requested = new Date('2026-03-01T12:30:00.000Z');
    const stopped = new Date('2026-03-01T12:31:00.000Z');

    expect(batch.markCancelled(stopped)).toBe(false);
    expect(batch.requestCancel(requested)).toBe(true);
    expect(batch.isTerminal()).toBe(false);
    expect(batch.markRunning(stopped)).toBe(false);
    expect(batch.complete(stopped, '/results/batch-1.jsonl')).toBe(false);
    expect(batch.markCancelled(stopped)).toBe(true);
    expect(batch.isTerminal()).toBe(true);
    expect(batch.requestCancel(stopped)).toBe(false);
    expect(batch.toSnapshot()).toMatchObject({ status: 'cancelled', cancellingAt: requested, cancelledAt: stopped });
  });

  it('treats the retention deadline itself as expired', () => {
    const batch = newBatch();
    const retentionMs = 1_000;

    expect(batch.retentionDeadline(retentionMs).toISOString()).toBe('2026-03-01T12:00:01.000Z');
    expect(batch.isExpired(new Date(createdAt.getTime() + 999), retentionMs)).toBe(false);
    expect(batch.isExpired(new Date(createdAt.getTime() + 1_000), retentionMs)).toBe(true);
  });

  it('survives a snapshot round trip without sharing state', () => {
    const batch = newBatch();
    const copy = BatchJob.fromSnapshot(batch.toSnapshot());

    copy.markRunning(createdAt);

    expect(copy.getStatus()).toBe('running');
    expect(batch.getStatus()).toBe('pending');
    expect(copy.getTarget()).toEqual(batch.getTarget());
  });

  it('knows which transitions are allowed', () => {
    expect(canTransitionBatch('pending', 'completed')).toBe(true);
    expect(canTransitionBatch('running', 'pending')).toBe(false);
    expect(canTransitionBatch('failed', 'running')).toBe(false);
    expect(canTransitionBatch('running', 'cancelling')).toBe(true);
    expect(canTransitionBatch('completed', 'cancelling')).toBe(false);
    expect(canTransitionBatch('pending', 'cancelled')).toBe(false);
  });
});

describe('batch status helpers', () => {
  const line = (index: number, status: BatchLineResult['status']): BatchLineResult => ({
    line: index,
    taskId: `t${index}`,
    status
  });

  it('aggregates line states', () => {
    expect(aggregateBatchStatus([])).toBe('pending');
    expect(aggregateBatchStatus([line(1, 'pending'), line(2, 'pending')])).toBe('pending');
    expect(aggregateBatchStatus([line(1, 'success'), line(2, 'pending')])).toBe('running');
    expect(aggregateBatchStatus([line(1, 'running'), line(2, 'pending')])).toBe('running');
    expect(aggregateBatchStatus([line(1, 'success'), line(2, 'failed')])).toBe('completed');
  });

  it('merges reported statuses by task id and keeps unreported lines', () => {
    const batch = newBatch(['t1', 't2', 't3']);
    const reported: BatchTaskStatus[] = [
      { taskId: 't3', status: 'failed', error: 'boom' },
      { taskId: 't1', status: 'success', result: '{}' },
      { taskId: 'unknown', status: 'success' }
    ];

    expect(mergeLineStatuses(batch, reported)).toEqual([
      { line: 1, taskId: 't1', status: 'success', result: '{}' },
      { line: 2, taskId: 't2', status: 'pending' },
      { line: 3, taskId: 't3', status: 'failed', error: 'boom' }
    ]);
  });
});
