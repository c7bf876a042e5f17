import type { RefreshSummary } from '../../app/domain/services/cluster-status';
import { BackgroundWorkerService } from '../../app/domain/services/workers';
import { MetricsIngestionService } from '../../app/domain/services/metrics-ingestion';
import { deferred } from '../support/config';
import { ALPHA, MODEL } from '../support/federation';
import { ALICE } from '../support/identities';
import { createHarness } from '../support/harness';
import {
  InMemoryBatchMetricsRepository,
  InMemoryRequestMetricsRepository
} from '../support/repositories';

function setup() {
  const harness = createHarness();
  const ingestion = new MetricsIngestionService(
    harness.config,
    harness.logger,
    harness.requestLogRepository,
    new InMemoryRequestMetricsRepository(),
    new InMemoryBatchMetricsRepository(),
    harness.batchRepository,
    harness.cryptoService,
    harness.metrics
  );
  const worker = new BackgroundWorkerService(harness.config, harness.logger, harness.statusCache, harness.batchManager, ingestion);
  return { harness, worker };
}

describe('BackgroundWorkerService', () => {
  it('skips a tick while the previous run of the same job is in flight', async () => {
    const { harness, worker } = setup();
    const gate = deferred<RefreshSummary>();
    const refresh = jest.spyOn(harness.statusCache, 'refresh').mockReturnValue(gate.promise);

    const first = worker.runJob('cluster-status');
    expect(worker.isRunning('cluster-status')).toBe(true);
    expect(await worker.runJob('cluster-status')).toBe(false);
    expect(await worker.runJob('batch-poll')).toBe(true);

    gate.resolve({ refreshed: [], failed: [] });
    expect(await first).toBe(true);
    expect(worker.isRunning('cluster-status')).toBe(false);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('logs a failing job and runs it again on the next tick', async () => {
    const { harness, worker } = setup();
    const refresh = jest
      .spyOn(harness.statusCache, 'refresh')
      .mockRejectedValueOnce(new Error('catalog unavailable'))
      .mockResolvedValueOnce({ refreshed: [], failed: [] });

    expect(await worker.runJob('cluster-status')).toBe(true);
    expect(harness.logger.messages('error')).toEqual(['Background job failed']);
    expect(await worker.runJob('cluster-status')).toBe(true);
    expect(refresh).toHaveBeenCalledTimes(2);
  });

  it('runs metrics ingestion as a job', async () => {
    const { worker, harness } = setup();

    expect(await worker.runJob('metrics-ingestion')).toBe(true);
    expect(harness.metrics.ingestionLag).toEqual({ unprocessed: 0, oldestAgeSeconds: 0 });
  });

  it('runs the batch cancellation pass as a job', async () => {
    const { worker, harness } = setup();
    harness.files.inputs.set('/data/in.jsonl', [{ line: 1, openaiEndpoint: 'chat/completions', payload: { model: MODEL } }]);
    await harness.batchManager.submit({ identity: ALICE, model: MODEL, inputFile: '/data/in.jsonl', outputFolder: '/results' });
    await harness.batchManager.cancel('id-1', ALICE);

    expect(await worker.runJob('batch-cancel')).toBe(true);

    expect(harness.endpoint(ALPHA).cancelledBatches).toEqual(['id-1']);
    expect((await harness.batchRepository.findById('id-1'))?.getStatus()).toBe('cancelled');
    expect(await harness.quota.activeCount(ALICE.username)).toBe(0);
  });
});
