import { ApplicationBootstrap } from './bootstrap';
import { TYPES, container } from './core/container';
import type { ILogger } from './core/logging';
import type { MetricsIngestionService } from './domain/services/metrics-ingestion';

/**
 * Runs the scheduled jobs without the HTTP server. With `--backfill` it
 * instead requeues historical request logs for metrics ingestion, drains
 * the queue and exits.
 */
async function runWorker(argv: readonly string[]): Promise<void> {
  const backfill = argv.includes('--backfill');
  const bootstrap = new ApplicationBootstrap({ runWorkers: !backfill, handleSignals: !backfill });
  await bootstrap.initialize();

  if (!backfill) {
    return;
  }

  const logger = container.get<ILogger>(TYPES.Logger).createChild('Backfill');
  const ingestion = container.get<MetricsIngestionService>(TYPES.MetricsIngestionService);
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  try {
    const summary = await ingestion.backfill(controller.signal);
    logger.info('Backfill finished', { metadata: { ...summary } });
  } finally {
    await bootstrap.shutdown();
  }
}

if (require.main === module) {
  runWorker(process.argv.slice(2)).catch(error => {
    console.error('Worker failed:', error);
    process.exit(1);
  });
}

export { runWorker };
