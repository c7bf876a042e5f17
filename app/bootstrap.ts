import 'reflect-metadata';
import { container } from './core/container';
import { TYPES } from './core/container/types';
import type { GatewayConfig } from './core/config';
import { toError } from './core/errors';
import type { ILogger } from './core/logging';
import type { DatabaseService } from './infrastructure/database';
import type { EndpointCatalogService } from './domain/services/catalog';
import type { ClusterStatusCache } from './domain/services/cluster-status';
import type { BackgroundWorkerService } from './domain/services/workers';

export interface BootstrapOptions {
  /** Overrides `workers.enabled` from the configuration. */
  readonly runWorkers?: boolean;
  readonly handleSignals?: boolean;
}

type ShutdownHook = () => Promise<void>;

export class ApplicationBootstrap {
  private readonly options: BootstrapOptions;
  private readonly shutdownHooks: ShutdownHook[] = [];
  private logger?: ILogger;
  private databaseService?: DatabaseService;
  private workers?: BackgroundWorkerService;
  private shuttingDown = false;

  constructor(options: BootstrapOptions = {}) {
    this.options = options;
  }

  async initialize(): Promise<void> {
    container.initialize();
    const config = container.get<GatewayConfig>(TYPES.GatewayConfig);
    this.logger = container.get<ILogger>(TYPES.Logger).createChild('Bootstrap');

    this.logger.info('Application bootstrap started', {
      metadata: {
        environment: config.environment,
        nodeVersion: process.version,
        platform: process.platform,
        federationSource: config.federation.configPath ?? 'database'
      }
    });

    await this.initializeDatabase();
    await this.initializeCatalog();
    await this.warmClusterStatus();

    if (this.options.runWorkers ?? config.workers.enabled) {
      this.workers = container.get<BackgroundWorkerService>(TYPES.BackgroundWorkerService);
      this.workers.start();
    }

    if (this.options.handleSignals !== false) {
      this.setupGracefulShutdown();
    }

    this.logger.info('Application bootstrap completed');
  }

  /** Hooks run in reverse registration order, before workers and the database stop. */
  onShutdown(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.logger?.info('Application shutdown initiated');

    for (const hook of [...this.shutdownHooks].reverse()) {
      await hook();
    }

    this.workers?.stop();

    if (this.databaseService) {
      await this.databaseService.disconnect();
    }

    this.logger?.info('Application shutdown completed');
  }

  private async initializeDatabase(): Promise<void> {
    this.databaseService = container.get<DatabaseService>(TYPES.DatabaseService);
    await this.databaseService.connect();
  }

  private async initializeCatalog(): Promise<void> {
    const catalog = container.get<EndpointCatalogService>(TYPES.EndpointCatalogService);
    await catalog.load();
  }

  /** A cluster that cannot be reached now is retried by the refresh job. */
  private async warmClusterStatus(): Promise<void> {
    const statusCache = container.get<ClusterStatusCache>(TYPES.ClusterStatusCache);
    try {
      const summary = await statusCache.refresh();
      this.logger?.info('Initial cluster status loaded', { metadata: { ...summary } });
    } catch (error) {
      this.logger?.warn('Initial cluster status refresh failed', {
        metadata: { error: toError(error).message }
      });
    }
  }

  private setupGracefulShutdown(): void {
    const shutdownHandler = async (signal: string): Promise<void> => {
      this.logger?.info(`Received ${signal}, initiating graceful shutdown`);

      try {
        await this.shutdown();
        process.exit(0);
      } catch (error) {
        this.logger?.error('Error during graceful shutdown', toError(error));
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
    process.on('SIGINT', () => void shutdownHandler('SIGINT'));

    process.on('uncaughtException', error => {
      this.logger?.error('Uncaught exception', error);
      void shutdownHandler('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', reason => {
      this.logger?.error('Unhandled rejection', toError(reason));
    });
  }
}
