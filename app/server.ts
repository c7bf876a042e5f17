import { Elysia, type AnyElysia } from 'elysia';
import { node } from '@elysiajs/node';
import { cors } from '@elysiajs/cors';
import { ApplicationBootstrap } from './bootstrap';
import { TYPES, container } from './core/container';
import type { GatewayConfig } from './core/config';
import type { ILogger } from './core/logging';
import type { IMetricsService } from './core/metrics';
import type { BaseController } from './api/controllers';
import { ErrorPlugin, MetricsPlugin, type RequestTracker } from './api/plugins';

const CONTROLLERS: readonly symbol[] = [
  TYPES.InferenceController,
  TYPES.ModelsController,
  TYPES.ClustersController,
  TYPES.BatchesController,
  TYPES.StreamingRelayController,
  TYPES.AdminMetricsController
];

export class ApplicationServer {
  private readonly bootstrap: ApplicationBootstrap;
  private app?: AnyElysia;
  private logger?: ILogger;

  constructor(bootstrap: ApplicationBootstrap) {
    this.bootstrap = bootstrap;
  }

  async start(): Promise<void> {
    await this.bootstrap.initialize();

    const config = container.get<GatewayConfig>(TYPES.GatewayConfig);
    this.logger = container.get<ILogger>(TYPES.Logger).createChild('ApplicationServer');

    const app = this.createApplication(config);
    this.app = app;

    app.listen({ hostname: config.server.host, port: config.server.port }, () => {
      this.logger?.info('Server started', {
        metadata: { host: config.server.host, port: config.server.port, environment: config.environment }
      });
    });

    this.bootstrap.onShutdown(async () => {
      await this.app?.stop();
      this.logger?.info('HTTP server stopped');
    });
  }

  async stop(): Promise<void> {
    await this.bootstrap.shutdown();
  }

  private createApplication(config: GatewayConfig): AnyElysia {
    const logger = container.get<ILogger>(TYPES.Logger);
    const metrics = container.get<IMetricsService>(TYPES.MetricsService);
    const requestTracker = container.get<RequestTracker>(TYPES.RequestTracker);

    const app = new Elysia({ adapter: node() })
      .use(cors({ origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin.split(',') }))
      .use(requestTracker.createPlugin())
      .use(new ErrorPlugin(logger, metrics, requestTracker).createPlugin())
      .use(new MetricsPlugin(logger, metrics, requestTracker).createPlugin())
      .get('/health', () => ({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime()
      }))
      .get('/metrics', async () => {
        const body = await metrics.getMetricsEndpoint();
        return new Response(body, { headers: { 'Content-Type': metrics.getContentType() } });
      });

    for (const identifier of CONTROLLERS) {
      app.use(container.get<BaseController>(identifier).registerRoutes());
    }

    this.logger?.info('Routes registered', { metadata: { controllers: CONTROLLERS.length } });
    return app;
  }
}
