import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { MetricsIngestionService } from '../../../domain/services/metrics-ingestion';
import { BaseController, type ControllerSupport } from '../base.controller';

@injectable()
export class AdminMetricsController extends BaseController {
  private readonly ingestion: MetricsIngestionService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.MetricsIngestionService) ingestion: MetricsIngestionService
  ) {
    super({ prefix: '/admin/metrics', requireAdmin: true }, support);
    this.ingestion = ingestion;
  }

  public registerRoutes() {
    return this.createApplication()
      .get('/lag', context => this.executeWithContext('metrics_lag', context, () => this.ingestion.getLag()))
      .post('/backfill', context =>
        this.executeWithContext('metrics_backfill', context, async requestContext => {
          const summary = await this.ingestion.backfill(context.request.signal);

          this.logger.info('Metrics backfill finished', {
            requestId: requestContext.requestId,
            userId: requestContext.identity.username,
            metadata: { ...summary }
          });

          return summary;
        })
      );
  }
}
