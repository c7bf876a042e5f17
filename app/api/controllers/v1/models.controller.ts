import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ModelsService } from '../../../application/services';
import { BaseController, type ControllerSupport } from '../base.controller';

@injectable()
export class ModelsController extends BaseController {
  private readonly modelsService: ModelsService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.ModelsService) modelsService: ModelsService
  ) {
    super({ prefix: '/v1' }, support);
    this.modelsService = modelsService;
  }

  public registerRoutes() {
    return this.createApplication().get('/models', context =>
      this.executeWithContext('list_models', context, async requestContext => {
        const models = this.modelsService.listModels(requestContext.identity);

        this.logger.debug('Models list retrieved', {
          requestId: requestContext.requestId,
          userId: requestContext.identity.username,
          metadata: { modelCount: models.data.length }
        });

        return models;
      })
    );
  }
}
