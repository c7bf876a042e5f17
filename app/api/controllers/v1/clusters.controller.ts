import { t } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ModelsService } from '../../../application/services';
import { BaseController, type ControllerSupport } from '../base.controller';

@injectable()
export class ClustersController extends BaseController {
  private readonly modelsService: ModelsService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.ModelsService) modelsService: ModelsService
  ) {
    super({ prefix: '/v1/clusters' }, support);
    this.modelsService = modelsService;
  }

  public registerRoutes() {
    return this.createApplication().get(
      '/:cluster/jobs',
      context =>
        this.executeWithContext('cluster_jobs', context, async requestContext =>
          this.modelsService.getClusterJobs(context.params.cluster, requestContext.identity)
        ),
      { params: t.Object({ cluster: t.String({ minLength: 1 }) }) }
    );
  }
}
