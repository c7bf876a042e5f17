import { t } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { BatchService } from '../../../application/services';
import { BaseController, type ControllerSupport } from '../base.controller';

const SubmitBatchSchema = t.Object({
  model: t.String({ minLength: 1 }),
  input_file: t.String({ minLength: 1 }),
  output_folder_path: t.String({ minLength: 1 }),
  cluster: t.Optional(t.String({ minLength: 1 })),
  framework: t.Optional(t.String({ minLength: 1 }))
});

@injectable()
export class BatchesController extends BaseController {
  private readonly batchService: BatchService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.BatchService) batchService: BatchService
  ) {
    super({ prefix: '/v1/batches' }, support);
    this.batchService = batchService;
  }

  public registerRoutes() {
    return this.createApplication()
      .post(
        '/',
        context =>
          this.executeWithContext('submit_batch', context, requestContext =>
            this.batchService.submit(context.body, requestContext.identity)
          ),
        { body: SubmitBatchSchema }
      )
      .get(
        '/',
        context =>
          this.executeWithContext('list_batches', context, requestContext =>
            this.batchService.list(requestContext.identity, context.query.status)
          ),
        { query: t.Object({ status: t.Optional(t.String()) }) }
      )
      .get(
        '/:id',
        context =>
          this.executeWithContext('get_batch', context, requestContext =>
            this.batchService.get(context.params.id, requestContext.identity)
          ),
        { params: t.Object({ id: t.String({ minLength: 1 }) }) }
      )
      .post(
        '/:id/cancel',
        context =>
          this.executeWithContext('cancel_batch', context, requestContext =>
            this.batchService.cancel(context.params.id, requestContext.identity)
          ),
        { params: t.Object({ id: t.String({ minLength: 1 }) }) }
      );
  }
}
