import { t } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { AuthError, GatewayError } from '../../../core/errors';
import type { StreamRelayService } from '../../../domain/services/streaming';
import { INTERNAL_SECRET_HEADER } from '../../../domain/services/streaming';
import { BaseController, type ControllerSupport, type HandlerContext } from '../base.controller';

/** The relay channel is gone: the task finished, timed out or was cancelled. */
export class ChannelClosedError extends GatewayError {
  readonly type = 'not_found_error';
  readonly statusCode = 410;
}

const DataSchema = t.Object({ task_id: t.String({ minLength: 1 }), data: t.String() });
const ErrorSchema = t.Object({ task_id: t.String({ minLength: 1 }), error: t.String() });
const DoneSchema = t.Object({ task_id: t.String({ minLength: 1 }) });

interface RelayAck {
  status: 'ok';
}

/**
 * Receives the output that remote functions push back during a streaming
 * task. Callers present the shared internal secret instead of a user token.
 */
@injectable()
export class StreamingRelayController extends BaseController {
  private readonly relay: StreamRelayService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.StreamRelayService) relay: StreamRelayService
  ) {
    super({ prefix: '/internal/streaming' }, support);
    this.relay = relay;
  }

  public registerRoutes() {
    return this.createApplication()
      .post(
        '/data',
        context => this.accept(context, context.body.task_id, () => this.relay.pushData(context.body.task_id, context.body.data)),
        { body: DataSchema }
      )
      .post(
        '/error',
        context => this.accept(context, context.body.task_id, () => this.relay.pushError(context.body.task_id, context.body.error)),
        { body: ErrorSchema }
      )
      .post(
        '/done',
        context => this.accept(context, context.body.task_id, () => this.relay.complete(context.body.task_id)),
        { body: DoneSchema }
      );
  }

  private accept(context: HandlerContext, channelId: string, push: () => boolean): RelayAck {
    if (!this.relay.verifySecret(context.headers[INTERNAL_SECRET_HEADER])) {
      throw new AuthError('Invalid internal streaming secret');
    }

    if (!push()) {
      throw new ChannelClosedError(`Streaming channel ${channelId} is closed`);
    }

    return { status: 'ok' };
  }
}
