import { t } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { InferenceService } from '../../../application/services';
import type { InferenceOutcome } from '../../../application/types';
import { OPENAI_ENDPOINTS, type OpenAIEndpoint } from '../../../domain/entities';
import type { StreamSession } from '../../../domain/services/streaming';
import { REQUEST_ID_HEADER } from '../../plugins';
import { BaseController, type ControllerSupport, type HandlerContext, type RequestContext } from '../base.controller';

/**
 * Only the routing fields are checked here. Everything else in the body is
 * forwarded to the backend as sent, and the surface-specific fields are
 * checked by the inference service.
 */
const InferenceBodySchema = t.Object(
  {
    model: t.String({ minLength: 1 }),
    stream: t.Optional(t.Boolean())
  },
  { additionalProperties: true }
);

const PinnedParamsSchema = t.Object({
  cluster: t.String({ minLength: 1 }),
  framework: t.String({ minLength: 1 })
});

type InferenceBody = typeof InferenceBodySchema.static;

const encoder = new TextEncoder();

@injectable()
export class InferenceController extends BaseController {
  private readonly inferenceService: InferenceService;

  constructor(
    @inject(TYPES.ControllerSupport) support: ControllerSupport,
    @inject(TYPES.InferenceService) inferenceService: InferenceService
  ) {
    super({ prefix: '/v1' }, support);
    this.inferenceService = inferenceService;
  }

  public registerRoutes() {
    const app = this.createApplication();

    for (const openaiEndpoint of OPENAI_ENDPOINTS) {
      app.post(`/${openaiEndpoint}`, context => this.handle(openaiEndpoint, context, context.body), {
        body: InferenceBodySchema
      });

      app.post(
        `/:cluster/:framework/${openaiEndpoint}`,
        context => this.handle(openaiEndpoint, context, context.body, context.params),
        { body: InferenceBodySchema, params: PinnedParamsSchema }
      );
    }

    return app;
  }

  private handle(
    openaiEndpoint: OpenAIEndpoint,
    context: HandlerContext,
    body: InferenceBody,
    pinned?: { cluster: string; framework: string }
  ): Promise<unknown> {
    return this.executeWithContext(`inference:${openaiEndpoint}`, context, async requestContext => {
      const outcome = await this.inferenceService.process({
        identity: requestContext.identity,
        openaiEndpoint,
        payload: body,
        cluster: pinned?.cluster,
        framework: pinned?.framework,
        signal: context.request.signal
      });

      return this.toResponse(outcome, requestContext);
    });
  }

  private toResponse(outcome: InferenceOutcome, requestContext: RequestContext): unknown {
    if (outcome.kind === 'response') {
      return outcome.body;
    }

    this.logger.info('Streaming response opened', {
      requestId: requestContext.requestId,
      userId: requestContext.identity.username,
      metadata: { requestLogId: outcome.requestLogId }
    });

    return new Response(this.createEventStream(outcome.session), {
      headers: {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
        [REQUEST_ID_HEADER]: requestContext.requestId
      }
    });
  }

  /** A client that goes away cancels the session, which also stops the backend. */
  private createEventStream(session: StreamSession): ReadableStream<Uint8Array> {
    const frames = session.frames();

    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        const next = await frames.next();
        if (next.done) {
          controller.close();
          return;
        }
        controller.enqueue(encoder.encode(next.value));
      },
      async cancel() {
        session.cancel();
        await frames.return(undefined);
      }
    });
  }
}
