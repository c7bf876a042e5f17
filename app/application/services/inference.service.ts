import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import { GatewayError, ValidationError, errorMessage } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { InferencePayload, InferenceRequest } from '../../domain/adaptors';
import type { OpenAIEndpoint, RequestLog } from '../../domain/entities';
import type { RequestLogService } from '../../domain/services/request-log';
import type { FederatedRouter, RouteRequest } from '../../domain/services/routing';
import type { StreamProxyService } from '../../domain/services/streaming';
import type { InferenceCommand, InferenceOutcome } from '../types';

function requirePromptField(openaiEndpoint: OpenAIEndpoint, payload: InferencePayload): void {
  if (openaiEndpoint === 'chat/completions') {
    if (!Array.isArray(payload.messages) || payload.messages.length === 0) {
      throw new ValidationError('messages must be a non-empty array');
    }
    return;
  }

  if (openaiEndpoint === 'completions' && payload.prompt === undefined) {
    throw new ValidationError('prompt is required');
  }

  if (openaiEndpoint === 'embeddings') {
    if (payload.input === undefined) {
      throw new ValidationError('input is required');
    }
    if (payload.stream === true) {
      throw new ValidationError('Embeddings cannot be streamed');
    }
  }
}

/** Backends answer with JSON text; anything else is passed through as a string. */
function parseBody(result: string): unknown {
  try {
    return JSON.parse(result);
  } catch {
    return result;
  }
}

@injectable()
export class InferenceService {
  private readonly logger: ILogger;
  private readonly router: FederatedRouter;
  private readonly streamProxy: StreamProxyService;
  private readonly requestLogs: RequestLogService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.FederatedRouter) router: FederatedRouter,
    @inject(TYPES.StreamProxyService) streamProxy: StreamProxyService,
    @inject(TYPES.RequestLogService) requestLogs: RequestLogService
  ) {
    this.logger = logger.createChild('InferenceService');
    this.router = router;
    this.streamProxy = streamProxy;
    this.requestLogs = requestLogs;
  }

  async process(command: InferenceCommand): Promise<InferenceOutcome> {
    const { identity, openaiEndpoint, payload } = command;
    if (typeof payload.model !== 'string' || payload.model.length === 0) {
      throw new ValidationError('model is required');
    }
    requirePromptField(openaiEndpoint, payload);

    const streaming = payload.stream === true;
    const pinned = command.cluster !== undefined && command.framework !== undefined;
    const log = this.requestLogs.start({
      identity,
      model: payload.model,
      openaiEndpoint,
      payload,
      federated: !pinned,
      streaming,
      cluster: command.cluster,
      framework: command.framework
    });

    const route: RouteRequest = {
      model: payload.model,
      openaiEndpoint,
      identity,
      cluster: command.cluster,
      framework: command.framework
    };
    const inference: InferenceRequest = { openaiEndpoint, payload };

    this.logger.debug('Inference request received', {
      requestId: log.getId(),
      userId: identity.username,
      metadata: { model: payload.model, openaiEndpoint, streaming, pinned }
    });

    if (streaming) {
      const session = await this.streamProxy.open({ route, inference, log, signal: command.signal });
      return { kind: 'stream', requestLogId: log.getId(), session };
    }

    return this.complete(route, inference, log, command.signal);
  }

  private async complete(
    route: RouteRequest,
    inference: InferenceRequest,
    log: RequestLog,
    signal?: AbortSignal
  ): Promise<InferenceOutcome> {
    log.markBackendRequest(new Date());

    try {
      const routed = await this.router.routeTask(route, inference, { requestLogId: log.getId(), signal });
      const { endpoint } = routed.candidate;

      log.assignTarget(
        { cluster: endpoint.cluster, framework: endpoint.framework, model: endpoint.model, endpointSlug: endpoint.slug },
        routed.attempts
      );
      log.complete(200, routed.value.result, new Date(), routed.value.taskId);
      await this.requestLogs.save(log);

      return {
        kind: 'response',
        requestLogId: log.getId(),
        endpointSlug: endpoint.slug,
        body: parseBody(routed.value.result)
      };
    } catch (error) {
      const statusCode = error instanceof GatewayError ? error.statusCode : 500;
      log.fail(statusCode, errorMessage(error), new Date());
      await this.requestLogs.save(log);
      throw error;
    }
  }
}
