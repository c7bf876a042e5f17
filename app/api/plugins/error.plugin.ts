import { Elysia } from 'elysia';
import { GatewayError, toError, type GatewayErrorType } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { RequestTracker } from './request-tracker.plugin';

export interface ErrorResponse {
  error: {
    message: string;
    type: GatewayErrorType;
    code: number;
    request_id: string;
    details?: string;
  };
}

interface MappedError {
  readonly status: number;
  readonly body: Omit<ErrorResponse['error'], 'request_id'>;
}

/**
 * Turns anything thrown by a handler into an OpenAI-style error body.
 * Gateway errors keep their status and message; anything unexpected is
 * reported as a generic 500.
 */
export class ErrorPlugin {
  private readonly pluginName = 'error';
  private readonly logger: ILogger;
  private readonly metrics: IMetricsService;
  private readonly requestTracker: RequestTracker;

  constructor(logger: ILogger, metrics: IMetricsService, requestTracker: RequestTracker) {
    this.logger = logger.createChild('ErrorPlugin');
    this.metrics = metrics;
    this.requestTracker = requestTracker;
  }

  createPlugin() {
    return new Elysia({ name: this.pluginName }).onError({ as: 'global' }, ({ error, code, set, request }) => {
      const { requestId } = this.requestTracker.track(request);
      const mapped = this.mapError(error, String(code));

      set.status = mapped.status;
      this.report(error, mapped, request, requestId);

      const response: ErrorResponse = { error: { ...mapped.body, request_id: requestId } };
      return response;
    });
  }

  mapError(error: unknown, code: string): MappedError {
    if (error instanceof GatewayError) {
      return {
        status: error.statusCode,
        body: { message: error.message, type: error.type, code: error.statusCode }
      };
    }

    switch (code) {
      case 'VALIDATION':
        return {
          status: 400,
          body: { message: 'Validation failed', type: 'invalid_request_error', code: 400, details: toError(error).message }
        };

      case 'PARSE':
        return { status: 400, body: { message: 'Invalid request format', type: 'invalid_request_error', code: 400 } };

      case 'NOT_FOUND':
        return { status: 404, body: { message: 'Resource not found', type: 'not_found_error', code: 404 } };

      default:
        return { status: 500, body: { message: 'Internal server error', type: 'server_error', code: 500 } };
    }
  }

  private report(error: unknown, mapped: MappedError, request: Request, requestId: string): void {
    const path = new URL(request.url).pathname;
    this.metrics.recordError(mapped.body.type, path);

    const context = {
      requestId,
      metadata: { method: request.method, path, status: mapped.status }
    };

    if (mapped.status >= 500) {
      this.logger.error('Request failed', toError(error), context);
    } else {
      this.logger.warn(`Request rejected: ${mapped.body.message}`, context);
    }
  }
}
