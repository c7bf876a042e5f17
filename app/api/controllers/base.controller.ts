import { Elysia, type AnyElysia } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import { GatewayError, toError } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { UserIdentity } from '../../domain/entities';
import type { AuthenticationService, AuthorizationService } from '../../domain/services/auth';
import type { RequestTracker } from '../plugins';

export interface RequestContext {
  readonly requestId: string;
  readonly startTime: number;
  readonly identity: UserIdentity;
}

export interface ControllerConfiguration {
  readonly prefix: string;
  readonly requireAdmin?: boolean;
}

/** The slice of an Elysia handler context the controllers read. */
export interface HandlerContext {
  readonly request: Request;
  readonly headers: Record<string, string | undefined>;
}

/** Services every controller needs, resolved once and shared. */
@injectable()
export class ControllerSupport {
  readonly logger: ILogger;
  readonly metrics: IMetricsService;
  readonly authentication: AuthenticationService;
  readonly authorization: AuthorizationService;
  readonly requestTracker: RequestTracker;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metrics: IMetricsService,
    @inject(TYPES.AuthenticationService) authentication: AuthenticationService,
    @inject(TYPES.AuthorizationService) authorization: AuthorizationService,
    @inject(TYPES.RequestTracker) requestTracker: RequestTracker
  ) {
    this.logger = logger;
    this.metrics = metrics;
    this.authentication = authentication;
    this.authorization = authorization;
    this.requestTracker = requestTracker;
  }
}

@injectable()
export abstract class BaseController {
  protected readonly logger: ILogger;
  protected readonly support: ControllerSupport;
  protected readonly configuration: ControllerConfiguration;

  constructor(configuration: ControllerConfiguration, support: ControllerSupport) {
    this.configuration = configuration;
    this.support = support;
    this.logger = support.logger.createChild(this.constructor.name);

    this.validateConfiguration();
  }

  protected createApplication() {
    return new Elysia({ prefix: this.configuration.prefix });
  }

  protected async executeWithContext<T>(
    operation: string,
    context: HandlerContext,
    handler: (requestContext: RequestContext) => Promise<T>
  ): Promise<T> {
    const requestContext = await this.createRequestContext(context);

    this.logger.debug(`${operation} operation initiated`, {
      requestId: requestContext.requestId,
      userId: requestContext.identity.username,
      metadata: { operation }
    });

    try {
      const result = await handler(requestContext);

      this.logger.info(`${operation} operation completed`, {
        requestId: requestContext.requestId,
        userId: requestContext.identity.username,
        duration: Date.now() - requestContext.startTime,
        metadata: { operation }
      });

      return result;
    } catch (error) {
      this.logOperationError(operation, toError(error), requestContext);
      throw error;
    }
  }

  private async createRequestContext(context: HandlerContext): Promise<RequestContext> {
    const { requestId, startTime } = this.support.requestTracker.track(context.request);

    let identity: UserIdentity;
    try {
      identity = await this.support.authentication.authenticate(context.headers.authorization);
    } catch (error) {
      this.logger.warn('Authentication failed', {
        requestId,
        metadata: { controller: this.constructor.name, error: toError(error).message }
      });
      throw error;
    }

    if (this.configuration.requireAdmin) {
      this.support.authorization.assertAdmin(identity);
    }

    return { requestId, startTime, identity };
  }

  private logOperationError(operation: string, error: Error, context: RequestContext): void {
    const metadata = {
      controller: this.constructor.name,
      operation,
      errorType: error.name
    };

    if (error instanceof GatewayError && error.statusCode < 500) {
      this.logger.warn(`${operation} operation rejected: ${error.message}`, {
        requestId: context.requestId,
        userId: context.identity.username,
        metadata
      });
      return;
    }

    this.logger.error(`${operation} operation failed`, error, {
      requestId: context.requestId,
      userId: context.identity.username,
      duration: Date.now() - context.startTime,
      metadata
    });
  }

  private validateConfiguration(): void {
    if (!this.configuration.prefix.startsWith('/')) {
      throw new Error('Controller prefix must start with "/"');
    }
  }

  public abstract registerRoutes(): AnyElysia;
}
