export type GatewayErrorType =
  | 'adaptor_error'
  | 'routing_error'
  | 'authentication_error'
  | 'permission_error'
  | 'batch_expired'
  | 'configuration_error'
  | 'capacity_exceeded'
  | 'invalid_request_error'
  | 'not_found_error'
  | 'server_error';

export abstract class GatewayError extends Error {
  abstract readonly statusCode: number;
  abstract readonly type: GatewayErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AdaptorError extends GatewayError {
  readonly type = 'adaptor_error';
  readonly statusCode: number;

  constructor(message: string, statusCode: number = 502, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

export interface TargetFailure {
  readonly endpointSlug: string;
  readonly message: string;
  readonly code: number;
}

export class RoutingError extends GatewayError {
  readonly type = 'routing_error';
  readonly statusCode: number;
  readonly failures: readonly TargetFailure[];

  constructor(message: string, failures: readonly TargetFailure[], statusCode: number = 503) {
    super(message);
    this.failures = failures;
    this.statusCode = statusCode;
  }

  static fromFailures(model: string, failures: readonly TargetFailure[]): RoutingError {
    const summary = failures
      .map(failure => `${failure.endpointSlug}: ${failure.message} (${failure.code})`)
      .join('; ');

    const codes = new Set(failures.map(failure => failure.code));
    const [sharedCode] = codes;
    const statusCode = codes.size === 1 && sharedCode >= 400 && sharedCode < 500 ? sharedCode : 503;

    return new RoutingError(
      `All ${failures.length} target(s) failed for model '${model}': ${summary}`,
      failures,
      statusCode
    );
  }
}

export class AuthError extends GatewayError {
  readonly type: GatewayErrorType;
  readonly statusCode: number;

  constructor(message: string, statusCode: 401 | 403 = 401) {
    super(message);
    this.statusCode = statusCode;
    this.type = statusCode === 401 ? 'authentication_error' : 'permission_error';
  }
}

export class BatchExpiryError extends GatewayError {
  readonly type = 'batch_expired';
  readonly statusCode = 410;
  readonly batchId: string;
  readonly deadline: Date;

  constructor(batchId: string, deadline: Date) {
    super(`Batch ${batchId} did not reach a terminal status before results expired at ${deadline.toISOString()}`);
    this.batchId = batchId;
    this.deadline = deadline;
  }
}

export class ConfigError extends GatewayError {
  readonly type = 'configuration_error';
  readonly statusCode = 500;
}

export class CapacityExceededError extends GatewayError {
  readonly type = 'capacity_exceeded';
  readonly statusCode = 429;
}

export class ValidationError extends GatewayError {
  readonly type = 'invalid_request_error';
  readonly statusCode = 400;
}

export class NotFoundError extends GatewayError {
  readonly type = 'not_found_error';
  readonly statusCode = 404;
}

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}
