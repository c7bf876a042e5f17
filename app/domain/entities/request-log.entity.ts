import type { OpenAIEndpoint } from './endpoint.entity';

export interface RequestLogIdentity {
  readonly id: string;
  readonly username: string;
  readonly name: string;
  readonly timestampReceive: Date;
}

export interface RequestLogRoute {
  cluster: string;
  framework: string;
  model: string;
  readonly openaiEndpoint: OpenAIEndpoint;
  endpointSlug?: string;
  readonly federated: boolean;
  readonly streaming: boolean;
}

export interface RequestLogOutcome {
  statusCode?: number;
  prompt?: string;
  result?: string;
  taskId?: string;
  attempts: number;
  timestampBackendRequest?: Date;
  timestampBackendResponse?: Date;
  metricsProcessed: boolean | null;
}

export interface RequestLogSnapshot extends RequestLogIdentity, RequestLogRoute, RequestLogOutcome {}

export class RequestLog {
  private readonly identity: RequestLogIdentity;
  private readonly route: RequestLogRoute;
  private readonly outcome: RequestLogOutcome;

  constructor(identity: RequestLogIdentity, route: RequestLogRoute, outcome: RequestLogOutcome) {
    this.identity = identity;
    this.route = route;
    this.outcome = outcome;
  }

  static fromSnapshot(snapshot: RequestLogSnapshot): RequestLog {
    return new RequestLog(
      {
        id: snapshot.id,
        username: snapshot.username,
        name: snapshot.name,
        timestampReceive: snapshot.timestampReceive
      },
      {
        cluster: snapshot.cluster,
        framework: snapshot.framework,
        model: snapshot.model,
        openaiEndpoint: snapshot.openaiEndpoint,
        endpointSlug: snapshot.endpointSlug,
        federated: snapshot.federated,
        streaming: snapshot.streaming
      },
      {
        statusCode: snapshot.statusCode,
        prompt: snapshot.prompt,
        result: snapshot.result,
        taskId: snapshot.taskId,
        attempts: snapshot.attempts,
        timestampBackendRequest: snapshot.timestampBackendRequest,
        timestampBackendResponse: snapshot.timestampBackendResponse,
        metricsProcessed: snapshot.metricsProcessed
      }
    );
  }

  getId(): string {
    return this.identity.id;
  }

  getUsername(): string {
    return this.identity.username;
  }

  getModel(): string {
    return this.route.model;
  }

  getEndpointSlug(): string | undefined {
    return this.route.endpointSlug;
  }

  getStatusCode(): number | undefined {
    return this.outcome.statusCode;
  }

  getResult(): string | undefined {
    return this.outcome.result;
  }

  isStreaming(): boolean {
    return this.route.streaming;
  }

  isMetricsProcessed(): boolean | null {
    return this.outcome.metricsProcessed;
  }

  assignTarget(target: { cluster: string; framework: string; model: string; endpointSlug: string }, attempts: number): void {
    this.route.cluster = target.cluster;
    this.route.framework = target.framework;
    this.route.model = target.model;
    this.route.endpointSlug = target.endpointSlug;
    this.outcome.attempts = attempts;
  }

  markBackendRequest(at: Date): void {
    this.outcome.timestampBackendRequest = at;
  }

  /**
   * A non-empty result makes the row visible to metrics ingestion; rows
   * without one stay out of the queue entirely.
   */
  complete(statusCode: number, result: string, at: Date, taskId?: string): void {
    this.outcome.statusCode = statusCode;
    this.outcome.result = result;
    this.outcome.timestampBackendResponse = at;
    this.outcome.taskId = taskId ?? this.outcome.taskId;
    this.outcome.metricsProcessed = result.length > 0 ? false : null;
  }

  fail(statusCode: number, message: string, at: Date): void {
    this.outcome.statusCode = statusCode;
    this.outcome.result = message;
    this.outcome.timestampBackendResponse = at;
    this.outcome.metricsProcessed = null;
  }

  toSnapshot(): RequestLogSnapshot {
    return { ...this.identity, ...this.route, ...this.outcome };
  }
}
