import { Type, type Static } from '@sinclair/typebox';
import { ConfigError } from '../../../core/errors';
import { fail, ok, type Result } from '../../../core/types';
import { createLinkedController } from '../../../core/utils';
import type {
  AdaptorFailure,
  InferenceRequest,
  StreamResult,
  TaskContext,
  TaskResult
} from '../../../domain/adaptors';
import type { Endpoint } from '../../../domain/entities';
import {
  BaseEndpointAdaptor,
  makeHttpRequest,
  parseAdaptorSettings,
  readSecretFromEnv,
  readSsePayloads,
  type AdaptorRuntime
} from '../base';
import { findModel, LIVE_STATUS, type IDirectApiStatusClient } from './direct-api-status.client';

export const DirectApiEndpointSettingsSchema = Type.Object({
  apiUrl: Type.Optional(Type.String({ minLength: 1 })),
  statusUrl: Type.Optional(Type.String({ minLength: 1 })),
  apiKeyEnv: Type.String({ minLength: 1 }),
  upstreamModel: Type.Optional(Type.String({ minLength: 1 }))
});

export type DirectApiEndpointSettings = Static<typeof DirectApiEndpointSettingsSchema>;

export interface DirectApiRuntime extends AdaptorRuntime {
  readonly directApiStatus: IDirectApiStatusClient;
}

export class DirectApiEndpointAdaptor extends BaseEndpointAdaptor {
  private readonly settings: DirectApiEndpointSettings;
  private readonly statusClient: IDirectApiStatusClient;
  private readonly apiKey: string;

  constructor(endpoint: Endpoint, runtime: DirectApiRuntime) {
    super(endpoint, runtime);
    this.settings = parseAdaptorSettings(DirectApiEndpointSettingsSchema, endpoint.slug, endpoint.settings);
    if (!this.settings.apiUrl && !this.settings.statusUrl) {
      throw new ConfigError(`Endpoint ${endpoint.slug} needs either apiUrl or statusUrl`);
    }
    this.apiKey = readSecretFromEnv(this.settings.apiKeyEnv, endpoint.slug);
    this.statusClient = runtime.directApiStatus;
  }

  protected async executeTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult> {
    const baseUrl = await this.resolveBaseUrl(context.signal);
    if (!baseUrl.ok) {
      return baseUrl;
    }

    const response = await makeHttpRequest(`${baseUrl.value}/${request.openaiEndpoint}`, {
      method: 'POST',
      headers: this.headers(),
      body: this.upstreamBody(request, false),
      signal: context.signal
    });

    return ok({ result: await response.text() });
  }

  protected async executeStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult> {
    const baseUrl = await this.resolveBaseUrl(context.signal);
    if (!baseUrl.ok) {
      return baseUrl;
    }

    const { controller, dispose } = createLinkedController(context.signal);

    let response: Response;
    try {
      response = await makeHttpRequest(`${baseUrl.value}/${request.openaiEndpoint}`, {
        method: 'POST',
        headers: { ...this.headers(), Accept: 'text/event-stream' },
        body: this.upstreamBody(request, true),
        signal: controller.signal
      });
    } catch (error) {
      dispose();
      throw error;
    }

    const body = response.body;
    if (!body) {
      dispose();
      return fail({ message: `${this.endpoint.slug} returned an empty stream`, code: 502, kind: 'remote' });
    }

    return ok({
      chunks: this.relayChunks(body, dispose),
      cancel: () => controller.abort()
    });
  }

  private async *relayChunks(body: ReadableStream<Uint8Array>, dispose: () => void): AsyncGenerator<string> {
    try {
      yield* readSsePayloads(body);
    } finally {
      dispose();
    }
  }

  private async resolveBaseUrl(signal: AbortSignal): Promise<Result<string, AdaptorFailure>> {
    const { statusUrl, apiUrl } = this.settings;
    if (!statusUrl) {
      return ok(this.trimSlash(apiUrl ?? ''));
    }

    const status = await this.statusClient.fetchStatus(statusUrl, signal);
    const model = this.upstreamModel();
    const info = findModel(status, model);

    if (!info) {
      return fail({ message: `Model '${model}' is not served by ${this.endpoint.cluster}`, code: 404, kind: 'remote' });
    }

    if (info.status !== LIVE_STATUS) {
      return fail({
        message: `Model '${model}' is not currently live on ${this.endpoint.cluster}. Status: ${info.status}`,
        code: 503,
        kind: 'unavailable'
      });
    }

    const url = apiUrl ?? info.url;
    if (!url) {
      return fail({ message: `Status entry for '${model}' has no url`, code: 502, kind: 'remote' });
    }

    return ok(this.trimSlash(url));
  }

  private upstreamBody(request: InferenceRequest, stream: boolean): Record<string, unknown> {
    return { ...request.payload, model: this.upstreamModel(), stream };
  }

  private upstreamModel(): string {
    return this.settings.upstreamModel ?? this.endpoint.model;
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private trimSlash(url: string): string {
    return url.replace(/\/+$/, '');
  }
}
