import { Type, type Static } from '@sinclair/typebox';
import { fail, ok } from '../../../core/types';
import type {
  AdaptorFailure,
  BatchCancelResult,
  BatchStatusResult,
  BatchSubmitRequest,
  BatchSubmitResult,
  InferenceRequest,
  StreamRelay,
  StreamResult,
  TaskContext,
  TaskResult
} from '../../../domain/adaptors';
import type { BatchJob, Endpoint, OpenAIEndpoint } from '../../../domain/entities';
import type { IFabricClient } from '../../fabric';
import { BaseEndpointAdaptor, parseAdaptorSettings, type AdaptorRuntime } from '../base';

export const FabricEndpointSettingsSchema = Type.Object({
  endpointId: Type.String({ minLength: 1 }),
  functionId: Type.String({ minLength: 1 }),
  apiPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  streamingFunctionId: Type.Optional(Type.String({ minLength: 1 })),
  batchEndpointId: Type.Optional(Type.String({ minLength: 1 })),
  batchFunctionId: Type.Optional(Type.String({ minLength: 1 })),
  batchCancelFunctionId: Type.Optional(Type.String({ minLength: 1 }))
});

export type FabricEndpointSettings = Static<typeof FabricEndpointSettingsSchema>;

export interface FabricAdaptorRuntime extends AdaptorRuntime {
  readonly fabric: IFabricClient;
  readonly relay: StreamRelay;
}

/**
 * Runs inference as a function invocation on a remote execution target and
 * polls the fabric for the task result. Streaming output comes back through
 * the gateway's relay channel rather than the task result.
 */
export class FabricEndpointAdaptor extends BaseEndpointAdaptor {
  private readonly settings: FabricEndpointSettings;
  private readonly fabric: IFabricClient;
  private readonly relay: StreamRelay;

  constructor(endpoint: Endpoint, runtime: FabricAdaptorRuntime) {
    super(endpoint, runtime);
    this.settings = parseAdaptorSettings(FabricEndpointSettingsSchema, endpoint.slug, endpoint.settings);
    this.fabric = runtime.fabric;
    this.relay = runtime.relay;
  }

  override hasBatchEnabled(): boolean {
    return this.settings.batchFunctionId !== undefined;
  }

  protected async executeTask(request: InferenceRequest, context: TaskContext): Promise<TaskResult> {
    const offline = await this.checkOnline(this.settings.endpointId, context.signal);
    if (offline) {
      return fail(offline);
    }

    const [taskId] = await this.fabric.submitTasks(
      this.settings.endpointId,
      this.settings.functionId,
      [this.taskPayload(request.openaiEndpoint, request.payload)],
      context.signal
    );

    const state = await this.fabric.waitForResult(taskId, context.signal);
    if (state.status === 'failed') {
      return fail({
        message: state.error ?? `Task ${taskId} failed on ${this.endpoint.slug}`,
        code: 502,
        kind: 'remote'
      });
    }

    return ok({ result: state.result ?? '', taskId });
  }

  protected async executeStreamingTask(request: InferenceRequest, context: TaskContext): Promise<StreamResult> {
    const offline = await this.checkOnline(this.settings.endpointId, context.signal);
    if (offline) {
      return fail(offline);
    }

    const channel = this.relay.openChannel();
    const payload = this.taskPayload(request.openaiEndpoint, {
      ...request.payload,
      stream: true,
      stream_task_id: channel.id,
      streaming_server_url: this.relay.callbackUrl
    });

    let taskId: string;
    try {
      [taskId] = await this.fabric.submitTasks(
        this.settings.endpointId,
        this.settings.streamingFunctionId ?? this.settings.functionId,
        [payload],
        context.signal
      );
    } catch (error) {
      channel.close();
      throw error;
    }

    this.logger.debug('Streaming task submitted', {
      requestId: context.requestLogId,
      metadata: { taskId, channel: channel.id }
    });

    return ok({
      taskId,
      chunks: channel.chunks,
      cancel: () => channel.close()
    });
  }

  protected override async executeSubmitBatch(request: BatchSubmitRequest): Promise<BatchSubmitResult> {
    const batchFunctionId = this.settings.batchFunctionId;
    if (batchFunctionId === undefined) {
      return fail(this.unsupported('submitBatch'));
    }

    const endpointId = this.settings.batchEndpointId ?? this.settings.endpointId;
    const offline = await this.checkOnline(endpointId);
    if (offline) {
      return fail(offline);
    }

    const payloads = request.lines.map(line => ({
      ...this.taskPayload(line.openaiEndpoint, line.payload),
      batch_id: request.batchId,
      line: line.line,
      custom_id: line.customId
    }));

    const taskIds = await this.fabric.submitTasks(endpointId, batchFunctionId, payloads);
    return ok({ taskIds });
  }

  protected override async executeGetBatchStatus(batch: BatchJob, signal: AbortSignal): Promise<BatchStatusResult> {
    const states = await this.fabric.getTasks(batch.getTaskIds(), signal);
    return ok(
      states.map(state => ({
        taskId: state.taskId,
        status: state.status,
        result: state.result,
        error: state.status === 'failed' ? state.error ?? 'Task failed' : undefined
      }))
    );
  }

  /** Runs the cancel function next to the batch tasks so it can stop the backend job. */
  protected override async executeCancelBatch(batch: BatchJob, signal: AbortSignal): Promise<BatchCancelResult> {
    const cancelFunctionId = this.settings.batchCancelFunctionId;
    if (cancelFunctionId === undefined) {
      return fail(this.unsupported('cancelBatch'));
    }

    const endpointId = this.settings.batchEndpointId ?? this.settings.endpointId;
    const offline = await this.checkOnline(endpointId, signal);
    if (offline) {
      return fail(offline);
    }

    const [taskId] = await this.fabric.submitTasks(
      endpointId,
      cancelFunctionId,
      [{ batch_id: batch.getId(), task_ids: batch.getTaskIds() }],
      signal
    );

    const state = await this.fabric.waitForResult(taskId, signal);
    if (state.status === 'failed') {
      return fail({
        message: state.error ?? `Cancelling batch ${batch.getId()} failed on ${this.endpoint.slug}`,
        code: 502,
        kind: 'remote'
      });
    }

    return ok({ cancelledTasks: batch.getTaskIds().length });
  }

  private async checkOnline(endpointId: string, signal?: AbortSignal): Promise<AdaptorFailure | undefined> {
    const status = await this.fabric.getEndpointStatus(endpointId, signal);
    if (status.status !== 'online') {
      return {
        message: `Endpoint ${this.endpoint.slug} is ${status.status}`,
        code: 503,
        kind: 'unavailable'
      };
    }
    return undefined;
  }

  private taskPayload(openaiEndpoint: OpenAIEndpoint, params: Record<string, unknown>): { model_params: Record<string, unknown> } {
    return {
      model_params: {
        ...params,
        openai_endpoint: openaiEndpoint,
        api_port: this.settings.apiPort
      }
    };
  }
}
