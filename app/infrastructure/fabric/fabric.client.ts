import { injectable, inject } from 'inversify';
import { Type, type Static } from '@sinclair/typebox';
import { TYPES } from '../../core/container/types';
import type { GatewayConfig } from '../../core/config';
import { errorMessage } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import { raceAbort, sleep } from '../../core/utils';
import type { BatchLineStatus } from '../../domain/entities';
import { fetchJson, UnexpectedResponseError } from '../adaptors/base/http';

const EndpointStatusSchema = Type.Object({
  status: Type.String(),
  details: Type.Optional(
    Type.Object({
      managers: Type.Optional(Type.Integer({ minimum: 0 }))
    })
  )
});

const SubmitResponseSchema = Type.Object({
  task_ids: Type.Array(Type.String({ minLength: 1 }))
});

const TaskStateSchema = Type.Object({
  status: Type.String(),
  result: Type.Optional(Type.Unknown()),
  exception: Type.Optional(Type.String())
});

const BatchStatusResponseSchema = Type.Object({
  results: Type.Record(Type.String(), TaskStateSchema)
});

export type FabricEndpointStatus = Static<typeof EndpointStatusSchema>;

export interface FabricTaskState {
  readonly taskId: string;
  readonly status: BatchLineStatus;
  readonly result?: string;
  readonly error?: string;
}

export interface IFabricClient {
  getEndpointStatus(endpointId: string, signal?: AbortSignal): Promise<FabricEndpointStatus>;
  submitTasks(endpointId: string, functionId: string, payloads: readonly unknown[], signal?: AbortSignal): Promise<string[]>;
  getTask(taskId: string, signal?: AbortSignal): Promise<FabricTaskState>;
  getTasks(taskIds: readonly string[], signal?: AbortSignal): Promise<FabricTaskState[]>;
  waitForResult(taskId: string, signal: AbortSignal): Promise<FabricTaskState>;
}

interface CachedStatus {
  readonly expiresAt: number;
  readonly value: Promise<FabricEndpointStatus>;
}

/** Remote results arrive either as a JSON string or as a structured value. */
function resultText(result: unknown): string | undefined {
  if (result === undefined || result === null) {
    return undefined;
  }
  return typeof result === 'string' ? result : JSON.stringify(result);
}

function normalizeTaskStatus(status: string): BatchLineStatus {
  switch (status.toLowerCase()) {
    case 'success':
      return 'success';
    case 'failed':
    case 'failure':
      return 'failed';
    case 'running':
    case 'executing':
      return 'running';
    default:
      return 'pending';
  }
}

/**
 * HTTP client for the remote execution fabric. Endpoint status lookups are
 * cached per endpoint so a burst of requests against an offline target
 * produces one upstream call. The shared lookup runs under the client's own
 * timeout; a caller's signal only ends that caller's wait.
 */
@injectable()
export class FabricClient implements IFabricClient {
  private readonly logger: ILogger;
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly pollIntervalMs: number;
  private readonly statusCacheTtlMs: number;
  private readonly statusTimeoutMs: number;
  private readonly statusCache = new Map<string, CachedStatus>();

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.createChild('FabricClient');
    this.baseUrl = config.fabric.apiUrl.replace(/\/+$/, '');
    this.accessToken = config.fabric.accessToken;
    this.pollIntervalMs = config.fabric.pollIntervalMs;
    this.statusCacheTtlMs = config.fabric.statusCacheTtlMs;
    this.statusTimeoutMs = config.fabric.statusTimeoutMs;
  }

  async getEndpointStatus(endpointId: string, signal?: AbortSignal): Promise<FabricEndpointStatus> {
    const now = Date.now();
    const cached = this.statusCache.get(endpointId);
    if (cached && cached.expiresAt > now) {
      return signal ? raceAbort(cached.value, signal) : cached.value;
    }

    const value = fetchJson(`${this.baseUrl}/v2/endpoints/${encodeURIComponent(endpointId)}/status`, EndpointStatusSchema, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.statusTimeoutMs)
    });

    const entry: CachedStatus = { expiresAt: now + this.statusCacheTtlMs, value };
    this.statusCache.set(endpointId, entry);

    void value.catch(error => {
      if (this.statusCache.get(endpointId) === entry) {
        this.statusCache.delete(endpointId);
      }
      this.logger.debug('Endpoint status lookup failed', {
        metadata: { endpointId, error: errorMessage(error) }
      });
    });

    return signal ? raceAbort(value, signal) : value;
  }

  async submitTasks(
    endpointId: string,
    functionId: string,
    payloads: readonly unknown[],
    signal?: AbortSignal
  ): Promise<string[]> {
    const url = `${this.baseUrl}/v3/endpoints/${encodeURIComponent(endpointId)}/submit`;
    const response = await fetchJson(url, SubmitResponseSchema, {
      method: 'POST',
      headers: this.headers(),
      body: {
        tasks: payloads.map(payload => ({ function_id: functionId, args: [payload] }))
      },
      signal
    });

    if (response.task_ids.length !== payloads.length) {
      throw new UnexpectedResponseError(url, `expected ${payloads.length} task id(s), received ${response.task_ids.length}`);
    }

    this.logger.debug('Submitted fabric tasks', {
      metadata: { endpointId, functionId, tasks: response.task_ids.length }
    });

    return response.task_ids;
  }

  async getTask(taskId: string, signal?: AbortSignal): Promise<FabricTaskState> {
    const state = await fetchJson(`${this.baseUrl}/v2/tasks/${encodeURIComponent(taskId)}`, TaskStateSchema, {
      headers: this.headers(),
      signal
    });
    return this.toTaskState(taskId, state);
  }

  async getTasks(taskIds: readonly string[], signal?: AbortSignal): Promise<FabricTaskState[]> {
    if (taskIds.length === 0) {
      return [];
    }

    const response = await fetchJson(`${this.baseUrl}/v2/batch_status`, BatchStatusResponseSchema, {
      method: 'POST',
      headers: this.headers(),
      body: { task_ids: taskIds },
      signal
    });

    return taskIds.map(taskId => {
      const state = response.results[taskId];
      return state ? this.toTaskState(taskId, state) : { taskId, status: 'pending' };
    });
  }

  async waitForResult(taskId: string, signal: AbortSignal): Promise<FabricTaskState> {
    while (true) {
      const state = await this.getTask(taskId, signal);
      if (state.status === 'success' || state.status === 'failed') {
        return state;
      }
      await sleep(this.pollIntervalMs, signal);
    }
  }

  private toTaskState(taskId: string, state: Static<typeof TaskStateSchema>): FabricTaskState {
    return {
      taskId,
      status: normalizeTaskStatus(state.status),
      result: resultText(state.result),
      error: state.exception
    };
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }
}
