import { injectable, inject } from 'inversify';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { TYPES } from '../../core/container/types';
import { ValidationError, errorMessage } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { BatchLineRequest, InferencePayload } from '../../domain/adaptors';
import { isOpenAIEndpoint, type BatchLineResult, type OpenAIEndpoint } from '../../domain/entities';
import type { BatchFileStore } from '../../domain/repositories';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function endpointFromUrl(url: unknown): OpenAIEndpoint | undefined {
  if (typeof url !== 'string') {
    return undefined;
  }
  const path = url.replace(/^\/?(v1\/)?/, '').replace(/\/+$/, '');
  return isOpenAIEndpoint(path) ? path : undefined;
}

function inferEndpoint(body: Record<string, unknown>): OpenAIEndpoint {
  if ('messages' in body) return 'chat/completions';
  if ('input' in body) return 'embeddings';
  return 'completions';
}

/**
 * Input lines are either a bare request body or the envelope form
 * `{custom_id, method, url, body}`.
 */
export function parseBatchLine(raw: string, line: number, model: string): BatchLineRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError(`Line ${line} of the input file is not valid JSON`);
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`Line ${line} of the input file must be a JSON object`);
  }

  const enveloped = isRecord(parsed.body);
  const body = isRecord(parsed.body) ? parsed.body : parsed;

  let openaiEndpoint: OpenAIEndpoint;
  if (enveloped && parsed.url !== undefined) {
    const fromUrl = endpointFromUrl(parsed.url);
    if (!fromUrl) {
      throw new ValidationError(`Line ${line} targets an unsupported url: ${String(parsed.url)}`);
    }
    openaiEndpoint = fromUrl;
  } else {
    openaiEndpoint = inferEndpoint(body);
  }

  if (body.model !== undefined && body.model !== model) {
    throw new ValidationError(`Line ${line} requests model '${String(body.model)}' but the batch targets '${model}'`);
  }

  const payload: InferencePayload = { ...body, model, stream: false };
  const customId = enveloped && typeof parsed.custom_id === 'string' ? parsed.custom_id : undefined;

  return { line, customId, openaiEndpoint, payload };
}

export function formatResultLine(result: BatchLineResult): string {
  const entry: Record<string, unknown> = {
    line: result.line,
    task_id: result.taskId,
    status: result.status
  };

  if (result.status === 'success') {
    entry.response = parseResponse(result.result);
  } else {
    entry.error = result.error ?? 'Task did not complete';
  }

  return JSON.stringify(entry);
}

function parseResponse(result: string | undefined): unknown {
  if (result === undefined) {
    return null;
  }
  try {
    return JSON.parse(result);
  } catch {
    return result;
  }
}

@injectable()
export class JsonlBatchFileStore implements BatchFileStore {
  private readonly logger: ILogger;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.createChild('JsonlBatchFileStore');
  }

  async readInput(path: string, model: string): Promise<BatchLineRequest[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new ValidationError(`Could not read input file ${path}: ${errorMessage(error)}`);
    }

    const lines: BatchLineRequest[] = [];
    content.split('\n').forEach(raw => {
      if (raw.trim().length > 0) {
        lines.push(parseBatchLine(raw, lines.length + 1, model));
      }
    });

    if (lines.length === 0) {
      throw new ValidationError(`Input file ${path} contains no requests`);
    }

    return lines;
  }

  async writeResults(outputFolder: string, batchId: string, lines: readonly BatchLineResult[]): Promise<string> {
    await mkdir(outputFolder, { recursive: true });
    const location = join(outputFolder, `${batchId}.jsonl`);
    const content = lines.map(formatResultLine).join('\n');

    await writeFile(location, `${content}\n`, 'utf8');

    this.logger.info('Wrote batch results', {
      metadata: { batchId, location, lines: lines.length }
    });

    return location;
  }
}
