import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    super(`HTTP ${status} from ${url}: ${body.slice(0, 500)}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

export class UnexpectedResponseError extends Error {
  constructor(url: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = 'UnexpectedResponseError';
  }
}

export interface HttpRequestOptions {
  readonly method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  readonly body?: unknown;
  readonly form?: Record<string, string>;
  readonly headers?: Record<string, string>;
  readonly signal?: AbortSignal;
}

export async function makeHttpRequest(url: string, options: HttpRequestOptions = {}): Promise<Response> {
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
  let body: string | undefined;

  if (options.form !== undefined) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(options.form).toString();
  } else if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(options.body);
  }

  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers,
    body,
    signal: options.signal
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new HttpStatusError(url, response.status, errorText);
  }

  return response;
}

export async function fetchJson<T extends TSchema>(url: string, schema: T, options: HttpRequestOptions = {}): Promise<Static<T>> {
  const response = await makeHttpRequest(url, options);
  const text = await response.text();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new UnexpectedResponseError(url, 'body is not valid JSON');
  }

  if (!Value.Check(schema, parsed)) {
    const [first] = [...Value.Errors(schema, parsed)];
    throw new UnexpectedResponseError(url, first ? `${first.path || '/'} ${first.message}` : 'schema mismatch');
  }

  return parsed;
}
