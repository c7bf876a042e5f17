import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '../../app/core/errors';
import { formatResultLine, JsonlBatchFileStore, parseBatchLine } from '../../app/infrastructure/storage';
import { captureError, captureSyncError } from '../support/config';
import { TestLogger } from '../support/logger';

const MODEL = 'facebook/opt-125m';

describe('parseBatchLine', () => {
  it('accepts a bare request body and infers the surface', () => {
    const line = parseBatchLine('{"messages":[{"role":"user","content":"Hi"}],"max_tokens":5}', 1, MODEL);

    expect(line).toEqual({
      line: 1,
      customId: undefined,
      openaiEndpoint: 'chat/completions',
      payload: { messages: [{ role: 'user', content: 'Hi' }], max_tokens: 5, model: MODEL, stream: false }
    });
  });

  it('reads the surface and custom id from an envelope', () => {
    const line = parseBatchLine(
      JSON.stringify({ custom_id: 'req-7', method: 'POST', url: '/v1/embeddings', body: { input: 'hi', model: MODEL } }),
      2,
      MODEL
    );

    expect(line).toEqual({
      line: 2,
      customId: 'req-7',
      openaiEndpoint: 'embeddings',
      payload: { input: 'hi', model: MODEL, stream: false }
    });
  });

  it('infers the surface of an envelope without a url', () => {
    const line = parseBatchLine(JSON.stringify({ custom_id: 'a', body: { prompt: 'Once' } }), 1, MODEL);

    expect(line.openaiEndpoint).toBe('completions');
    expect(line.customId).toBe('a');
  });

  it.each([
    ['{"messages":', 'Line 3 of the input file is not valid JSON'],
    ['[1,2]', 'Line 3 of the input file must be a JSON object'],
    ['{"url":"/v1/images","body":{"prompt":"cat"}}', 'Line 3 targets an unsupported url: /v1/images'],
    ['{"prompt":"x","model":"other"}', `Line 3 requests model 'other' but the batch targets '${MODEL}'`]
  ])('rejects %s', (raw, message) => {
    const error = captureSyncError(() => parseBatchLine(raw, 3, MODEL));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message });
  });
});

describe('formatResultLine', () => {
  it('embeds a JSON response as an object', () => {
    expect(formatResultLine({ line: 1, taskId: 't-1', status: 'success', result: '{"id":"x"}' })).toBe(
      '{"line":1,"task_id":"t-1","status":"success","response":{"id":"x"}}'
    );
  });

  it('keeps a response that is not JSON as text', () => {
    expect(formatResultLine({ line: 2, taskId: 't-2', status: 'success', result: 'plain' })).toBe(
      '{"line":2,"task_id":"t-2","status":"success","response":"plain"}'
    );
  });

  it('writes an error for lines that did not succeed', () => {
    expect(formatResultLine({ line: 3, taskId: 't-3', status: 'failed', error: 'OOM' })).toBe(
      '{"line":3,"task_id":"t-3","status":"failed","error":"OOM"}'
    );
    expect(formatResultLine({ line: 4, taskId: 't-4', status: 'pending' })).toBe(
      '{"line":4,"task_id":"t-4","status":"pending","error":"Task did not complete"}'
    );
  });
});

describe('JsonlBatchFileStore', () => {
  let dir: string;
  const store = new JsonlBatchFileStore(new TestLogger());

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'batch-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads non-blank lines and numbers them in order', async () => {
    const path = join(dir, 'input.jsonl');
    await writeFile(path, '{"prompt":"a"}\n\n{"prompt":"b"}\n', 'utf8');

    const lines = await store.readInput(path, MODEL);

    expect(lines.map(line => [line.line, line.payload.prompt])).toEqual([
      [1, 'a'],
      [2, 'b']
    ]);
  });

  it('rejects an empty input file', async () => {
    const path = join(dir, 'empty.jsonl');
    await writeFile(path, '\n\n', 'utf8');

    const error = await captureError(store.readInput(path, MODEL));

    expect(error).toMatchObject({ message: `Input file ${path} contains no requests` });
  });

  it('rejects a missing input file', async () => {
    const path = join(dir, 'missing.jsonl');

    const error = await captureError(store.readInput(path, MODEL));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: expect.stringContaining(`Could not read input file ${path}: `) });
  });

  it('writes one result line per input line', async () => {
    const folder = join(dir, 'results', 'alice');

    const location = await store.writeResults(folder, 'batch-1', [
      { line: 1, taskId: 't-1', status: 'success', result: '{"ok":true}' },
      { line: 2, taskId: 't-2', status: 'failed', error: 'OOM' }
    ]);

    expect(location).toBe(join(folder, 'batch-1.jsonl'));
    expect(await readFile(location, 'utf8')).toBe(
      '{"line":1,"task_id":"t-1","status":"success","response":{"ok":true}}\n' +
        '{"line":2,"task_id":"t-2","status":"failed","error":"OOM"}\n'
    );
  });
});
