import { HttpStatusError, UnexpectedResponseError } from '../../app/infrastructure/adaptors/base';
import { FabricClient } from '../../app/infrastructure/fabric';
import { captureError, createTestConfig, deferred, TEST_SECRET } from '../support/config';
import { TestLogger } from '../support/logger';

const BASE_URL = 'https://fabric.test';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createClient(env: Record<string, string> = {}): FabricClient {
  const config = createTestConfig({
    FABRIC_API_URL: `${BASE_URL}/`,
    FABRIC_ACCESS_TOKEN: TEST_SECRET,
    FABRIC_POLL_INTERVAL_MS: '5',
    ...env
  });
  return new FabricClient(config, new TestLogger());
}

function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

describe('FabricClient', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('caches endpoint status lookups', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse({ status: 'online' }));
    const client = createClient();

    expect(await client.getEndpointStatus('ep-1')).toEqual({ status: 'online' });
    expect(await client.getEndpointStatus('ep-1')).toEqual({ status: 'online' });

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/v2/endpoints/ep-1/status`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json', Authorization: `Bearer ${TEST_SECRET}` });
  });

  it('does not cache a failed status lookup', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(new Response('boom', { status: 500 }))
      .mockResolvedValueOnce(jsonResponse({ status: 'offline' }));
    const client = createClient();

    const error = await captureError(client.getEndpointStatus('ep-1'));

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 500, message: `HTTP 500 from ${BASE_URL}/v2/endpoints/ep-1/status: boom` });
    expect(await client.getEndpointStatus('ep-1')).toEqual({ status: 'offline' });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('keeps a shared status lookup alive when one caller gives up', async () => {
    const response = deferred<Response>();
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockImplementation(() => response.promise);
    const client = createClient();
    const impatient = new AbortController();
    const reason = new Error('caller timed out');

    const abandoned = client.getEndpointStatus('ep-1', impatient.signal);
    const waiting = client.getEndpointStatus('ep-1', new AbortController().signal);
    impatient.abort(reason);
    response.resolve(jsonResponse({ status: 'online' }));

    expect(await captureError(abandoned)).toBe(reason);
    expect(await waiting).toEqual({ status: 'online' });
    expect(await client.getEndpointStatus('ep-1')).toEqual({ status: 'online' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][1]?.signal).not.toBe(impatient.signal);
  });

  it('submits one function call per payload', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ task_ids: ['t-1', 't-2'] }));
    const client = createClient();

    const taskIds = await client.submitTasks('ep-1', 'fn-1', [{ a: 1 }, { a: 2 }]);

    expect(taskIds).toEqual(['t-1', 't-2']);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/v3/endpoints/ep-1/submit`);
    expect(init?.method).toBe('POST');
    expect(requestBody(init)).toEqual({
      tasks: [
        { function_id: 'fn-1', args: [{ a: 1 }] },
        { function_id: 'fn-1', args: [{ a: 2 }] }
      ]
    });
  });

  it('rejects a submit response with the wrong number of task ids', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(jsonResponse({ task_ids: ['t-1'] }));
    const client = createClient();

    const error = await captureError(client.submitTasks('ep-1', 'fn-1', [{}, {}]));

    expect(error).toBeInstanceOf(UnexpectedResponseError);
    expect(error).toMatchObject({
      message: `Unexpected response from ${BASE_URL}/v3/endpoints/ep-1/submit: expected 2 task id(s), received 1`
    });
  });

  it('rejects a body that is not JSON', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('<html>', { status: 200 }));
    const client = createClient();

    const error = await captureError(client.getTask('t-1'));

    expect(error).toMatchObject({ message: `Unexpected response from ${BASE_URL}/v2/tasks/t-1: body is not valid JSON` });
  });

  it('normalizes task states from a batch status lookup', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      jsonResponse({
        results: {
          't-1': { status: 'SUCCESS', result: { choices: [] } },
          't-2': { status: 'failure', exception: 'Worker lost' },
          't-3': { status: 'executing' }
        }
      })
    );
    const client = createClient();

    const states = await client.getTasks(['t-1', 't-2', 't-3', 't-4']);

    expect(states).toEqual([
      { taskId: 't-1', status: 'success', result: '{"choices":[]}', error: undefined },
      { taskId: 't-2', status: 'failed', result: undefined, error: 'Worker lost' },
      { taskId: 't-3', status: 'running', result: undefined, error: undefined },
      { taskId: 't-4', status: 'pending' }
    ]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/v2/batch_status`);
    expect(requestBody(init)).toEqual({ task_ids: ['t-1', 't-2', 't-3', 't-4'] });
  });

  it('skips the lookup for an empty task list', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch');
    const client = createClient();

    expect(await client.getTasks([])).toEqual([]);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('polls a task until it finishes', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ status: 'pending' }))
      .mockResolvedValueOnce(jsonResponse({ status: 'running' }))
      .mockResolvedValueOnce(jsonResponse({ status: 'success', result: 'done' }));
    const client = createClient();

    const state = await client.waitForResult('t-1', new AbortController().signal);

    expect(state).toEqual({ taskId: 't-1', status: 'success', result: 'done', error: undefined });
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('stops polling when the signal aborts', async () => {
    jest.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse({ status: 'pending' }));
    const client = createClient({ FABRIC_POLL_INTERVAL_MS: '1000' });
    const controller = new AbortController();
    const reason = new Error('client went away');

    const pending = client.waitForResult('t-1', controller.signal);
    setTimeout(() => controller.abort(reason), 10);

    expect(await captureError(pending)).toBe(reason);
  });
});
