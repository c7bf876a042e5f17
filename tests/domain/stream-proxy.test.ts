import { AdaptorError, RoutingError } from '../../app/core/errors';
import { ok } from '../../app/core/types';
import type { InferenceRequest } from '../../app/domain/adaptors';
import { DONE_FRAME, type OpenStreamRequest } from '../../app/domain/services/streaming';
import { captureError, collect } from '../support/config';
import { ALPHA, BETA, MODEL } from '../support/federation';
import { createHarness, type GatewayHarness } from '../support/harness';
import { ALICE } from '../support/identities';
import { adaptorFailure, ChunkFeed } from '../support/scripted-adaptors';

const FIRST_CHUNK = JSON.stringify({
  id: 'cmpl-1',
  object: 'chat.completion.chunk',
  created: 1700000000,
  model: MODEL,
  choices: [{ index: 0, delta: { content: 'Hel' } }]
});

const LAST_CHUNK = JSON.stringify({
  id: 'cmpl-1',
  object: 'chat.completion.chunk',
  created: 1700000000,
  model: MODEL,
  choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 }
});

const inference: InferenceRequest = {
  openaiEndpoint: 'chat/completions',
  payload: { model: MODEL, messages: [{ role: 'user', content: 'Hi' }], stream: true }
};

function streamRequest(harness: GatewayHarness, signal?: AbortSignal): OpenStreamRequest {
  const log = harness.requestLogs.start({
    identity: ALICE,
    model: MODEL,
    openaiEndpoint: 'chat/completions',
    payload: inference.payload,
    federated: true,
    streaming: true
  });
  return {
    route: { model: MODEL, openaiEndpoint: 'chat/completions', identity: ALICE },
    inference,
    log,
    signal
  };
}

async function savedLog(harness: GatewayHarness, id: string) {
  const log = await harness.requestLogRepository.findById(id);
  return log?.toSnapshot();
}

describe('StreamProxyService', () => {
  it('relays every chunk, ends with the done frame and logs the rebuilt response', async () => {
    const harness = createHarness();
    harness.endpoint(ALPHA).onStream = async () => ok(ChunkFeed.of(FIRST_CHUNK, LAST_CHUNK).handle('task-7'));
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    const frames = await collect(session.frames());

    expect(frames).toEqual([`data: ${FIRST_CHUNK}\n\n`, `data: ${LAST_CHUNK}\n\n`, DONE_FRAME]);
    expect(session.getState()).toBe('completed');

    const saved = await savedLog(harness, request.log.getId());
    expect(saved).toMatchObject({
      statusCode: 200,
      endpointSlug: ALPHA,
      cluster: 'alpha',
      attempts: 1,
      taskId: 'task-7',
      metricsProcessed: false
    });
    expect(JSON.parse(saved?.result ?? '')).toEqual({
      id: 'cmpl-1',
      object: 'chat.completion',
      created: 1700000000,
      model: MODEL,
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 }
    });
    expect(harness.metrics.streamOutcomes).toEqual([{ endpointSlug: ALPHA, outcome: 'completed', chunks: 2 }]);
    expect(harness.requestLogRepository.saves).toBe(1);
  });

  it('fails over to the next target while connecting', async () => {
    const harness = createHarness();
    harness.endpoint(ALPHA).onStream = async () => adaptorFailure('alpha is down', 503);
    harness.endpoint(BETA).onStream = async () => ok(ChunkFeed.of(FIRST_CHUNK).handle());
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    await collect(session.frames());

    expect(session.endpointSlug).toBe(BETA);
    expect(await savedLog(harness, request.log.getId())).toMatchObject({ endpointSlug: BETA, attempts: 2, statusCode: 200 });
  });

  it('sends an error frame and the done frame when the backend fails mid-stream', async () => {
    const harness = createHarness();
    const feed = new ChunkFeed();
    feed.push(FIRST_CHUNK);
    feed.fail(new AdaptorError('backend went away', 502));
    harness.endpoint(ALPHA).onStream = async () => ok(feed.handle());
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    const frames = await collect(session.frames());

    expect(frames).toEqual([
      `data: ${FIRST_CHUNK}\n\n`,
      'data: {"error":{"message":"backend went away","type":"adaptor_error","code":502}}\n\n',
      DONE_FRAME
    ]);
    expect(await savedLog(harness, request.log.getId())).toMatchObject({
      statusCode: 502,
      result: 'backend went away',
      metricsProcessed: null
    });
    expect(harness.metrics.streamOutcomes).toEqual([{ endpointSlug: ALPHA, outcome: 'failed', chunks: 1 }]);
  });

  it('stops the backend and logs a cancellation when the client goes away mid-stream', async () => {
    const harness = createHarness();
    const feed = new ChunkFeed();
    feed.push(FIRST_CHUNK);
    harness.endpoint(ALPHA).onStream = async () => ok(feed.handle());
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    const received: string[] = [];
    for await (const frame of session.frames()) {
      received.push(frame);
      break;
    }

    expect(received).toEqual([`data: ${FIRST_CHUNK}\n\n`]);
    expect(session.getState()).toBe('cancelled');
    expect(feed.cancelCount).toBe(1);
    expect(await savedLog(harness, request.log.getId())).toMatchObject({
      statusCode: 499,
      result: 'Stream cancelled by the client'
    });
  });

  it('ends the relay without a done frame when cancelled between chunks', async () => {
    const harness = createHarness();
    const feed = new ChunkFeed();
    feed.push(FIRST_CHUNK);
    harness.endpoint(ALPHA).onStream = async () => ok(feed.handle());
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    const frames = session.frames();
    const first = await frames.next();
    session.cancel();
    const rest = await frames.next();

    expect(first.value).toBe(`data: ${FIRST_CHUNK}\n\n`);
    expect(rest.done).toBe(true);
    expect(feed.cancelCount).toBe(1);
    expect(harness.metrics.streamOutcomes).toEqual([{ endpointSlug: ALPHA, outcome: 'cancelled', chunks: 1 }]);
  });

  it('writes the log exactly once however often the stream is stopped', async () => {
    const harness = createHarness();
    harness.endpoint(ALPHA).onStream = async () => ok(ChunkFeed.of(FIRST_CHUNK).handle());
    const session = await harness.streamProxy.open(streamRequest(harness));

    await collect(session.frames());
    session.cancel();
    session.cancel();
    await session.finalized();

    expect(session.getState()).toBe('completed');
    expect(harness.requestLogRepository.saves).toBe(1);
  });

  it('cancels a stream that the client abandons before reading', async () => {
    const harness = createHarness();
    const feed = new ChunkFeed();
    harness.endpoint(ALPHA).onStream = async () => ok(feed.handle());
    const request = streamRequest(harness);

    const session = await harness.streamProxy.open(request);
    session.cancel();
    await session.finalized();

    expect(await collect(session.frames())).toEqual([]);
    expect(feed.cancelCount).toBe(1);
    expect(harness.requestLogRepository.saves).toBe(1);
    expect(await savedLog(harness, request.log.getId())).toMatchObject({ statusCode: 499 });
  });

  it('cancels the stream when the client signal aborts', async () => {
    const harness = createHarness();
    const feed = new ChunkFeed();
    harness.endpoint(ALPHA).onStream = async () => ok(feed.handle());
    const controller = new AbortController();

    const session = await harness.streamProxy.open(streamRequest(harness, controller.signal));
    controller.abort();
    await session.finalized();

    expect(session.getState()).toBe('cancelled');
    expect(feed.cancelCount).toBe(1);
  });

  it('logs the routing failure when no target accepts the stream', async () => {
    const harness = createHarness();
    harness.endpoint(ALPHA).onStream = async () => adaptorFailure('down', 500);
    harness.endpoint(BETA).onStream = async () => adaptorFailure('down', 500);
    const request = streamRequest(harness);

    const error = await captureError(harness.streamProxy.open(request));

    expect(error).toBeInstanceOf(RoutingError);
    expect(await savedLog(harness, request.log.getId())).toMatchObject({
      statusCode: 503,
      result: `All 2 target(s) failed for model '${MODEL}': ${ALPHA}: down (500); ${BETA}: down (500)`,
      metricsProcessed: null
    });
  });
});
