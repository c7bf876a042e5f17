import { InferenceController } from '../../app/api/controllers';
import { InferenceService } from '../../app/application/services';
import { ok } from '../../app/core/types';
import { ALPHA, MODEL } from '../support/federation';
import { createHarness } from '../support/harness';
import { bearer, createControllerSupport, mountController, postJson } from '../support/http';
import { ChunkFeed } from '../support/scripted-adaptors';

const messages = [{ role: 'user', content: 'Hi' }];

const CHUNK = JSON.stringify({
  id: 'cmpl-1',
  object: 'chat.completion.chunk',
  created: 1700000000,
  model: MODEL,
  choices: [{ index: 0, delta: { content: 'Hel' } }]
});

function setup() {
  const harness = createHarness();
  const support = createControllerSupport(harness);
  const service = new InferenceService(harness.logger, harness.router, harness.streamProxy, harness.requestLogs);
  const app = mountController(support, new InferenceController(support, service));
  return { harness, app };
}

describe('InferenceController', () => {
  it('answers a non-streaming request with the backend body', async () => {
    const { app } = setup();

    const response = await app.handle(postJson('/v1/chat/completions', { model: MODEL, messages }, bearer('alice-token')));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ served_by: ALPHA });
  });

  it('rejects a request without a bearer token', async () => {
    const { app, harness } = setup();

    const response = await app.handle(postJson('/v1/chat/completions', { model: MODEL, messages }));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({
      error: {
        message: "Missing ('Authorization: Bearer <access-token>') header",
        type: 'authentication_error',
        code: 401,
        request_id: 'req-test'
      }
    });
    expect(harness.endpoint(ALPHA).requests).toEqual([]);
  });

  it('streams frames as server-sent events', async () => {
    const { app, harness } = setup();
    harness.endpoint(ALPHA).onStream = async () => ok(ChunkFeed.of(CHUNK).handle());

    const response = await app.handle(
      postJson('/v1/chat/completions', { model: MODEL, messages, stream: true }, bearer('alice-token'))
    );

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    expect(await response.text()).toBe(`data: ${CHUNK}\n\ndata: [DONE]\n\n`);
    expect(harness.metrics.streamOutcomes).toEqual([{ endpointSlug: ALPHA, outcome: 'completed', chunks: 1 }]);
  });

  it('cancels the session and stops the backend when the client drops the stream', async () => {
    const { app, harness } = setup();
    const feed = new ChunkFeed();
    feed.push(CHUNK);
    const upstream = new AbortController();
    harness.endpoint(ALPHA).onStream = async () => {
      const handle = feed.handle();
      return ok({
        ...handle,
        cancel: () => {
          upstream.abort();
          handle.cancel();
        }
      });
    };

    const response = await app.handle(
      postJson('/v1/chat/completions', { model: MODEL, messages, stream: true }, bearer('alice-token'))
    );
    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('Expected a streaming body');
    }

    const first = await reader.read();
    expect(new TextDecoder().decode(first.value)).toBe(`data: ${CHUNK}\n\n`);

    await reader.cancel();

    expect(upstream.signal.aborted).toBe(true);
    expect(feed.cancelCount).toBe(1);
    expect(harness.metrics.streamOutcomes).toEqual([{ endpointSlug: ALPHA, outcome: 'cancelled', chunks: 1 }]);
  });
});
