import { AdaptorError } from '../../app/core/errors';
import { RelayChannelBuffer, StreamRelayService } from '../../app/domain/services/streaming';
import { captureError, collect, createTestConfig, SequentialCryptoService } from '../support/config';
import { TestLogger } from '../support/logger';

function createRelay(env: Record<string, string> = {}) {
  const logger = new TestLogger();
  const relay = new StreamRelayService(createTestConfig(env), logger, new SequentialCryptoService());
  return { relay, logger };
}

describe('StreamRelayService', () => {
  it('advertises the public callback url', () => {
    const { relay } = createRelay({ PUBLIC_BASE_URL: 'https://gateway.example.org/' });

    expect(relay.callbackUrl).toBe('https://gateway.example.org/internal/streaming');
  });

  it('accepts only the configured internal secret', () => {
    const { relay } = createRelay();

    expect(relay.verifySecret('test-secret')).toBe(true);
    expect(relay.verifySecret('wrong-secret')).toBe(false);
    expect(relay.verifySecret(undefined)).toBe(false);
  });

  it('delivers posted data in order and releases the channel when done', async () => {
    const { relay } = createRelay();
    const channel = relay.openChannel();

    expect(channel.id).toBe('id-1');
    expect(relay.pushData(channel.id, 'data: {"n":1}\n\ndata: {"n":2}\n\n')).toBe(true);
    expect(relay.pushData(channel.id, 'data: {"n":3}\ndata: [DONE]')).toBe(true);

    expect(await collect(channel.chunks)).toEqual(['{"n":1}', '{"n":2}', '{"n":3}']);
    expect(relay.activeChannels()).toBe(0);
    expect(relay.pushData(channel.id, 'data: {"n":4}')).toBe(false);
  });

  it('refuses posts for channels it does not know', () => {
    const { relay } = createRelay();

    expect(relay.pushData('missing', 'data: {}')).toBe(false);
    expect(relay.pushError('missing', 'boom')).toBe(false);
    expect(relay.complete('missing')).toBe(false);
  });

  it('fails the reader with the error a remote function reports', async () => {
    const { relay, logger } = createRelay();
    const channel = relay.openChannel();

    expect(relay.pushError(channel.id, 'remote crashed')).toBe(true);
    const error = await captureError(collect(channel.chunks));

    expect(error).toBeInstanceOf(AdaptorError);
    expect(error).toMatchObject({ message: 'remote crashed', statusCode: 502 });
    expect(logger.messages('warn')).toEqual(['Remote function reported a streaming error']);
    expect(relay.activeChannels()).toBe(0);
  });

  it('completes a channel only once', () => {
    const { relay } = createRelay();
    const channel = relay.openChannel();

    expect(relay.complete(channel.id)).toBe(true);
    expect(relay.complete(channel.id)).toBe(false);
    channel.close();
    expect(relay.activeChannels()).toBe(0);
  });
});

describe('RelayChannelBuffer', () => {
  const released: string[] = [];
  const open = (firstDataTimeoutMs: number, idleTimeoutMs: number, totalTimeoutMs: number) =>
    new RelayChannelBuffer('channel-1', { firstDataTimeoutMs, idleTimeoutMs, totalTimeoutMs }, (_id, state) => {
      released.push(state);
    });

  beforeEach(() => {
    released.length = 0;
  });

  it('fails when no data arrives in time', async () => {
    const channel = open(20, 1_000, 1_000);

    const error = await captureError(collect(channel.chunks));

    expect(error).toMatchObject({ message: 'No data received from the backend within 20ms', statusCode: 504 });
    expect(released).toEqual(['failed']);
  });

  it('ends normally once the backend goes quiet after sending data', async () => {
    const channel = open(1_000, 20, 1_000);
    channel.push('data: {"n":1}');

    expect(await collect(channel.chunks)).toEqual(['{"n":1}']);
    expect(released).toEqual(['completed']);
  });

  it('fails a stream that runs past the total limit', async () => {
    const channel = open(1_000, 1_000, 30);
    channel.push('data: {"n":1}');

    const received: string[] = [];
    const error = await captureError(
      (async () => {
        for await (const chunk of channel.chunks) {
          received.push(chunk);
        }
      })()
    );

    expect(received).toEqual(['{"n":1}']);
    expect(error).toMatchObject({ message: 'Stream exceeded the 30ms limit', statusCode: 504 });
  });

  it('ignores blank lines and takes lines without a data prefix as they are', async () => {
    const channel = open(1_000, 1_000, 1_000);
    channel.push('\n\ndata: {"n":1}\n  \n{"n":2}\n');
    channel.complete();

    expect(await collect(channel.chunks)).toEqual(['{"n":1}', '{"n":2}']);
  });

  it('drops queued data and refuses new posts once closed', () => {
    const channel = open(1_000, 1_000, 1_000);
    channel.push('data: {"n":1}');
    channel.close();

    expect(channel.isOpen()).toBe(false);
    expect(channel.push('data: {"n":2}')).toBe(false);
    expect(released).toEqual(['closed']);
  });
});
