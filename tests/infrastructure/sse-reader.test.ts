import { readSsePayloads } from '../../app/infrastructure/adaptors/base';
import { collect } from '../support/config';

function byteStream(chunks: readonly Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    }
  });
}

function textStream(chunks: readonly string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return byteStream(chunks.map(chunk => encoder.encode(chunk)));
}

describe('readSsePayloads', () => {
  it('joins lines split across chunks and skips other fields', async () => {
    const body = textStream(['data: {"a":', '1}\n\nevent: ping\n: keep-alive\ndata:   {"b":2}\r\n', '\n']);

    expect(await collect(readSsePayloads(body))).toEqual(['{"a":1}', '{"b":2}']);
  });

  it('stops at the done marker', async () => {
    const body = textStream(['data: {"a":1}\n\ndata: [DONE]\n\ndata: {"late":true}\n\n']);

    expect(await collect(readSsePayloads(body))).toEqual(['{"a":1}']);
  });

  it('yields a final line without a trailing newline', async () => {
    const body = textStream(['data: {"a":1}\ndata: {"z":9}']);

    expect(await collect(readSsePayloads(body))).toEqual(['{"a":1}', '{"z":9}']);
  });

  it('decodes characters split between chunks', async () => {
    const bytes = new TextEncoder().encode('data: "é"\n');
    const split = bytes.indexOf(0xc3) + 1;

    const body = byteStream([bytes.slice(0, split), bytes.slice(split)]);

    expect(await collect(readSsePayloads(body))).toEqual(['"é"']);
  });

  it('skips empty data lines', async () => {
    const body = textStream(['data:\n\ndata: {"a":1}\n']);

    expect(await collect(readSsePayloads(body))).toEqual(['{"a":1}']);
  });

  it('flushes bytes still held by the decoder when the body ends', async () => {
    const body = byteStream([new TextEncoder().encode('data: x'), Uint8Array.of(0xc3)]);

    expect(await collect(readSsePayloads(body))).toEqual(['x\uFFFD']);
  });

  it('cancels the body when the consumer stops early', async () => {
    const cancel = jest.fn();
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('data: {"a":1}\n\ndata: {"b":2}\n\n'));
      },
      cancel
    });

    const seen: string[] = [];
    for await (const payload of readSsePayloads(body)) {
      seen.push(payload);
      break;
    }

    expect(seen).toEqual(['{"a":1}']);
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});
