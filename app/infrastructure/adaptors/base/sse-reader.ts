/**
 * Yields the payload of every `data:` line in an SSE body, stopping at
 * `[DONE]`. Payloads are returned verbatim so the proxy can forward them
 * without re-serializing. Stopping before the body ends cancels it.
 */
export async function* readSsePayloads(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const rawLine of lines) {
        const line = rawLine.trimEnd();
        if (!line.startsWith('data:')) continue;

        const data = line.slice(5).trimStart();
        if (data === '[DONE]') return;
        if (data.length > 0) yield data;
      }
    }

    buffer += decoder.decode();
    const trailing = buffer.trim();
    if (trailing.startsWith('data:')) {
      const data = trailing.slice(5).trimStart();
      if (data.length > 0 && data !== '[DONE]') yield data;
    }
  } catch (error) {
    settled = true;
    throw error;
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
