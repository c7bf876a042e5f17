import { AdaptorError } from '../../../core/errors';
import type { RelayChannel } from '../../adaptors';

export interface RelayChannelTimeouts {
  readonly firstDataTimeoutMs: number;
  readonly idleTimeoutMs: number;
  readonly totalTimeoutMs: number;
}

type ChannelState = 'open' | 'completed' | 'failed' | 'closed';

type Timer = ReturnType<typeof setTimeout>;

/**
 * Buffer between remote posts and the single local reader. Remote data that
 * arrives before the reader asks for it is queued; the reader waits when the
 * queue is empty.
 *
 * Timeouts: no data at all within `firstDataTimeoutMs` fails the channel, as
 * does exceeding `totalTimeoutMs`. Going quiet for `idleTimeoutMs` after data
 * has arrived ends the channel normally, for functions that finish without
 * posting `done`.
 */
export class RelayChannelBuffer implements RelayChannel {
  readonly id: string;
  readonly chunks: AsyncIterable<string>;
  private readonly timeouts: RelayChannelTimeouts;
  private readonly onRelease: (id: string, reason: ChannelState) => void;
  private readonly queue: string[] = [];
  private state: ChannelState = 'open';
  private failure?: AdaptorError;
  private receivedData = false;
  private wake?: () => void;
  private firstDataTimer?: Timer;
  private idleTimer?: Timer;
  private totalTimer?: Timer;

  constructor(id: string, timeouts: RelayChannelTimeouts, onRelease: (id: string, reason: ChannelState) => void) {
    this.id = id;
    this.timeouts = timeouts;
    this.onRelease = onRelease;
    this.chunks = this.read();

    this.firstDataTimer = setTimeout(
      () => this.fail(new AdaptorError(`No data received from the backend within ${timeouts.firstDataTimeoutMs}ms`, 504)),
      timeouts.firstDataTimeoutMs
    );
    this.totalTimer = setTimeout(
      () => this.fail(new AdaptorError(`Stream exceeded the ${timeouts.totalTimeoutMs}ms limit`, 504)),
      timeouts.totalTimeoutMs
    );
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Accepts one or more newline-separated SSE lines. A `[DONE]` line ends the
   * channel. Returns false when the channel no longer takes data.
   */
  push(data: string): boolean {
    if (this.state !== 'open') {
      return false;
    }

    for (const rawLine of data.split('\n')) {
      const line = rawLine.trim();
      const payload = line.startsWith('data:') ? line.slice(5).trim() : line;
      if (payload.length === 0) continue;
      if (payload === '[DONE]') {
        this.complete();
        return true;
      }
      this.queue.push(payload);
    }

    this.markActivity();
    this.notify();
    return true;
  }

  complete(): boolean {
    if (this.state !== 'open') {
      return false;
    }
    this.state = 'completed';
    this.clearTimers();
    this.notify();
    return true;
  }

  fail(error: AdaptorError): boolean {
    if (this.state !== 'open') {
      return false;
    }
    this.state = 'failed';
    this.failure = error;
    this.clearTimers();
    this.notify();
    return true;
  }

  close(): void {
    if (this.state === 'open') {
      this.state = 'closed';
      this.queue.length = 0;
    }
    this.clearTimers();
    this.notify();
    this.onRelease(this.id, this.state);
  }

  private async *read(): AsyncGenerator<string> {
    try {
      while (true) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }

        if (this.state === 'failed' && this.failure) {
          throw this.failure;
        }
        if (this.state !== 'open') {
          return;
        }

        await new Promise<void>(resolve => {
          this.wake = resolve;
        });
      }
    } finally {
      this.close();
    }
  }

  private markActivity(): void {
    if (!this.receivedData) {
      this.receivedData = true;
      clearTimeout(this.firstDataTimer);
      this.firstDataTimer = undefined;
    }

    clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => this.complete(), this.timeouts.idleTimeoutMs);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private clearTimers(): void {
    clearTimeout(this.firstDataTimer);
    clearTimeout(this.idleTimer);
    clearTimeout(this.totalTimer);
    this.firstDataTimer = undefined;
    this.idleTimer = undefined;
    this.totalTimer = undefined;
  }
}
