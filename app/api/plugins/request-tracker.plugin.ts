import { Elysia } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import type { ICryptoService } from '../../core/security';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface TrackedRequest {
  readonly requestId: string;
  readonly startTime: number;
}

/**
 * Gives every request an id and a start time. Entries are keyed by the
 * request object, so they disappear with it.
 */
@injectable()
export class RequestTracker {
  private readonly pluginName = 'request-tracker';
  private readonly cryptoService: ICryptoService;
  private readonly tracked = new WeakMap<Request, TrackedRequest>();

  constructor(@inject(TYPES.CryptoService) cryptoService: ICryptoService) {
    this.cryptoService = cryptoService;
  }

  createPlugin() {
    return new Elysia({ name: this.pluginName }).onRequest(({ request, set }) => {
      set.headers[REQUEST_ID_HEADER] = this.track(request).requestId;
    });
  }

  /** An incoming `X-Request-ID` is kept when the caller supplies one. */
  track(request: Request): TrackedRequest {
    const existing = this.tracked.get(request);
    if (existing) {
      return existing;
    }

    const supplied = request.headers.get(REQUEST_ID_HEADER)?.trim();
    const entry: TrackedRequest = {
      requestId: supplied && supplied.length <= 128 ? supplied : `req-${this.cryptoService.generateId()}`,
      startTime: Date.now()
    };
    this.tracked.set(request, entry);
    return entry;
  }
}
