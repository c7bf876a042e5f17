import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { AdaptorError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { ICryptoService } from '../../../core/security';
import type { RelayChannel, StreamRelay } from '../../adaptors';
import { RelayChannelBuffer, type RelayChannelTimeouts } from './relay-channel';

export const INTERNAL_SECRET_HEADER = 'x-internal-secret';

/**
 * In-process endpoint for remote functions that push their streaming output
 * back to the gateway. Posts for a channel that is unknown or already closed
 * are refused, which tells the remote side to stop sending.
 */
@injectable()
export class StreamRelayService implements StreamRelay {
  readonly callbackUrl: string;
  private readonly logger: ILogger;
  private readonly cryptoService: ICryptoService;
  private readonly secret: string;
  private readonly timeouts: RelayChannelTimeouts;
  private readonly channels = new Map<string, RelayChannelBuffer>();

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.CryptoService) cryptoService: ICryptoService
  ) {
    this.logger = logger.createChild('StreamRelayService');
    this.cryptoService = cryptoService;
    this.secret = config.streaming.internalSecret;
    this.callbackUrl = `${config.server.publicBaseUrl.replace(/\/+$/, '')}/internal/streaming`;
    this.timeouts = {
      firstDataTimeoutMs: config.streaming.firstDataTimeoutMs,
      idleTimeoutMs: config.streaming.idleTimeoutMs,
      totalTimeoutMs: config.streaming.totalTimeoutMs
    };
  }

  openChannel(): RelayChannel {
    const id = this.cryptoService.generateId();
    const channel = new RelayChannelBuffer(id, this.timeouts, (channelId, state) => {
      if (this.channels.delete(channelId)) {
        this.logger.debug('Relay channel released', { metadata: { channel: channelId, state } });
      }
    });

    this.channels.set(id, channel);
    return channel;
  }

  verifySecret(provided: string | undefined): boolean {
    return this.cryptoService.secretsMatch(provided ?? '', this.secret);
  }

  pushData(channelId: string, data: string): boolean {
    return this.channels.get(channelId)?.push(data) ?? false;
  }

  pushError(channelId: string, message: string): boolean {
    const accepted = this.channels.get(channelId)?.fail(new AdaptorError(message, 502)) ?? false;
    if (accepted) {
      this.logger.warn('Remote function reported a streaming error', { metadata: { channel: channelId, message } });
    }
    return accepted;
  }

  complete(channelId: string): boolean {
    return this.channels.get(channelId)?.complete() ?? false;
  }

  activeChannels(): number {
    return this.channels.size;
  }
}
