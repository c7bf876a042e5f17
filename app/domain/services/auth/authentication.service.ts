import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { AuthError, toError } from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { ICryptoService } from '../../../core/security';
import type { UserIdentity } from '../../entities';
import type { IdentityProvider } from '../../repositories';

interface CachedIntrospection {
  readonly identity?: UserIdentity;
  readonly expiresAt: number;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/;

/**
 * Resolves bearer tokens through the identity provider. Outcomes are cached
 * by token digest, inactive tokens included, so a client retrying with a bad
 * token does not hammer the provider.
 */
@injectable()
export class AuthenticationService {
  private readonly logger: ILogger;
  private readonly provider: IdentityProvider;
  private readonly cryptoService: ICryptoService;
  private readonly cacheTtlMs: number;
  private readonly cache = new Map<string, CachedIntrospection>();

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.IdentityProvider) provider: IdentityProvider,
    @inject(TYPES.CryptoService) cryptoService: ICryptoService
  ) {
    this.logger = logger.createChild('AuthenticationService');
    this.provider = provider;
    this.cryptoService = cryptoService;
    this.cacheTtlMs = config.auth.cacheTtlMs;
  }

  async authenticate(authorization: string | undefined): Promise<UserIdentity> {
    if (!authorization) {
      throw new AuthError("Missing ('Authorization: Bearer <access-token>') header");
    }

    const match = BEARER_PATTERN.exec(authorization.trim());
    if (!match) {
      throw new AuthError('Only Authorization: Bearer <access-token> is accepted');
    }

    const identity = await this.introspect(match[1]);
    if (!identity) {
      throw new AuthError('Token is either not active or invalid');
    }

    return identity;
  }

  private async introspect(token: string): Promise<UserIdentity | undefined> {
    const key = this.cryptoService.hashToken(token);
    const now = Date.now();
    const cached = this.cache.get(key);

    if (cached && cached.expiresAt > now) {
      return cached.identity;
    }

    let identity: UserIdentity | undefined;
    try {
      identity = await this.provider.introspect(token);
    } catch (error) {
      this.logger.error('Token introspection failed', toError(error));
      throw new AuthError('Could not introspect access token');
    }

    this.evictExpired(now);
    this.cache.set(key, { identity, expiresAt: now + this.cacheTtlMs });

    if (identity) {
      this.logger.debug('User authenticated', { userId: identity.username });
    }

    return identity;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
      }
    }
  }
}
