import { injectable, inject } from 'inversify';
import { Type, type Static } from '@sinclair/typebox';
import { TYPES } from '../../core/container/types';
import type { GatewayConfig } from '../../core/config';
import { ConfigError } from '../../core/errors';
import type { ILogger } from '../../core/logging';
import type { UserIdentity } from '../../domain/entities';
import type { IdentityProvider } from '../../domain/repositories';
import { fetchJson, HttpStatusError } from '../adaptors/base/http';

const INTROSPECTION_TIMEOUT_MS = 10_000;

const IntrospectionSchema = Type.Object({
  active: Type.Boolean(),
  username: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  email: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  exp: Type.Optional(Type.Number()),
  groups: Type.Optional(Type.Array(Type.String()))
});

/**
 * OAuth 2.0 token introspection (RFC 7662) against the configured
 * authorization server, authenticated with the gateway's client credentials.
 */
@injectable()
export class HttpIdentityProvider implements IdentityProvider {
  private readonly logger: ILogger;
  private readonly introspectionUrl: string;
  private readonly basicAuth: string;

  constructor(
    @inject(TYPES.GatewayConfig) config: GatewayConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.createChild('HttpIdentityProvider');
    this.introspectionUrl = config.auth.introspectionUrl;
    this.basicAuth = Buffer.from(`${config.auth.clientId}:${config.auth.clientSecret}`).toString('base64');
  }

  async introspect(token: string): Promise<UserIdentity | undefined> {
    if (!this.introspectionUrl) {
      throw new ConfigError('AUTH_INTROSPECTION_URL is not configured');
    }

    let introspection: Static<typeof IntrospectionSchema>;
    try {
      introspection = await fetchJson(this.introspectionUrl, IntrospectionSchema, {
        method: 'POST',
        headers: { Authorization: `Basic ${this.basicAuth}` },
        form: { token },
        signal: AbortSignal.timeout(INTROSPECTION_TIMEOUT_MS)
      });
    } catch (error) {
      if (error instanceof HttpStatusError && (error.status === 400 || error.status === 401)) {
        this.logger.warn('Token introspection rejected', { metadata: { status: error.status } });
        return undefined;
      }
      throw error;
    }

    if (!introspection.active || !introspection.username) {
      return undefined;
    }

    if (introspection.exp !== undefined && introspection.exp * 1000 <= Date.now()) {
      return undefined;
    }

    return {
      username: introspection.username,
      name: introspection.name ?? introspection.username,
      email: introspection.email ?? undefined,
      groups: introspection.groups ?? []
    };
  }
}
