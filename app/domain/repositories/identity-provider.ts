import type { UserIdentity } from '../entities';

/** Resolves a bearer token to an identity, or `undefined` when the token is not active. */
export interface IdentityProvider {
  introspect(token: string): Promise<UserIdentity | undefined>;
}
