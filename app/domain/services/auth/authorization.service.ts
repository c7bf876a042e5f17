import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';
import { AuthError } from '../../../core/errors';
import { identityDomain, type AccessRestrictions, type UserIdentity } from '../../entities';

/**
 * Each non-empty restriction list must be satisfied: membership in at least
 * one allowed group, and an identity domain among the allowed domains.
 */
@injectable()
export class AuthorizationService {
  private readonly adminGroups: readonly string[];

  constructor(@inject(TYPES.GatewayConfig) config: GatewayConfig) {
    this.adminGroups = config.auth.adminGroups;
  }

  canAccess(identity: UserIdentity, restrictions: AccessRestrictions): boolean {
    const { allowedGroups, allowedDomains } = restrictions;

    if (allowedGroups.length > 0 && !identity.groups.some(group => allowedGroups.includes(group))) {
      return false;
    }

    if (allowedDomains.length > 0) {
      const domain = identityDomain(identity);
      if (!domain || !allowedDomains.some(allowed => allowed.toLowerCase() === domain)) {
        return false;
      }
    }

    return true;
  }

  assertAccess(identity: UserIdentity, restrictions: AccessRestrictions, resource: string): void {
    if (!this.canAccess(identity, restrictions)) {
      throw new AuthError(`User ${identity.username} is not allowed to access ${resource}`, 403);
    }
  }

  isAdmin(identity: UserIdentity): boolean {
    return identity.groups.some(group => this.adminGroups.includes(group));
  }

  assertAdmin(identity: UserIdentity): void {
    if (!this.isAdmin(identity)) {
      throw new AuthError('Administrator access required', 403);
    }
  }
}
