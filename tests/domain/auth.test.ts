import { AuthError } from '../../app/core/errors';
import { AuthenticationService, AuthorizationService } from '../../app/domain/services/auth';
import { captureError, captureSyncError, createTestConfig, SequentialCryptoService } from '../support/config';
import { TestLogger } from '../support/logger';
import { StaticIdentityProvider } from '../support/repositories';
import { ADMIN, ALICE, STAFF } from '../support/identities';

describe('AuthenticationService', () => {
  function setup(env: Record<string, string> = {}) {
    const provider = new StaticIdentityProvider({ 'alice-token': ALICE });
    const logger = new TestLogger();
    const service = new AuthenticationService(createTestConfig(env), logger, provider, new SequentialCryptoService());
    return { provider, logger, service };
  }

  it('resolves a bearer token to its identity', async () => {
    const { service } = setup();

    expect(await service.authenticate('Bearer alice-token')).toEqual(ALICE);
  });

  it.each([
    [undefined, "Missing ('Authorization: Bearer <access-token>') header"],
    ['', "Missing ('Authorization: Bearer <access-token>') header"],
    ['Basic YWxpY2U6c2VjcmV0', 'Only Authorization: Bearer <access-token> is accepted'],
    ['Bearer two tokens', 'Only Authorization: Bearer <access-token> is accepted'],
    ['Bearer unknown-token', 'Token is either not active or invalid']
  ])('rejects %p', async (header, message) => {
    const { service } = setup();

    const error = await captureError(service.authenticate(header));

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ statusCode: 401, message });
  });

  it('caches introspection results, including inactive tokens', async () => {
    const { service, provider } = setup();

    await service.authenticate('Bearer alice-token');
    await service.authenticate('Bearer alice-token');
    await captureError(service.authenticate('Bearer unknown-token'));
    await captureError(service.authenticate('Bearer unknown-token'));

    expect(provider.calls).toBe(2);
  });

  it('asks the provider again once the cache entry expires', async () => {
    const { service, provider } = setup({ AUTH_CACHE_TTL_MS: '0' });

    await service.authenticate('Bearer alice-token');
    await service.authenticate('Bearer alice-token');

    expect(provider.calls).toBe(2);
  });

  it('reports a provider failure as an authentication error', async () => {
    const { service, provider, logger } = setup();
    provider.failure = new Error('connection refused');

    const error = await captureError(service.authenticate('Bearer alice-token'));

    expect(error).toMatchObject({ statusCode: 401, message: 'Could not introspect access token' });
    expect(logger.messages('error')).toEqual(['Token introspection failed']);
  });
});

describe('AuthorizationService', () => {
  const authorization = new AuthorizationService(createTestConfig());
  const open = { allowedGroups: [], allowedDomains: [] };

  it('allows everyone when there are no restrictions', () => {
    expect(authorization.canAccess(ALICE, open)).toBe(true);
  });

  it('requires membership in one of the allowed groups', () => {
    const restrictions = { allowedGroups: ['staff', 'faculty'], allowedDomains: [] };

    expect(authorization.canAccess(STAFF, restrictions)).toBe(true);
    expect(authorization.canAccess(ALICE, restrictions)).toBe(false);
  });

  it('compares identity domains case-insensitively', () => {
    expect(authorization.canAccess(ALICE, { allowedGroups: [], allowedDomains: ['Example.org'] })).toBe(true);
    expect(authorization.canAccess(ALICE, { allowedGroups: [], allowedDomains: ['other.edu'] })).toBe(false);
  });

  it('requires every non-empty restriction to hold', () => {
    expect(authorization.canAccess(STAFF, { allowedGroups: ['staff'], allowedDomains: ['other.edu'] })).toBe(false);
  });

  it('names the resource when access is denied', () => {
    const error = captureSyncError(() =>
      authorization.assertAccess(ALICE, { allowedGroups: ['staff'], allowedDomains: [] }, 'cluster restricted')
    );

    expect(error).toMatchObject({ statusCode: 403, message: 'User alice@example.org is not allowed to access cluster restricted' });
  });

  it('recognises administrators by group', () => {
    expect(authorization.isAdmin(ADMIN)).toBe(true);
    expect(authorization.isAdmin(STAFF)).toBe(false);
    expect(captureSyncError(() => authorization.assertAdmin(ALICE))).toMatchObject({
      statusCode: 403,
      message: 'Administrator access required'
    });
  });
});
