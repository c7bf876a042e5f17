import { Elysia, type AnyElysia } from 'elysia';
import { ControllerSupport, type BaseController } from '../../app/api/controllers';
import { ErrorPlugin, RequestTracker } from '../../app/api/plugins';
import type { UserIdentity } from '../../app/domain/entities';
import { AuthenticationService } from '../../app/domain/services/auth';
import type { GatewayHarness } from './harness';
import { ALICE, BOB } from './identities';
import { StaticIdentityProvider } from './repositories';

export const BASE_URL = 'http://gateway.test';

export const TOKENS: Record<string, UserIdentity> = {
  'alice-token': ALICE,
  'bob-token': BOB
};

export function createControllerSupport(harness: GatewayHarness): ControllerSupport {
  const authentication = new AuthenticationService(
    harness.config,
    harness.logger,
    new StaticIdentityProvider(TOKENS),
    harness.cryptoService
  );
  return new ControllerSupport(
    harness.logger,
    harness.metrics,
    authentication,
    harness.authorization,
    new RequestTracker(harness.cryptoService)
  );
}

/** The controller mounted behind the same plugins the server installs. */
export function mountController(support: ControllerSupport, controller: BaseController): AnyElysia {
  return new Elysia()
    .use(support.requestTracker.createPlugin())
    .use(new ErrorPlugin(support.logger, support.metrics, support.requestTracker).createPlugin())
    .use(controller.registerRoutes());
}

export function postJson(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`${BASE_URL}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'X-Request-ID': 'req-test', ...headers },
    body: JSON.stringify(body)
  });
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}
