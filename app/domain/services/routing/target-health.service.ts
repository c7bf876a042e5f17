import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { GatewayConfig } from '../../../core/config';

/**
 * Per-target cooldown after a failure. Targets inside their cooldown window
 * are still tried, but only after every healthy target.
 */
@injectable()
export class TargetHealthService {
  private readonly cooldownMs: number;
  private readonly lastFailure = new Map<string, number>();

  constructor(@inject(TYPES.GatewayConfig) config: GatewayConfig) {
    this.cooldownMs = config.router.cooldownMs;
  }

  markFailure(endpointSlug: string, at: number = Date.now()): void {
    this.lastFailure.set(endpointSlug, at);
  }

  markSuccess(endpointSlug: string): void {
    this.lastFailure.delete(endpointSlug);
  }

  isCoolingDown(endpointSlug: string, now: number = Date.now()): boolean {
    const failedAt = this.lastFailure.get(endpointSlug);
    return failedAt !== undefined && now - failedAt < this.cooldownMs;
  }

  /**
   * Healthy targets keep their configured order. Cooling-down targets follow,
   * the most recently failed last.
   */
  order<T>(items: readonly T[], slugOf: (item: T) => string, now: number = Date.now()): T[] {
    const healthy: T[] = [];
    const cooling: { item: T; failedAt: number }[] = [];

    for (const item of items) {
      const slug = slugOf(item);
      const failedAt = this.lastFailure.get(slug);
      if (failedAt !== undefined && now - failedAt < this.cooldownMs) {
        cooling.push({ item, failedAt });
      } else {
        healthy.push(item);
      }
    }

    cooling.sort((a, b) => a.failedAt - b.failedAt);
    return [...healthy, ...cooling.map(entry => entry.item)];
  }
}
