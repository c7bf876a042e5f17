import { TargetHealthService } from '../../app/domain/services/routing';
import { createTestConfig } from '../support/config';

describe('TargetHealthService', () => {
  const identity = (slug: string): string => slug;

  it('keeps configured order while every target is healthy', () => {
    const health = new TargetHealthService(createTestConfig());

    expect(health.order(['a', 'b', 'c'], identity, 1_000)).toEqual(['a', 'b', 'c']);
  });

  it('moves cooling-down targets to the back, most recent failure last', () => {
    const health = new TargetHealthService(createTestConfig({ ROUTER_COOLDOWN_MS: '100' }));
    health.markFailure('b', 1_000);
    health.markFailure('a', 1_010);

    expect(health.order(['a', 'b', 'c'], identity, 1_050)).toEqual(['c', 'b', 'a']);
  });

  it('restores a target once its cooldown has passed', () => {
    const health = new TargetHealthService(createTestConfig({ ROUTER_COOLDOWN_MS: '100' }));
    health.markFailure('a', 1_000);

    expect(health.isCoolingDown('a', 1_099)).toBe(true);
    expect(health.isCoolingDown('a', 1_100)).toBe(false);
    expect(health.order(['a', 'b'], identity, 1_100)).toEqual(['a', 'b']);
  });

  it('clears the cooldown on success', () => {
    const health = new TargetHealthService(createTestConfig());
    health.markFailure('a', 1_000);
    health.markSuccess('a');

    expect(health.isCoolingDown('a', 1_001)).toBe(false);
  });
});
