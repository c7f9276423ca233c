import { describe, it, expect } from 'vitest';
import { computeBaseDelay, computeRetryDelay, shouldRearm, type BackoffPolicy } from './backoff.js';

const policy: BackoffPolicy = {
  baseDelayMs:    5,
  backoffEnabled: true,
  multiplier:     2,
  maxDelayMs:     60,
  jitterMs:       0,
  maxAttempts:    5,
};

describe('computeBaseDelay()', () => {
  it('doubles per attempt and caps at the maximum', () => {
    expect([1, 2, 3, 4, 5].map((a) => computeBaseDelay(a, policy))).toEqual([5, 10, 20, 40, 60]);
  });

  it('uses the base delay for every attempt when backoff is disabled', () => {
    const flat = { ...policy, backoffEnabled: false };
    expect([1, 2, 3].map((a) => computeBaseDelay(a, flat))).toEqual([5, 5, 5]);
  });
});

describe('computeRetryDelay()', () => {
  it('adds jitter scaled by the random source', () => {
    const jittery = { ...policy, jitterMs: 10 };
    expect(computeRetryDelay(1, jittery, () => 0)).toBe(5);
    expect(computeRetryDelay(1, jittery, () => 0.5)).toBe(10);
    expect(computeRetryDelay(2, jittery, () => 0.99)).toBe(20);
  });

  it('ignores the random source when jitter is zero', () => {
    expect(computeRetryDelay(3, policy, () => 0.9)).toBe(20);
  });
});

describe('shouldRearm()', () => {
  it('re-arms until the attempt limit when backoff is enabled', () => {
    expect(shouldRearm(1, policy)).toBe(true);
    expect(shouldRearm(4, policy)).toBe(true);
    expect(shouldRearm(5, policy)).toBe(false);
  });

  it('never re-arms without backoff', () => {
    expect(shouldRearm(1, { ...policy, backoffEnabled: false })).toBe(false);
  });
});
