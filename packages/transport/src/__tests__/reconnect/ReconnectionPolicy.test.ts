import { ExponentialBackoffPolicy, withAttemptCeiling } from '../../reconnect/ReconnectionPolicy';
import { ConfigError } from '../../errors';

describe('ExponentialBackoffPolicy', () => {
  it('doubles from 1s and caps at 30s', () => {
    const policy = new ExponentialBackoffPolicy();
    const delays = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => policy.nextDelay(attempt));
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000, 30_000]);
  });

  it('never gives up by default', () => {
    expect(new ExponentialBackoffPolicy().shouldGiveUp(10_000)).toBe(false);
  });

  it('gives up once attempts exceed maxAttempts', () => {
    const policy = new ExponentialBackoffPolicy({ maxAttempts: 3 });
    expect(policy.shouldGiveUp(3)).toBe(false);
    expect(policy.shouldGiveUp(4)).toBe(true);
  });

  it('spreads delays by the jitter ratio', () => {
    const low = new ExponentialBackoffPolicy({ jitterRatio: 0.5 }, () => 0);
    const high = new ExponentialBackoffPolicy({ jitterRatio: 0.5 }, () => 1);
    expect(low.nextDelay(2)).toBe(1_000);
    expect(high.nextDelay(2)).toBe(3_000);
  });

  it('validates its options', () => {
    expect(() => new ExponentialBackoffPolicy({ baseDelayMs: -1 })).toThrow(ConfigError);
    expect(() => new ExponentialBackoffPolicy({ multiplier: 0.5 })).toThrow(
      'Invalid reconnect options (multiplier: Number must be greater than or equal to 1)'
    );
  });
});

describe('withAttemptCeiling()', () => {
  it('adds a ceiling without changing the delays', () => {
    const base = new ExponentialBackoffPolicy();
    const policy = withAttemptCeiling(base, 5);
    expect(policy.nextDelay(3)).toBe(4_000);
    expect(policy.shouldGiveUp(5)).toBe(false);
    expect(policy.shouldGiveUp(6)).toBe(true);
  });

  it('rejects a non-positive ceiling', () => {
    expect(() => withAttemptCeiling(new ExponentialBackoffPolicy(), 0)).toThrow(RangeError);
  });
});
