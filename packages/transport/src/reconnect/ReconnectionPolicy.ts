import { parseOptions, ReconnectOptionsSchema, type ReconnectOptions, type ReconnectSettings } from '../config/options';

/**
 * Decides how long to wait before retry `attempt` (1-based) and when to stop
 * retrying altogether.
 */
export interface ReconnectionPolicy {
  nextDelay(attempt: number): number;
  shouldGiveUp(attempt: number): boolean;
}

/**
 * delay = min(baseDelayMs × multiplier^(attempt-1), maxDelayMs), optionally
 * spread by ±jitterRatio. With the defaults: 1s, 2s, 4s, 8s, 16s, 30s, 30s, …
 */
export class ExponentialBackoffPolicy implements ReconnectionPolicy {
  readonly settings: ReconnectSettings;

  constructor(
    options: ReconnectOptions = {},
    private readonly random: () => number = Math.random
  ) {
    this.settings = parseOptions(ReconnectOptionsSchema, options, 'reconnect');
  }

  nextDelay(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitterRatio } = this.settings;
    const exponent = Math.max(0, attempt - 1);
    const delay = Math.min(baseDelayMs * Math.pow(multiplier, exponent), maxDelayMs);
    if (jitterRatio === 0) return delay;

    const spread = delay * jitterRatio * (2 * this.random() - 1);
    return Math.max(0, Math.round(delay + spread));
  }

  shouldGiveUp(attempt: number): boolean {
    const { maxAttempts } = this.settings;
    return maxAttempts !== undefined && attempt > maxAttempts;
  }
}

/** Wraps `policy` so that it gives up once `maxAttempts` retries have failed. */
export function withAttemptCeiling(policy: ReconnectionPolicy, maxAttempts: number): ReconnectionPolicy {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return {
    nextDelay: (attempt) => policy.nextDelay(attempt),
    shouldGiveUp: (attempt) => attempt > maxAttempts || policy.shouldGiveUp(attempt),
  };
}
