/**
 * Throttler Limits Helper
 *
 * Rate limit windows derived from APP_RATE_LIMIT_PER_MINUTE. Shared by
 * ThrottlerConfigService and the rate limiting tests.
 */

/**
 * Throttler configuration for a single rate limit window
 */
export interface ThrottlerConfig {
  /** Name of the throttler ('default' or 'burst') */
  name: string;

  /** Window duration in milliseconds */
  ttl: number;

  /** Maximum number of requests allowed in the window */
  limit: number;
}

export interface ThrottlerLimits {
  default: ThrottlerConfig;
  burst: ThrottlerConfig;
}

const ONE_MINUTE_MS = 60 * 1000;
const BURST_WINDOW_MS = 10 * 1000;
const MAX_BURST_LIMIT = 10;

export function calculateDefaultLimit(rateLimitPerMinute: number): ThrottlerConfig {
  return {
    name: 'default',
    ttl: ONE_MINUTE_MS,
    limit: rateLimitPerMinute,
  };
}

/**
 * Burst limit: roughly ten seconds' share of the per-minute limit, capped at 10
 * and never below 1.
 *
 * @example
 * calculateBurstLimit(100) // { name: 'burst', ttl: 10000, limit: 10 }
 * calculateBurstLimit(30)  // { name: 'burst', ttl: 10000, limit: 5 }
 * calculateBurstLimit(3)   // { name: 'burst', ttl: 10000, limit: 1 }
 */
export function calculateBurstLimit(rateLimitPerMinute: number): ThrottlerConfig {
  return {
    name: 'burst',
    ttl: BURST_WINDOW_MS,
    limit: Math.max(1, Math.min(MAX_BURST_LIMIT, Math.floor(rateLimitPerMinute / 6))),
  };
}

export function calculateThrottlerLimits(rateLimitPerMinute: number): ThrottlerLimits {
  return {
    default: calculateDefaultLimit(rateLimitPerMinute),
    burst: calculateBurstLimit(rateLimitPerMinute),
  };
}

/**
 * Throttler windows in the array form ThrottlerModule expects: [default, burst]
 */
export function getThrottlerConfigsArray(rateLimitPerMinute: number): ThrottlerConfig[] {
  const limits = calculateThrottlerLimits(rateLimitPerMinute);
  return [limits.default, limits.burst];
}
