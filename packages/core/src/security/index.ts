export {
  DEFAULT_RATE_LIMIT, RATE_LIMITS, InMemoryRateLimitStore,
  checkRateLimit, clearRateLimit, getRemaining, getResetTime, cleanupRateLimits,
  enforceRateLimit, rateLimitHeaders,
  setRateLimitStore, getRateLimitStore,
} from './rate-limiter';
export type { RateLimitStore, RateLimitConfig, RateLimitResult } from './rate-limiter';
