export { AdaptiveRateLimiter, DEFAULT_LIMITER_SETTINGS } from './adaptive-rate-limiter'
export type { AdaptiveRateLimiterOptions, LimiterMode, RateLimiterStats } from './adaptive-rate-limiter'
export { RingBuffer } from './ring-buffer'
