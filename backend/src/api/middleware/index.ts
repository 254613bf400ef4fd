/**
 * Barrel exports for middleware
 */

export { userAuth, parseBearerToken } from "./auth.middleware";
export {
    rateLimiter,
    stopRateLimitCleanup,
    clearRateLimitStore,
    type RateLimitConfig,
} from "./rate-limit.middleware";
export { errorHandler } from "./error.middleware";
