/**
 * Rate limiting middleware
 *
 * Fixed-window counters kept in process memory, keyed per caller.
 * Counters reset on restart.
 */

import type { Context, Next } from "hono";
import { RateLimitError } from "../types/errors";
import { parseBearerToken } from "./auth.middleware";

interface RateLimitEntry {
    count: number;
    resetAt: number;
}

export interface RateLimitConfig {
    /** Window length in ms (default: 60000) */
    windowMs: number;
    /** Requests allowed per window (default: 300) */
    maxRequests: number;
    keyGenerator: (c: Context) => string;
    skip?: (c: Context) => boolean;
}

const rateLimitStore = new Map<string, RateLimitEntry>();

let cleanupInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Bearer token first so that callers sharing an address get their own window,
 * then the first forwarded address, then a shared anonymous bucket
 */
function defaultKeyGenerator(c: Context): string {
    const token = parseBearerToken(c.req.header("Authorization"));
    if (token) return `token:${token.slice(-16)}`;

    const forwardedFor = c.req.header("x-forwarded-for");
    if (forwardedFor) {
        const clientIp = forwardedFor.split(",")[0].trim();
        if (clientIp) return `ip:${clientIp}`;
    }

    return "anonymous";
}

export function rateLimiter(config: Partial<RateLimitConfig> = {}) {
    const windowMs = config.windowMs ?? 60000;
    const maxRequests = config.maxRequests ?? 300;
    const keyGenerator = config.keyGenerator ?? defaultKeyGenerator;
    const skip = config.skip;

    if (!cleanupInterval) {
        cleanupInterval = setInterval(() => {
            const now = Date.now();
            for (const [key, entry] of rateLimitStore) {
                if (entry.resetAt < now) {
                    rateLimitStore.delete(key);
                }
            }
        }, windowMs);
        cleanupInterval.unref();
    }

    return async function rateLimitMiddleware(c: Context, next: Next): Promise<void | Response> {
        if (skip && skip(c)) {
            await next();
            return;
        }

        const key = keyGenerator(c);
        const now = Date.now();

        let entry = rateLimitStore.get(key);
        if (!entry || entry.resetAt < now) {
            entry = { count: 0, resetAt: now + windowMs };
            rateLimitStore.set(key, entry);
        }
        entry.count++;

        const remaining = Math.max(0, maxRequests - entry.count);
        const resetSeconds = Math.ceil((entry.resetAt - now) / 1000);

        c.header("X-RateLimit-Limit", String(maxRequests));
        c.header("X-RateLimit-Remaining", String(remaining));
        c.header("X-RateLimit-Reset", String(Math.ceil(entry.resetAt / 1000)));

        if (entry.count > maxRequests) {
            c.header("Retry-After", String(resetSeconds));
            throw new RateLimitError(`Rate limit exceeded. Try again in ${resetSeconds} seconds.`, resetSeconds);
        }

        await next();
    };
}

/**
 * Stop the cleanup interval (graceful shutdown)
 */
export function stopRateLimitCleanup(): void {
    if (cleanupInterval) {
        clearInterval(cleanupInterval);
        cleanupInterval = null;
    }
}

/**
 * Clear all rate limit entries (tests)
 */
export function clearRateLimitStore(): void {
    rateLimitStore.clear();
}
