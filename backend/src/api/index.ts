/**
 * Main API setup
 *
 * Creates and configures the Hono application with all routes and middleware
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { MiddlewareHandler } from "hono";

import { rateLimiter, errorHandler } from "./middleware";
import { account, auth, health, info, orders } from "./routes";

// ============================================
// Custom Logger with Timestamps
// ============================================

/**
 * Request logging middleware
 * Skipped in tests to keep output readable
 */
const timestampedLogger = (): MiddlewareHandler => {
    return async (c, next) => {
        if (process.env.NODE_ENV === "test") {
            await next();
            return;
        }

        const method = c.req.method;
        const path = c.req.path;
        const start = Date.now();
        const authLabel = c.req.header("Authorization") ? "bearer" : "anonymous";

        console.log(`[API] --> ${method} ${path} (${authLabel})`);

        await next();

        const duration = Date.now() - start;
        const status = c.res.status;
        const statusLabel = status >= 400 ? `${status} ERROR` : `${status}`;
        console.log(`[API] <-- ${method} ${path} ${statusLabel} ${duration}ms`);
    };
};

// Create main Hono app
const app = new Hono();

// ============================================
// Global Middleware
// ============================================

app.use("*", timestampedLogger());

app.use(
    "*",
    cors({
        origin: "*",
        allowHeaders: ["Content-Type", "Authorization"],
        allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
        exposeHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After"],
        maxAge: 600, // 10 minutes preflight cache
    }),
);

// 300 requests per minute on everything except health checks
app.use(
    "*",
    rateLimiter({
        maxRequests: 300,
        windowMs: 60000,
        skip: (c) => c.req.path === "/health",
    }),
);

// ============================================
// Routes
// ============================================

app.route("/health", health);
app.route("/info", info);
app.route("/orders", orders);
app.route("/", auth);
app.route("/", account);

// ============================================
// Error Handling
// ============================================

app.onError(errorHandler);

app.notFound((c) => {
    return c.json(
        {
            error: "Not found",
            code: "NOT_FOUND",
        },
        404,
    );
});

// ============================================
// Exports
// ============================================

export { app };
export { stopRateLimitCleanup, clearRateLimitStore } from "./middleware";
