/**
 * Health check endpoint
 *
 * GET /health - Returns system health status and component states
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { getSchemaVersion } from "../../db/database";
import { logAppError } from "../../utils/logger";
import type { HealthResponse } from "../types/api.types";

const health = new Hono();

/**
 * GET /health
 * Returns health status of all system components
 */
health.get("/", (c) => {
    const ctx = getAppContext();
    const bus = ctx.tickBus.getStats();
    const aggregation = ctx.aggregationEngine.getStats();
    const hub = ctx.hub.getStats();
    const feeds = ctx.feeds.map((feed) => feed.getStatus());

    const response: HealthResponse = {
        status: "healthy",
        timestamp: new Date().toISOString(),
        version: "0.1.0",
        components: {
            database: "healthy",
            feeds: feeds.map((f) => ({
                exchange: f.exchange,
                connected: f.connected,
                ticksReceived: f.ticksReceived,
                malformed: f.malformed,
            })),
            snapshot: ctx.snapshotService.getStatus().isRunning ? "running" : "stopped",
        },
        stats: {
            tickBus: {
                published: bus.published,
                consumers: bus.consumers.map((q) => ({ name: q.name, pending: q.pending, errors: q.errors })),
            },
            aggregation: {
                quotes: aggregation.quotes,
                trades: aggregation.trades,
                outOfOrder: aggregation.outOfOrder,
            },
            matching: ctx.matchingEngine.getStats(),
            websocket: {
                connections: hub.connections,
                authenticatedConnections: hub.authenticatedConnections,
                dropped: hub.dropped,
                malformed: hub.malformed,
            },
        },
    };

    // A running feed that is not connected degrades the service
    if (feeds.some((f) => f.isRunning && !f.connected)) {
        response.status = "degraded";
    }

    // Check database by attempting a simple query
    try {
        getSchemaVersion(ctx.db.db);
    } catch (error) {
        response.components.database = "unhealthy";
        response.status = "unhealthy";
        logAppError("Health", "Database check failed", error);
    }

    // Set appropriate HTTP status code
    const httpStatus = response.status === "unhealthy" ? 503 : 200;

    return c.json(response, httpStatus);
});

export { health };
