/**
 * Main entry point for the marketrelay backend
 * Initializes all services and starts the server
 */

import { existsSync, mkdirSync, unlinkSync } from "node:fs";
import { Server } from "node:http";
import { dirname } from "node:path";
import { serve, type ServerType } from "@hono/node-server";
import Decimal from "decimal.js";
import type { WebSocketServer } from "ws";
import { app, stopRateLimitCleanup } from "./api";
import { attachWebSocketServer, WS_PATH } from "./api/websocket";
import { getConfig } from "./config";
import { buildAppContext, setAppContext, type AppContext } from "./context";
import { logApp, logAppError } from "./utils/logger";

// ============================================
// Command Line Arguments
// ============================================

interface StartupOptions {
    fresh: boolean;
}

function parseArgs(): StartupOptions {
    const args = process.argv.slice(2);
    return {
        fresh: args.includes("--fresh"),
    };
}

/**
 * Delete SQLite database files for a fresh start
 */
function resetDatabase(dbPath: string): void {
    const filesToDelete = [dbPath, `${dbPath}.tmp`];

    let deletedAny = false;
    for (const file of filesToDelete) {
        if (existsSync(file)) {
            unlinkSync(file);
            deletedAny = true;
        }
    }

    if (deletedAny) {
        logApp("Database", "Deleted existing database", { path: dbPath });
    }
}

// ============================================
// Initialization
// ============================================

interface RunningServer {
    context: AppContext;
    http: ServerType;
    wss: WebSocketServer;
    klineClock: ReturnType<typeof setInterval>;
}

async function initializeApp(options: StartupOptions): Promise<AppContext> {
    const config = getConfig();

    console.log("=".repeat(50));
    console.log("  marketrelay - Starting...");
    console.log("=".repeat(50));
    console.log(`  Environment: ${config.env}`);
    console.log(`  Server: ${config.host}:${config.port}`);
    console.log(`  Exchanges: ${config.market.exchanges.join(", ")}`);
    console.log(`  Symbols: ${config.market.symbols.join(", ")}`);
    if (options.fresh) {
        console.log("  Mode: FRESH (database will be reset)");
    }
    console.log("");

    if (options.fresh) {
        resetDatabase(config.database.path);
    }

    // Configure Decimal.js for balance and order arithmetic
    Decimal.set({
        precision: config.decimal.precision,
        rounding: config.decimal.rounding,
    });
    logApp("Decimal", "Configured", { precision: config.decimal.precision });

    if (config.database.path !== ":memory:") {
        mkdirSync(dirname(config.database.path), { recursive: true });
    }

    const context = await buildAppContext(config);

    // Balances and open orders must be restored before the first tick arrives
    context.matchingEngine.load();

    return context;
}

function startServices(context: AppContext): RunningServer {
    const { config } = context;

    for (const feed of context.feeds) {
        feed.start();
    }
    if (context.feeds.length === 0) {
        logApp("Feeds", "Exchange feeds disabled");
    }

    // Roll empty kline buckets forward on the wall clock
    const klineClock = setInterval(() => context.aggregationEngine.advanceClock(Date.now()), config.market.klineTickMs);
    klineClock.unref();

    context.snapshotService.start();
    context.hub.start();

    const http = serve({ fetch: app.fetch, port: config.port, hostname: config.host });
    if (!(http instanceof Server)) {
        throw new Error("Expected an HTTP/1.1 server for the WebSocket host");
    }
    const wss = attachWebSocketServer(http, context.hub);

    return { context, http, wss, klineClock };
}

// ============================================
// Graceful Shutdown
// ============================================

function setupGracefulShutdown(running: RunningServer): void {
    const { context } = running;
    let shuttingDown = false;

    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);

        // Stop exchange feeds first (stop receiving new ticks)
        for (const feed of context.feeds) {
            feed.stop();
        }
        clearInterval(running.klineClock);

        context.hub.shutdown();
        running.wss.close();
        running.http.close();
        stopRateLimitCleanup();

        // Final snapshot before the database closes
        context.snapshotService.stop();

        try {
            context.db.close();
            logApp("Shutdown", "Database closed");
        } catch (error) {
            logAppError("Shutdown", "Error closing database", error);
        }

        console.log("[Shutdown] Goodbye!");
        process.exit(0);
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
    try {
        const options = parseArgs();
        const context = await initializeApp(options);
        setAppContext(context);

        const running = startServices(context);
        setupGracefulShutdown(running);

        const { config } = context;
        console.log("");
        console.log("=".repeat(50));
        console.log("  marketrelay - Ready");
        console.log("=".repeat(50));
        console.log("");
        console.log(`  HTTP server listening on ${config.host}:${config.port}`);
        console.log(`  WebSocket available at ws://${config.host}:${config.port}${WS_PATH}`);
        console.log("");
        console.log("  API Endpoints:");
        console.log("    POST   /register          - Create user");
        console.log("    POST   /login             - Get access token");
        console.log("    GET    /info              - Exchanges, assets, pairs, intervals");
        console.log("    GET    /health            - Health check");
        console.log("    POST   /deposit           - Credit an asset");
        console.log("    GET    /balance           - Balances");
        console.log("    GET    /orders            - List orders");
        console.log("    POST   /orders            - Place limit order");
        console.log("    DELETE /orders/:orderId   - Cancel order");
        console.log("");
        console.log("Press Ctrl+C to stop");
    } catch (error) {
        logAppError("Startup", "Fatal error during initialization", error);
        process.exit(1);
    }
}

void main();
