/**
 * Application context
 * Builds and holds the wired services shared by the HTTP routes and the WebSocket host
 */

import type { MarketRelayConfig } from "./config";
import { initDatabase, type DatabaseConnection } from "./db/database";
import { UserRepository } from "./db/repositories";
import { SqliteStateStore } from "./db/state-store";
import { ExchangeFeed, TickBus, createNormalizer } from "./feeds";
import { AggregationEngine } from "./market";
import { MatchingEngine } from "./matching";
import { AuthService, SnapshotService } from "./services";
import { SubscriptionHub } from "./api/websocket/subscription-hub";

// ============================================
// Application Context
// ============================================

export interface AppContext {
    config: MarketRelayConfig;
    db: DatabaseConnection;
    repositories: {
        users: UserRepository;
    };
    authService: AuthService;
    tickBus: TickBus;
    feeds: ExchangeFeed[];
    aggregationEngine: AggregationEngine;
    matchingEngine: MatchingEngine;
    hub: SubscriptionHub;
    snapshotService: SnapshotService;
}

export interface BuildOptions {
    /** Overrides config.database.path (":memory:" in tests) */
    dbPath?: string;
    /** PBKDF2 iterations for password hashing */
    hashIterations?: number;
}

/**
 * Create every service and connect the event flow:
 * feeds -> tick bus -> {aggregation, matching} -> hub.
 * Nothing is started and the matching engine state is not loaded yet.
 */
export async function buildAppContext(config: MarketRelayConfig, options: BuildOptions = {}): Promise<AppContext> {
    const db = await initDatabase(options.dbPath ?? config.database.path);

    const repositories = {
        users: new UserRepository(db.db),
    };

    const authService = new AuthService(repositories.users, {
        jwtSecret: config.auth.jwtSecret,
        jwtExpiresMinutes: config.auth.jwtExpiresMinutes,
        hashIterations: options.hashIterations,
    });

    const aggregationEngine = new AggregationEngine(undefined, config.market.klineGraceMs);
    const matchingEngine = new MatchingEngine(config.market.symbols, new SqliteStateStore(db.db));

    const hub = new SubscriptionHub(
        aggregationEngine,
        authService,
        {
            symbols: new Set(config.market.symbols),
            exchanges: new Set(config.market.exchanges),
        },
        config.websocket,
    );

    const tickBus = new TickBus();
    tickBus.subscribe("aggregation", (event) => aggregationEngine.handleFeedEvent(event));
    tickBus.subscribe("matching", (event) => matchingEngine.handleFeedEvent(event));

    aggregationEngine.onEvent((event) => hub.publishMarketEvent(event));
    matchingEngine.onEvent((event) => hub.publishEngineEvent(event));

    const feeds = config.feeds.enabled
        ? config.market.exchanges.map(
              (exchange) =>
                  new ExchangeFeed(
                      createNormalizer(exchange),
                      config.market.symbols,
                      {
                          onTick: (tick) => tickBus.publish({ type: "tick", tick }),
                          onStale: (stale, timestamp) => tickBus.publish({ type: "stale", exchange: stale, timestamp }),
                      },
                      config.feeds,
                  ),
          )
        : [];

    const snapshotService = new SnapshotService(matchingEngine, config.snapshot);

    return {
        config,
        db,
        repositories,
        authService,
        tickBus,
        feeds,
        aggregationEngine,
        matchingEngine,
        hub,
        snapshotService,
    };
}

// Global app context (for route access)
let appContext: AppContext | null = null;

export function getAppContext(): AppContext {
    if (!appContext) {
        throw new Error("Application not initialized");
    }
    return appContext;
}

export function setAppContext(context: AppContext | null): void {
    appContext = context;
}
