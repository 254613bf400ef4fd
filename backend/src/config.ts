/**
 * Environment configuration for the marketrelay backend
 * Loads from environment variables with sensible defaults for development
 */

import Decimal from "decimal.js";

export interface MarketRelayConfig {
    // Server configuration
    port: number;
    host: string;
    env: "development" | "production" | "test";

    // Token issuance
    auth: {
        jwtSecret: string;
        jwtExpiresMinutes: number;
    };

    // Database configuration
    database: {
        path: string; // SQLite file path
    };

    // Market universe
    market: {
        exchanges: string[];
        symbols: string[];
        klineTickMs: number; // Wall-clock cadence that rolls empty kline buckets forward
        klineGraceMs: number; // How far that clock trails, for trades delivered late
    };

    // Exchange feed connections
    feeds: {
        enabled: boolean;
        initialReconnectDelayMs: number; // default: 1000
        maxReconnectDelayMs: number; // default: 30000
        reconnectMultiplier: number; // default: 2
        pingIntervalMs: number; // default: 20000
    };

    // Client WebSocket delivery
    websocket: {
        outboundQueueSize: number; // Frames buffered per connection before drop-oldest
        idleTimeoutMs: number;
        logDeliveries: boolean;
    };

    // Matching engine state snapshots
    snapshot: {
        intervalMs: number;
    };

    // Decimal.js configuration
    decimal: {
        precision: number;
        rounding: Decimal.Rounding;
    };
}

function getEnvString(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === "true";
}

function getEnvList(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function getEnvMode(): MarketRelayConfig["env"] {
    const value = getEnvString("NODE_ENV", "development");
    return value === "production" || value === "test" ? value : "development";
}

export function loadConfig(): MarketRelayConfig {
    return {
        port: getEnvNumber("PORT", 8000),
        host: getEnvString("HOST", "0.0.0.0"),
        env: getEnvMode(),

        auth: {
            jwtSecret: getEnvString("JWT_SECRET", "dev-secret-change-in-prod"),
            jwtExpiresMinutes: getEnvNumber("JWT_EXPIRES_MINUTES", 60 * 24),
        },

        database: {
            path: getEnvString("DATABASE_PATH", "./data/marketrelay.db"),
        },

        market: {
            exchanges: getEnvList("EXCHANGES", ["binance", "okx"]).map((e) => e.toLowerCase()),
            symbols: getEnvList("SYMBOLS", ["BTCUSDT", "ETHUSDT", "SOLUSDT", "ADAUSDT", "XRPUSDT"]).map((s) => s.toUpperCase()),
            klineTickMs: getEnvNumber("KLINE_TICK_MS", 1000),
            klineGraceMs: getEnvNumber("KLINE_GRACE_MS", 500),
        },

        feeds: {
            enabled: getEnvBoolean("FEEDS_ENABLED", true),
            initialReconnectDelayMs: getEnvNumber("FEED_INITIAL_RECONNECT_MS", 1000),
            maxReconnectDelayMs: getEnvNumber("FEED_MAX_RECONNECT_MS", 30000),
            reconnectMultiplier: getEnvNumber("FEED_RECONNECT_MULTIPLIER", 2),
            pingIntervalMs: getEnvNumber("FEED_PING_INTERVAL_MS", 20000),
        },

        websocket: {
            outboundQueueSize: getEnvNumber("WS_OUTBOUND_QUEUE_SIZE", 1000),
            idleTimeoutMs: getEnvNumber("WS_IDLE_TIMEOUT_MS", 60000),
            logDeliveries: getEnvBoolean("LOG_WS", false),
        },

        snapshot: {
            intervalMs: getEnvNumber("SNAPSHOT_INTERVAL_MS", 5000),
        },

        decimal: {
            precision: 20,
            rounding: Decimal.ROUND_HALF_UP,
        },
    };
}

// Singleton config instance
let configInstance: MarketRelayConfig | null = null;

export function getConfig(): MarketRelayConfig {
    if (!configInstance) {
        configInstance = loadConfig();
    }
    return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
    configInstance = null;
}
