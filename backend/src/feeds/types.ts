/**
 * Exchange feed types and configuration
 * Used by ExchangeFeed and the per-exchange normalizers
 */

import type { Exchange, Tick } from "../types/market";

// ============================================
// Configuration
// ============================================

/** Exchange feed connection configuration */
export interface ExchangeFeedConfig {
    /** Initial reconnection delay in ms (default: 1000) */
    initialReconnectDelayMs: number;
    /** Maximum reconnection delay in ms (default: 30000) */
    maxReconnectDelayMs: number;
    /** Reconnect multiplier for exponential backoff (default: 2) */
    reconnectMultiplier: number;
    /** Interval between protocol pings in ms (default: 20000) */
    pingIntervalMs: number;
}

/** Default configuration values */
export const DEFAULT_EXCHANGE_FEED_CONFIG: ExchangeFeedConfig = {
    initialReconnectDelayMs: 1000,
    maxReconnectDelayMs: 30000,
    reconnectMultiplier: 2,
    pingIntervalMs: 20000,
};

// ============================================
// Normalization
// ============================================

/** Outcome of normalizing one raw frame */
export interface NormalizeResult {
    ticks: Tick[];
    /** Number of payload entries that could not be turned into a tick */
    malformed: number;
}

/**
 * Converts one exchange's wire format into canonical ticks.
 * Implementations never throw on bad input.
 */
export interface FeedNormalizer {
    readonly exchange: Exchange;
    /** Endpoint to connect to for the given symbols */
    url(symbols: readonly string[]): string;
    /** Frames to send right after the socket opens */
    subscribeFrames(symbols: readonly string[]): string[];
    normalize(raw: string, receivedAt: number): NormalizeResult;
}

// ============================================
// Feed Events
// ============================================

/** Events published by exchange feeds onto the tick bus */
export type FeedEvent =
    | { type: "tick"; tick: Tick }
    | { type: "stale"; exchange: Exchange; timestamp: number };

// ============================================
// Status Types
// ============================================

/** Exchange feed status for monitoring */
export interface ExchangeFeedStatus {
    exchange: Exchange;
    isRunning: boolean;
    connected: boolean;
    /** Number of reconnection attempts since last successful connection */
    reconnectAttempts: number;
    /** Delay before the next reconnection attempt */
    nextReconnectDelayMs: number;
    ticksReceived: number;
    malformed: number;
    errors: number;
    lastTickTime: Date | null;
}

// ============================================
// Parsing Helpers
// ============================================

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse JSON without throwing; undefined means the frame was not JSON */
export function parseJson(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return undefined;
    }
}

/** Exchanges send numbers as strings; accept either */
export function toFiniteNumber(value: unknown): number | null {
    if (typeof value === "number") {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function toPositiveNumber(value: unknown): number | null {
    const n = toFiniteNumber(value);
    return n !== null && n > 0 ? n : null;
}

export function toNonNegativeNumber(value: unknown): number | null {
    const n = toFiniteNumber(value);
    return n !== null && n >= 0 ? n : null;
}
