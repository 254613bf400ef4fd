/**
 * Client stream specifications
 *
 * A subscribe/unsubscribe frame resolves once into a tagged StreamSpec and a
 * computation key such as `klines:BTCUSDT:all:1m`. Routing only compares keys.
 */

import type { ExchangeScope, KlineInterval } from "../../types/market";
import { ALL_EXCHANGES, KLINE_INTERVALS, isKlineInterval } from "../../types/market";

export type MarketStreamName = "best_touch" | "trades" | "klines" | "ewma";
export type UserStreamName = "orders" | "balance";
export type StreamName = MarketStreamName | UserStreamName;

export const STREAM_NAMES: readonly StreamName[] = ["best_touch", "trades", "klines", "ewma", "orders", "balance"];

export type StreamSpec =
    | { stream: "best_touch"; symbol: string; scope: ExchangeScope }
    | { stream: "trades"; symbol: string; scope: ExchangeScope }
    | { stream: "klines"; symbol: string; scope: ExchangeScope; interval: KlineInterval }
    | { stream: "ewma"; symbol: string; scope: ExchangeScope; halfLife: number }
    | { stream: "orders" }
    | { stream: "balance" };

/** Known market universe used to validate specs */
export interface StreamUniverse {
    symbols: ReadonlySet<string>;
    exchanges: ReadonlySet<string>;
}

export type StreamSpecResult = { ok: true; spec: StreamSpec; key: string } | { ok: false; message: string };

/**
 * Computation key for a spec
 *
 * @example
 * streamKey({ stream: "ewma", symbol: "BTCUSDT", scope: "all", halfLife: 30 }) // "ewma:BTCUSDT:all:30"
 */
export function streamKey(spec: StreamSpec): string {
    switch (spec.stream) {
        case "best_touch":
        case "trades":
            return `${spec.stream}:${spec.symbol}:${spec.scope}`;
        case "klines":
            return `klines:${spec.symbol}:${spec.scope}:${spec.interval}`;
        case "ewma":
            return `ewma:${spec.symbol}:${spec.scope}:${spec.halfLife}`;
        case "orders":
        case "balance":
            return spec.stream;
    }
}

/**
 * Parse the stream fields of a client frame
 */
export function parseStreamSpec(frame: Record<string, unknown>, universe: StreamUniverse): StreamSpecResult {
    const stream = STREAM_NAMES.find((name) => name === frame.stream);
    if (!stream) {
        return { ok: false, message: `stream must be one of: ${STREAM_NAMES.join(", ")}` };
    }

    if (stream === "orders" || stream === "balance") {
        return resolved({ stream });
    }

    if (typeof frame.symbol !== "string" || !universe.symbols.has(frame.symbol.toUpperCase())) {
        return { ok: false, message: `symbol must be one of: ${[...universe.symbols].join(", ")}` };
    }
    const symbol = frame.symbol.toUpperCase();

    let scope: ExchangeScope = ALL_EXCHANGES;
    if (frame.exchange !== undefined && frame.exchange !== null) {
        const exchange = typeof frame.exchange === "string" ? frame.exchange.toLowerCase() : "";
        if (exchange !== ALL_EXCHANGES && !universe.exchanges.has(exchange)) {
            return { ok: false, message: `exchange must be "all" or one of: ${[...universe.exchanges].join(", ")}` };
        }
        scope = exchange;
    }

    switch (stream) {
        case "best_touch":
        case "trades":
            return resolved({ stream, symbol, scope });
        case "klines":
            if (!isKlineInterval(frame.interval)) {
                return { ok: false, message: `interval must be one of: ${Object.keys(KLINE_INTERVALS).join(", ")}` };
            }
            return resolved({ stream, symbol, scope, interval: frame.interval });
        case "ewma": {
            const halfLife = frame.half_life;
            if (typeof halfLife !== "number" || !Number.isFinite(halfLife) || halfLife <= 0) {
                return { ok: false, message: "half_life must be a positive number of seconds" };
            }
            return resolved({ stream, symbol, scope, halfLife });
        }
    }
}

function resolved(spec: StreamSpec): StreamSpecResult {
    return { ok: true, spec, key: streamKey(spec) };
}
