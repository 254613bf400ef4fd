/**
 * Market data types for normalized exchange feeds and derived analytics
 */

/** Exchange identifier as configured (e.g. "binance", "okx") */
export type Exchange = string;

/** A single exchange, or the consolidated view across all of them */
export type ExchangeScope = Exchange | "all";

export const ALL_EXCHANGES = "all";

/** Best bid/ask update from one exchange */
export interface QuoteTick {
    readonly kind: "quote";
    readonly exchange: Exchange;
    readonly symbol: string;
    readonly bid: number;
    readonly bidSize: number;
    readonly ask: number;
    readonly askSize: number;
    readonly timestamp: number; // epoch ms
}

/** Executed trade reported by one exchange */
export interface TradeTick {
    readonly kind: "trade";
    readonly exchange: Exchange;
    readonly symbol: string;
    readonly price: number;
    readonly size: number;
    readonly timestamp: number; // epoch ms
}

/** Canonical, exchange-independent market data event */
export type Tick = QuoteTick | TradeTick;

/** Best bid/ask for a symbol within a scope */
export interface BestTouch {
    symbol: string;
    scope: ExchangeScope;
    bid: number | null;
    bidSize: number;
    ask: number | null;
    askSize: number;
    bidExchange?: Exchange;
    askExchange?: Exchange;
    stale: boolean;
    updatedAt: number;
}

/** Supported kline intervals */
export type KlineInterval = "1s" | "10s" | "1m" | "5m";

export const KLINE_INTERVALS: Record<KlineInterval, number> = {
    "1s": 1_000,
    "10s": 10_000,
    "1m": 60_000,
    "5m": 300_000,
};

export function isKlineInterval(value: unknown): value is KlineInterval {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(KLINE_INTERVALS, value);
}

/** OHLCV bucket over an epoch-aligned window */
export interface KlineBucket {
    symbol: string;
    scope: ExchangeScope;
    interval: KlineInterval;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
    bucketStart: number; // inclusive, epoch ms
    bucketEnd: number; // exclusive, epoch ms
    closed: boolean;
}

/** Time-decayed moving average of trade price */
export interface EwmaState {
    symbol: string;
    scope: ExchangeScope;
    halfLife: number; // seconds
    value: number;
    lastTimestamp: number; // epoch ms of the last trade applied
}

/** Derived events published by the aggregation engine */
export type MarketEvent =
    | { type: "best_touch.updated"; touch: BestTouch }
    | { type: "trade"; scope: ExchangeScope; trade: TradeTick }
    | { type: "kline.updated"; kline: KlineBucket }
    | { type: "kline.closed"; kline: KlineBucket }
    | { type: "ewma.updated"; ewma: EwmaState };
