/**
 * Aggregation Engine
 *
 * Derives analytics from the normalized tick stream:
 * - Best touch per exchange and consolidated across exchanges
 * - Epoch-aligned klines for every configured interval
 * - Time-decayed EWMAs for the half-lives clients ask for
 */

import type { FeedEvent } from "../feeds/types";
import type {
    BestTouch,
    EwmaState,
    Exchange,
    ExchangeScope,
    KlineBucket,
    KlineInterval,
    MarketEvent,
    QuoteTick,
    Tick,
    TradeTick,
} from "../types/market";
import { ALL_EXCHANGES } from "../types/market";
import { BestTouchBook } from "./best-touch";
import { EwmaTracker } from "./ewma";
import { KlineSeries } from "./kline";

// ============================================
// Types
// ============================================

export type MarketEventListener = (event: MarketEvent) => void;

export interface AggregationStats {
    quotes: number;
    trades: number;
    /** Trades ignored for kline/EWMA because their timestamp did not advance */
    outOfOrder: number;
    staleEvents: number;
    klineSeries: number;
    ewmaTrackers: number;
}

function scopeKey(symbol: string, scope: ExchangeScope): string {
    return `${symbol}:${scope}`;
}

// ============================================
// Aggregation Engine
// ============================================

export class AggregationEngine {
    private book = new BestTouchBook();

    /** symbol:scope -> interval -> series */
    private klines = new Map<string, Map<KlineInterval, KlineSeries>>();

    /** symbol:scope -> halfLife -> tracker */
    private ewmas = new Map<string, Map<number, EwmaTracker>>();

    /** symbol:scope -> timestamp of the last trade applied to analytics */
    private lastTradeTimestamp = new Map<string, number>();

    private listeners = new Set<MarketEventListener>();

    private stats = { quotes: 0, trades: 0, outOfOrder: 0, staleEvents: 0 };

    /**
     * @param clockGraceMs how far the wall clock trails before it closes a window,
     * so trades stamped near the end of a window can still arrive
     */
    constructor(
        private readonly intervals: readonly KlineInterval[] = ["1s", "10s", "1m", "5m"],
        private readonly clockGraceMs: number = 0,
    ) {}

    // ============================================
    // Event Plumbing
    // ============================================

    /**
     * Register a listener for derived events. Returns an unsubscribe function.
     */
    onEvent(listener: MarketEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Tick bus entry point
     */
    handleFeedEvent(event: FeedEvent): void {
        if (event.type === "tick") {
            this.onTick(event.tick);
        } else {
            this.markStale(event.exchange, event.timestamp);
        }
    }

    // ============================================
    // Tick Processing
    // ============================================

    onTick(tick: Tick): void {
        if (tick.kind === "quote") {
            this.onQuote(tick);
        } else {
            this.onTrade(tick);
        }
    }

    /**
     * Flag an exchange as stale after its feed dropped
     */
    markStale(exchange: Exchange, timestamp: number): void {
        this.stats.staleEvents++;
        for (const touch of this.book.markStale(exchange, timestamp)) {
            this.emit({ type: "best_touch.updated", touch });
        }
    }

    /**
     * Roll every kline series forward to wall-clock time, less the grace period
     */
    advanceClock(now: number): void {
        const cutoff = now - this.clockGraceMs;
        for (const byInterval of this.klines.values()) {
            for (const series of byInterval.values()) {
                for (const event of series.advanceClock(cutoff)) {
                    this.emit(event);
                }
            }
        }
    }

    private onQuote(tick: QuoteTick): void {
        this.stats.quotes++;
        const { exchange, consolidated } = this.book.applyQuote(tick);
        this.emit({ type: "best_touch.updated", touch: exchange });
        this.emit({ type: "best_touch.updated", touch: consolidated });
    }

    private onTrade(tick: TradeTick): void {
        this.stats.trades++;

        for (const scope of [tick.exchange, ALL_EXCHANGES]) {
            this.emit({ type: "trade", scope, trade: tick });
        }

        for (const scope of [tick.exchange, ALL_EXCHANGES]) {
            const key = scopeKey(tick.symbol, scope);
            const last = this.lastTradeTimestamp.get(key);
            if (last !== undefined && tick.timestamp <= last) {
                this.stats.outOfOrder++;
                continue;
            }
            this.lastTradeTimestamp.set(key, tick.timestamp);

            for (const series of this.getOrCreateSeries(tick.symbol, scope).values()) {
                for (const event of series.onTrade(tick.price, tick.size, tick.timestamp)) {
                    this.emit(event);
                }
            }

            for (const tracker of this.ewmas.get(key)?.values() ?? []) {
                this.emit({ type: "ewma.updated", ewma: tracker.update(tick.price, tick.timestamp) });
            }
        }
    }

    // ============================================
    // EWMA Lifecycle
    // ============================================

    /**
     * Start (or share) an EWMA for a (symbol, scope, half-life).
     * Returns the current state, null until the first trade arrives.
     */
    retainEwma(symbol: string, scope: ExchangeScope, halfLife: number): EwmaState | null {
        const key = scopeKey(symbol, scope);
        let byHalfLife = this.ewmas.get(key);
        if (!byHalfLife) {
            byHalfLife = new Map();
            this.ewmas.set(key, byHalfLife);
        }

        let tracker = byHalfLife.get(halfLife);
        if (!tracker) {
            tracker = new EwmaTracker(symbol, scope, halfLife);
            byHalfLife.set(halfLife, tracker);
        }
        tracker.refCount++;
        return tracker.get();
    }

    /**
     * Drop one reference; the tracker is discarded when unused
     */
    releaseEwma(symbol: string, scope: ExchangeScope, halfLife: number): void {
        const key = scopeKey(symbol, scope);
        const byHalfLife = this.ewmas.get(key);
        const tracker = byHalfLife?.get(halfLife);
        if (!byHalfLife || !tracker) return;

        tracker.refCount--;
        if (tracker.refCount <= 0) {
            byHalfLife.delete(halfLife);
            if (byHalfLife.size === 0) {
                this.ewmas.delete(key);
            }
        }
    }

    // ============================================
    // Read Accessors
    // ============================================

    getBestTouch(symbol: string, scope: ExchangeScope): BestTouch | null {
        return this.book.get(symbol, scope);
    }

    getKline(symbol: string, scope: ExchangeScope, interval: KlineInterval): KlineBucket | null {
        return this.klines.get(scopeKey(symbol, scope))?.get(interval)?.get() ?? null;
    }

    getEwma(symbol: string, scope: ExchangeScope, halfLife: number): EwmaState | null {
        return this.ewmas.get(scopeKey(symbol, scope))?.get(halfLife)?.get() ?? null;
    }

    getStats(): AggregationStats {
        let klineSeries = 0;
        for (const byInterval of this.klines.values()) klineSeries += byInterval.size;
        let ewmaTrackers = 0;
        for (const byHalfLife of this.ewmas.values()) ewmaTrackers += byHalfLife.size;
        return { ...this.stats, klineSeries, ewmaTrackers };
    }

    // ============================================
    // Private Methods
    // ============================================

    private getOrCreateSeries(symbol: string, scope: ExchangeScope): Map<KlineInterval, KlineSeries> {
        const key = scopeKey(symbol, scope);
        let byInterval = this.klines.get(key);
        if (!byInterval) {
            byInterval = new Map();
            for (const interval of this.intervals) {
                byInterval.set(interval, new KlineSeries(symbol, scope, interval));
            }
            this.klines.set(key, byInterval);
        }
        return byInterval;
    }

    private emit(event: MarketEvent): void {
        for (const listener of this.listeners) {
            listener(event);
        }
    }
}
