/**
 * Kline series
 * OHLCV buckets over epoch-aligned windows for one (symbol, scope, interval)
 */

import type { ExchangeScope, KlineBucket, KlineInterval, MarketEvent } from "../types/market";
import { KLINE_INTERVALS } from "../types/market";

export function bucketStartOf(timestamp: number, intervalMs: number): number {
    return timestamp - (timestamp % intervalMs);
}

/**
 * Maintains the open bucket of one kline series.
 *
 * Buckets partition time with no gaps: windows without trades are emitted as
 * flat, zero-volume buckets carrying the previous close. A series exists only
 * after its first trade.
 */
export class KlineSeries {
    private current: KlineBucket | null = null;
    private readonly intervalMs: number;

    constructor(
        readonly symbol: string,
        readonly scope: ExchangeScope,
        readonly interval: KlineInterval,
    ) {
        this.intervalMs = KLINE_INTERVALS[interval];
    }

    /**
     * Apply a trade. Trades before the open bucket are late and ignored.
     */
    onTrade(price: number, size: number, timestamp: number): MarketEvent[] {
        const current = this.current;

        if (!current) {
            this.current = this.openBucket(bucketStartOf(timestamp, this.intervalMs), price, size);
            return [{ type: "kline.updated", kline: { ...this.current } }];
        }

        if (timestamp < current.bucketStart) {
            return [];
        }

        if (timestamp < current.bucketEnd) {
            current.high = Math.max(current.high, price);
            current.low = Math.min(current.low, price);
            current.close = price;
            current.volume += size;
            return [{ type: "kline.updated", kline: { ...current } }];
        }

        const events: MarketEvent[] = [{ type: "kline.closed", kline: { ...current, closed: true } }];
        const target = bucketStartOf(timestamp, this.intervalMs);
        for (let start = current.bucketEnd; start < target; start += this.intervalMs) {
            events.push({ type: "kline.closed", kline: { ...this.flatBucket(start, current.close), closed: true } });
        }

        this.current = this.openBucket(target, price, size);
        events.push({ type: "kline.updated", kline: { ...this.current } });
        return events;
    }

    /**
     * Roll the series forward to wall-clock time so windows without trades
     * still complete.
     */
    advanceClock(now: number): MarketEvent[] {
        if (!this.current || now < this.current.bucketEnd) {
            return [];
        }

        const events: MarketEvent[] = [];
        let current = this.current;
        while (now >= current.bucketEnd) {
            events.push({ type: "kline.closed", kline: { ...current, closed: true } });
            current = this.flatBucket(current.bucketEnd, current.close);
        }
        this.current = current;
        events.push({ type: "kline.updated", kline: { ...current } });
        return events;
    }

    get(): KlineBucket | null {
        return this.current ? { ...this.current } : null;
    }

    private openBucket(start: number, price: number, size: number): KlineBucket {
        return {
            symbol: this.symbol,
            scope: this.scope,
            interval: this.interval,
            open: price,
            high: price,
            low: price,
            close: price,
            volume: size,
            bucketStart: start,
            bucketEnd: start + this.intervalMs,
            closed: false,
        };
    }

    private flatBucket(start: number, close: number): KlineBucket {
        return this.openBucket(start, close, 0);
    }
}
