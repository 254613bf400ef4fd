/**
 * Unit tests for KlineSeries
 *
 * Tests:
 * - Epoch-aligned buckets
 * - OHLCV accumulation
 * - Gap filling on trades and on the wall clock
 */

import { describe, it, expect } from "vitest";
import { KlineSeries, bucketStartOf } from "../../../src/market/kline";
import type { KlineBucket, MarketEvent } from "../../../src/types";

function klines(events: MarketEvent[]): Array<{ type: string; kline: KlineBucket }> {
    const result: Array<{ type: string; kline: KlineBucket }> = [];
    for (const event of events) {
        if (event.type === "kline.updated" || event.type === "kline.closed") {
            result.push({ type: event.type, kline: event.kline });
        }
    }
    return result;
}

describe("KlineSeries", () => {
    it("should align bucket starts to the epoch", () => {
        expect(bucketStartOf(61_500, 60_000)).toBe(60_000);
        expect(bucketStartOf(60_000, 60_000)).toBe(60_000);
        expect(bucketStartOf(9_999, 10_000)).toBe(0);
    });

    it("should open a bucket on the first trade", () => {
        const series = new KlineSeries("BTCUSDT", "all", "1m");
        expect(series.get()).toBeNull();

        const events = klines(series.onTrade(100, 2, 61_500));

        expect(events).toEqual([
            {
                type: "kline.updated",
                kline: {
                    symbol: "BTCUSDT",
                    scope: "all",
                    interval: "1m",
                    open: 100,
                    high: 100,
                    low: 100,
                    close: 100,
                    volume: 2,
                    bucketStart: 60_000,
                    bucketEnd: 120_000,
                    closed: false,
                },
            },
        ]);
    });

    it("should accumulate OHLCV inside a bucket", () => {
        const series = new KlineSeries("BTCUSDT", "all", "10s");
        series.onTrade(100, 1, 1_000);
        series.onTrade(105, 0.5, 2_000);
        series.onTrade(95, 0.25, 3_000);
        series.onTrade(101, 0.25, 9_999);

        expect(series.get()).toMatchObject({ open: 100, high: 105, low: 95, close: 101, volume: 2, bucketStart: 0 });
    });

    it("should close the bucket and fill skipped windows with flat buckets", () => {
        const series = new KlineSeries("BTCUSDT", "binance", "1s");
        series.onTrade(100, 1, 500);
        series.onTrade(102, 1, 700);

        const events = klines(series.onTrade(110, 3, 3_200));

        expect(events.map((e) => [e.type, e.kline.bucketStart])).toEqual([
            ["kline.closed", 0],
            ["kline.closed", 1_000],
            ["kline.closed", 2_000],
            ["kline.updated", 3_000],
        ]);
        expect(events[0].kline).toMatchObject({ open: 100, close: 102, volume: 2, closed: true });
        expect(events[1].kline).toMatchObject({ open: 102, high: 102, low: 102, close: 102, volume: 0, closed: true });
        expect(events[3].kline).toMatchObject({ open: 110, close: 110, volume: 3, closed: false });
    });

    it("should partition time with no gaps or overlaps", () => {
        const series = new KlineSeries("BTCUSDT", "all", "1s");
        const closed: KlineBucket[] = [];
        const trades = [150, 400, 2_100, 2_900, 7_050, 7_060, 12_000];

        for (const t of trades) {
            for (const e of klines(series.onTrade(100, 1, t))) {
                if (e.type === "kline.closed") closed.push(e.kline);
            }
        }

        expect(closed.map((k) => k.bucketStart)).toEqual([0, 1_000, 2_000, 3_000, 4_000, 5_000, 6_000, 7_000, 8_000, 9_000, 10_000, 11_000]);
        for (let i = 1; i < closed.length; i++) {
            expect(closed[i].bucketStart).toBe(closed[i - 1].bucketEnd);
        }
        expect(series.get()?.bucketStart).toBe(12_000);
    });

    it("should ignore trades before the open bucket", () => {
        const series = new KlineSeries("BTCUSDT", "all", "1s");
        series.onTrade(100, 1, 5_500);

        expect(series.onTrade(90, 1, 4_900)).toEqual([]);
        expect(series.get()).toMatchObject({ low: 100, volume: 1 });
    });

    it("should roll empty windows forward on the wall clock", () => {
        const series = new KlineSeries("BTCUSDT", "all", "1s");
        series.onTrade(100, 1, 500);

        expect(series.advanceClock(999)).toEqual([]);

        const events = klines(series.advanceClock(2_000));
        expect(events.map((e) => [e.type, e.kline.bucketStart, e.kline.volume])).toEqual([
            ["kline.closed", 0, 1],
            ["kline.closed", 1_000, 0],
            ["kline.updated", 2_000, 0],
        ]);
        expect(series.get()).toMatchObject({ open: 100, close: 100, bucketStart: 2_000, volume: 0 });
    });

    it("should not roll a series that has no trades yet", () => {
        const series = new KlineSeries("BTCUSDT", "all", "1s");
        expect(series.advanceClock(10_000)).toEqual([]);
    });
});
