/**
 * Unit tests for BinanceNormalizer
 */

import { describe, it, expect } from "vitest";
import { BinanceNormalizer } from "../../../src/feeds/binance.normalizer";

describe("BinanceNormalizer", () => {
    const normalizer = new BinanceNormalizer();
    const receivedAt = 1_700_000_000_500;

    it("should build a combined-stream url for every symbol", () => {
        expect(normalizer.url(["BTCUSDT", "ETHUSDT"])).toBe(
            "wss://stream.binance.com:9443/stream?streams=btcusdt@bookTicker/btcusdt@trade/ethusdt@bookTicker/ethusdt@trade",
        );
        expect(normalizer.subscribeFrames()).toEqual([]);
    });

    it("should normalize a bookTicker frame into a quote", () => {
        const raw = JSON.stringify({
            stream: "btcusdt@bookTicker",
            data: { u: 400900217, s: "BTCUSDT", b: "50000.10", B: "1.5", a: "50000.20", A: "0.25" },
        });

        const result = normalizer.normalize(raw, receivedAt);

        expect(result.malformed).toBe(0);
        expect(result.ticks).toEqual([
            {
                kind: "quote",
                exchange: "binance",
                symbol: "BTCUSDT",
                bid: 50000.1,
                bidSize: 1.5,
                ask: 50000.2,
                askSize: 0.25,
                timestamp: receivedAt,
            },
        ]);
    });

    it("should normalize a trade frame using the trade time", () => {
        const raw = JSON.stringify({
            stream: "ethusdt@trade",
            data: { e: "trade", E: 1_700_000_000_100, s: "ETHUSDT", t: 12345, p: "3000.5", q: "0.4", T: 1_700_000_000_050 },
        });

        const result = normalizer.normalize(raw, receivedAt);

        expect(result.ticks).toEqual([
            {
                kind: "trade",
                exchange: "binance",
                symbol: "ETHUSDT",
                price: 3000.5,
                size: 0.4,
                timestamp: 1_700_000_000_050,
            },
        ]);
    });

    it("should accept raw single-stream payloads", () => {
        const raw = JSON.stringify({ s: "BTCUSDT", b: "1", B: "2", a: "3", A: "4" });
        const result = normalizer.normalize(raw, receivedAt);
        expect(result.ticks).toHaveLength(1);
        expect(result.ticks[0].kind).toBe("quote");
    });

    it("should ignore subscription acknowledgements", () => {
        expect(normalizer.normalize('{"result":null,"id":1}', receivedAt)).toEqual({ ticks: [], malformed: 0 });
    });

    it("should count non-JSON frames as malformed", () => {
        expect(normalizer.normalize("not json", receivedAt)).toEqual({ ticks: [], malformed: 1 });
        expect(normalizer.normalize("[1,2]", receivedAt)).toEqual({ ticks: [], malformed: 1 });
    });

    it("should count frames with invalid numbers as malformed", () => {
        const raw = JSON.stringify({
            stream: "btcusdt@bookTicker",
            data: { s: "BTCUSDT", b: "abc", B: "1", a: "50000", A: "1" },
        });
        expect(normalizer.normalize(raw, receivedAt)).toEqual({ ticks: [], malformed: 1 });
    });

    it("should reject trades with a non-positive size", () => {
        const raw = JSON.stringify({ stream: "btcusdt@trade", data: { e: "trade", s: "BTCUSDT", p: "50000", q: "0" } });
        expect(normalizer.normalize(raw, receivedAt)).toEqual({ ticks: [], malformed: 1 });
    });

    it("should count unknown streams as malformed", () => {
        const raw = JSON.stringify({ stream: "btcusdt@depth", data: { lastUpdateId: 1 } });
        expect(normalizer.normalize(raw, receivedAt).malformed).toBe(1);
    });
});
