/**
 * Binance spot combined-stream normalizer
 * wss://stream.binance.com:9443/stream?streams=btcusdt@bookTicker/btcusdt@trade
 */

import type { Tick } from "../types/market";
import type { FeedNormalizer, NormalizeResult } from "./types";
import { isRecord, parseJson, toFiniteNumber, toNonNegativeNumber, toPositiveNumber } from "./types";

const BINANCE_STREAM_URL = "wss://stream.binance.com:9443/stream";

export class BinanceNormalizer implements FeedNormalizer {
    readonly exchange = "binance";

    constructor(private readonly baseUrl: string = BINANCE_STREAM_URL) {}

    url(symbols: readonly string[]): string {
        const streams = symbols.flatMap((s) => [`${s.toLowerCase()}@bookTicker`, `${s.toLowerCase()}@trade`]).join("/");
        return `${this.baseUrl}?streams=${streams}`;
    }

    // Streams are selected in the URL
    subscribeFrames(): string[] {
        return [];
    }

    normalize(raw: string, receivedAt: number): NormalizeResult {
        const msg = parseJson(raw);
        if (!isRecord(msg)) {
            return { ticks: [], malformed: 1 };
        }

        // Subscription acknowledgement: {"result":null,"id":1}
        if ("result" in msg && "id" in msg) {
            return { ticks: [], malformed: 0 };
        }

        const stream = typeof msg.stream === "string" ? msg.stream : "";
        const data = isRecord(msg.data) ? msg.data : msg;

        let tick: Tick | null = null;
        if (stream.endsWith("@bookTicker") || (!stream && "b" in data && "a" in data)) {
            tick = this.toQuote(data, receivedAt);
        } else if (stream.endsWith("@trade") || data.e === "trade") {
            tick = this.toTrade(data, receivedAt);
        }

        return tick ? { ticks: [tick], malformed: 0 } : { ticks: [], malformed: 1 };
    }

    /**
     * bookTicker: { u, s, b, B, a, A } - spot carries no event time
     */
    private toQuote(data: Record<string, unknown>, receivedAt: number): Tick | null {
        const symbol = typeof data.s === "string" ? data.s.toUpperCase() : "";
        const bid = toPositiveNumber(data.b);
        const ask = toPositiveNumber(data.a);
        const bidSize = toNonNegativeNumber(data.B);
        const askSize = toNonNegativeNumber(data.A);
        if (!symbol || bid === null || ask === null || bidSize === null || askSize === null) {
            return null;
        }
        const timestamp = toFiniteNumber(data.E) ?? receivedAt;
        return { kind: "quote", exchange: this.exchange, symbol, bid, bidSize, ask, askSize, timestamp };
    }

    /**
     * trade: { e:"trade", s, p, q, T }
     */
    private toTrade(data: Record<string, unknown>, receivedAt: number): Tick | null {
        const symbol = typeof data.s === "string" ? data.s.toUpperCase() : "";
        const price = toPositiveNumber(data.p);
        const size = toPositiveNumber(data.q);
        if (!symbol || price === null || size === null) {
            return null;
        }
        const timestamp = toFiniteNumber(data.T) ?? receivedAt;
        return { kind: "trade", exchange: this.exchange, symbol, price, size, timestamp };
    }
}
