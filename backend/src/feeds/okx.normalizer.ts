/**
 * OKX v5 public channel normalizer (tickers + trades)
 */

import type { Tick } from "../types/market";
import { fromDashedInstrument, toDashedInstrument } from "../utils/symbols";
import type { FeedNormalizer, NormalizeResult } from "./types";
import { isRecord, parseJson, toFiniteNumber, toNonNegativeNumber, toPositiveNumber } from "./types";

const OKX_PUBLIC_URL = "wss://ws.okx.com:8443/ws/v5/public";

export class OkxNormalizer implements FeedNormalizer {
    readonly exchange = "okx";

    constructor(private readonly baseUrl: string = OKX_PUBLIC_URL) {}

    url(): string {
        return this.baseUrl;
    }

    subscribeFrames(symbols: readonly string[]): string[] {
        const args = symbols.flatMap((s) => {
            const instId = toDashedInstrument(s);
            return [
                { channel: "tickers", instId },
                { channel: "trades", instId },
            ];
        });
        return [JSON.stringify({ op: "subscribe", args })];
    }

    normalize(raw: string, receivedAt: number): NormalizeResult {
        if (raw === "pong") {
            return { ticks: [], malformed: 0 };
        }

        const msg = parseJson(raw);
        if (!isRecord(msg)) {
            return { ticks: [], malformed: 1 };
        }

        // {"event":"subscribe","arg":{...}} / {"event":"error",...}
        if (typeof msg.event === "string") {
            return { ticks: [], malformed: 0 };
        }

        const channel = isRecord(msg.arg) && typeof msg.arg.channel === "string" ? msg.arg.channel : "";
        if (!Array.isArray(msg.data) || (channel !== "tickers" && channel !== "trades")) {
            return { ticks: [], malformed: 1 };
        }

        const result: NormalizeResult = { ticks: [], malformed: 0 };
        for (const entry of msg.data) {
            const tick = isRecord(entry)
                ? channel === "tickers"
                    ? this.toQuote(entry, receivedAt)
                    : this.toTrade(entry, receivedAt)
                : null;
            if (tick) {
                result.ticks.push(tick);
            } else {
                result.malformed++;
            }
        }
        return result;
    }

    private toQuote(entry: Record<string, unknown>, receivedAt: number): Tick | null {
        const symbol = typeof entry.instId === "string" ? fromDashedInstrument(entry.instId) : "";
        const bid = toPositiveNumber(entry.bidPx);
        const ask = toPositiveNumber(entry.askPx);
        const bidSize = toNonNegativeNumber(entry.bidSz);
        const askSize = toNonNegativeNumber(entry.askSz);
        if (!symbol || bid === null || ask === null || bidSize === null || askSize === null) {
            return null;
        }
        const timestamp = toFiniteNumber(entry.ts) ?? receivedAt;
        return { kind: "quote", exchange: this.exchange, symbol, bid, bidSize, ask, askSize, timestamp };
    }

    private toTrade(entry: Record<string, unknown>, receivedAt: number): Tick | null {
        const symbol = typeof entry.instId === "string" ? fromDashedInstrument(entry.instId) : "";
        const price = toPositiveNumber(entry.px);
        const size = toPositiveNumber(entry.sz);
        if (!symbol || price === null || size === null) {
            return null;
        }
        const timestamp = toFiniteNumber(entry.ts) ?? receivedAt;
        return { kind: "trade", exchange: this.exchange, symbol, price, size, timestamp };
    }
}
