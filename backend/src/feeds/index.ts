/**
 * Exchange feeds: normalizers, connections and the tick bus
 */

import type { Exchange } from "../types/market";
import { BinanceNormalizer } from "./binance.normalizer";
import { OkxNormalizer } from "./okx.normalizer";
import type { FeedNormalizer } from "./types";

export { BinanceNormalizer } from "./binance.normalizer";
export { OkxNormalizer } from "./okx.normalizer";
export { ExchangeFeed } from "./exchange-feed";
export type { ExchangeFeedHandlers } from "./exchange-feed";
export { TickBus } from "./tick-bus";
export type { FeedEventHandler, TickBusStats, ConsumerStats } from "./tick-bus";
export * from "./types";

/**
 * Create the normalizer for a configured exchange name
 */
export function createNormalizer(exchange: Exchange): FeedNormalizer {
    switch (exchange) {
        case "binance":
            return new BinanceNormalizer();
        case "okx":
            return new OkxNormalizer();
        default:
            throw new Error(`Unsupported exchange: ${exchange}`);
    }
}
