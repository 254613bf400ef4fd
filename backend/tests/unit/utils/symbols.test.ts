/**
 * Unit tests for symbol helpers
 */

import { describe, it, expect } from "vitest";
import { assetsOf, fromDashedInstrument, splitSymbol, toDashedInstrument } from "../../../src/utils/symbols";

describe("splitSymbol", () => {
    it("should split on known quote assets", () => {
        expect(splitSymbol("BTCUSDT")).toEqual({ base: "BTC", quote: "USDT" });
        expect(splitSymbol("ethusdc")).toEqual({ base: "ETH", quote: "USDC" });
        expect(splitSymbol("SOLUSD")).toEqual({ base: "SOL", quote: "USD" });
    });

    it("should fall back to a three-letter quote", () => {
        expect(splitSymbol("ETHBTC")).toEqual({ base: "ETH", quote: "BTC" });
    });
});

describe("assetsOf", () => {
    it("should list each asset once in first-seen order", () => {
        expect(assetsOf(["BTCUSDT", "ETHUSDT", "ETHBTC"])).toEqual(["BTC", "USDT", "ETH"]);
    });
});

describe("dashed instruments", () => {
    it("should convert both ways", () => {
        expect(toDashedInstrument("BTCUSDT")).toBe("BTC-USDT");
        expect(fromDashedInstrument("btc-usdt")).toBe("BTCUSDT");
    });
});
