/**
 * Unit tests for MatchingEngine
 *
 * Tests:
 * - Admission and reservation
 * - Matching against the consolidated touch
 * - Touch liquidity shared in submission order
 * - Order cancellation
 * - Stale exchanges
 * - Snapshot and load
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MatchingEngine } from "../../../src/matching/engine";
import {
    AlreadyTerminalError,
    InsufficientBalanceError,
    InvalidAmountError,
    InvalidOrderError,
    OrderNotFoundError,
} from "../../../src/matching/errors";
import { InMemoryStateStore } from "../../../src/matching/state-store";
import type { EngineEvent } from "../../../src/types";
import "../../setup/test-env";
import { createQuote } from "../../setup/test-fixtures";
import {
    balanceOf,
    expectBalance,
    expectDecimalEquals,
    expectOrderFilled,
    expectOrderStatus,
    expectReservationsBalanced,
} from "../../setup/test-helpers";

const SYMBOLS = ["BTCUSDT", "ETHUSDT"];

describe("MatchingEngine", () => {
    let store: InMemoryStateStore;
    let engine: MatchingEngine;
    let events: EngineEvent[];

    beforeEach(() => {
        store = new InMemoryStateStore();
        engine = new MatchingEngine(SYMBOLS, store);
        engine.load();
        events = [];
        engine.onEvent((event) => events.push(event));
    });

    describe("deposits", () => {
        it("should credit an asset", () => {
            const balance = engine.deposit("alice", "USDT", "1000");

            expectBalance(balance, 1000, 1000);
            expect(events).toEqual([{ type: "balance.updated", userId: "alice", balance }]);
        });

        it("should normalize the asset name", () => {
            engine.deposit("alice", " doge ", 5);
            expectBalance(balanceOf(engine, "alice", "DOGE"), 5, 5);
        });

        it("should reject non-positive or malformed amounts", () => {
            expect(() => engine.deposit("alice", "USDT", 0)).toThrow(InvalidAmountError);
            expect(() => engine.deposit("alice", "USDT", "-5")).toThrow(InvalidAmountError);
            expect(() => engine.deposit("alice", "USDT", "lots")).toThrow(InvalidAmountError);
            expect(() => engine.deposit("alice", "  ", 1)).toThrow(InvalidAmountError);
        });

        it("should list configured assets even when empty", () => {
            expect(engine.getBalance("alice").map((b) => b.asset)).toEqual(["BTC", "USDT", "ETH"]);
        });
    });

    describe("order admission", () => {
        it("should reserve quote currency for a buy", () => {
            engine.deposit("alice", "USDT", 1000);

            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            expectOrderStatus(order, "open");
            expectDecimalEquals(order.reserved, 500);
            expect(order.sequence).toBe(1);
            expectBalance(balanceOf(engine, "alice", "USDT"), 1000, 500);
        });

        it("should reserve base currency for a sell", () => {
            engine.deposit("alice", "BTC", 1);

            engine.submitOrder("alice", { symbol: "BTCUSDT", side: "sell", price: 50000, quantity: "0.25" });

            expectBalance(balanceOf(engine, "alice", "BTC"), 1, "0.75");
        });

        it("should accept a lower-case symbol", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "btcusdt", side: "buy", price: 100, quantity: 1 });
            expect(order.symbol).toBe("BTCUSDT");
        });

        it("should reject an order the balance cannot cover and leave it untouched", () => {
            engine.deposit("alice", "USDT", 100);

            expect(() =>
                engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" }),
            ).toThrow(InsufficientBalanceError);
            expectBalance(balanceOf(engine, "alice", "USDT"), 100, 100);
            expect(engine.listOrders("alice")).toEqual([]);
        });

        it("should apply the same balance check to sells", () => {
            engine.deposit("alice", "BTC", "0.1");
            expect(() =>
                engine.submitOrder("alice", { symbol: "BTCUSDT", side: "sell", price: 50000, quantity: "0.2" }),
            ).toThrow(InsufficientBalanceError);
        });

        it("should reject unknown symbols and invalid numbers", () => {
            engine.deposit("alice", "USDT", 1000);

            expect(() => engine.submitOrder("alice", { symbol: "DOGEUSDT", side: "buy", price: 1, quantity: 1 })).toThrow(
                InvalidOrderError,
            );
            expect(() => engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 0, quantity: 1 })).toThrow(
                "price must be positive",
            );
            expect(() =>
                engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 1, quantity: "abc" }),
            ).toThrow("Invalid quantity");
            expect(engine.getStats().orders).toBe(0);
        });

        it("should emit the order then the reserved balance", () => {
            engine.deposit("alice", "USDT", 1000);
            events = [];

            engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            expect(events.map((e) => e.type)).toEqual(["order.updated", "balance.updated"]);
        });
    });

    describe("matching", () => {
        it("should fill a resting buy when the ask reaches its price", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            engine.onQuote(createQuote({ bid: 49990, ask: 50000, askSize: 1 }));

            const filled = engine.getOrder("alice", order.orderId);
            expectOrderStatus(filled, "filled");
            expectOrderFilled(filled, "0.01");
            expectDecimalEquals(filled.reserved, 0);
            expectBalance(balanceOf(engine, "alice", "USDT"), 500, 500);
            expectBalance(balanceOf(engine, "alice", "BTC"), "0.01", "0.01");
        });

        it("should not fill a buy priced below the ask", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 49000, quantity: "0.01" });

            engine.onQuote(createQuote({ bid: 49990, ask: 50010 }));

            expectOrderStatus(engine.getOrder("alice", order.orderId), "open");
        });

        it("should execute at the order's own limit price", () => {
            engine.deposit("alice", "USDT", 1000);
            engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50100, quantity: "0.01" });

            engine.onQuote(createQuote({ ask: 50000, askSize: 1 }));

            expectBalance(balanceOf(engine, "alice", "USDT"), 499, 499);
        });

        it("should fill immediately when the touch already crosses", () => {
            engine.onQuote(createQuote({ ask: 50000, askSize: 1 }));
            engine.deposit("alice", "USDT", 1000);
            events = [];

            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            expectOrderStatus(order, "filled");
            expect(events.map((e) => e.type)).toEqual([
                "order.updated",
                "balance.updated",
                "order.updated",
                "balance.updated",
                "balance.updated",
            ]);
        });

        it("should fill a sell against the bid and credit the proceeds", () => {
            engine.deposit("alice", "BTC", 1);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "sell", price: 50000, quantity: "0.5" });

            engine.onQuote(createQuote({ bid: 50000, bidSize: 2, ask: 50010 }));

            expectOrderStatus(engine.getOrder("alice", order.orderId), "filled");
            expectBalance(balanceOf(engine, "alice", "BTC"), "0.5", "0.5");
            expectBalance(balanceOf(engine, "alice", "USDT"), 25000, 25000);
        });

        it("should partially fill when the touch is smaller than the order", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            engine.onQuote(createQuote({ ask: 50000, askSize: 0.004 }));

            const partial = engine.getOrder("alice", order.orderId);
            expectOrderStatus(partial, "partially_filled");
            expectOrderFilled(partial, "0.004");
            expectDecimalEquals(partial.reserved, 300);
            expectBalance(balanceOf(engine, "alice", "USDT"), 800, 500);
            expectReservationsBalanced(engine, "alice");
        });

        it("should give touch liquidity to the earlier order first", () => {
            engine.deposit("alice", "USDT", 10000);
            engine.deposit("bob", "USDT", 10000);
            const first = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            const second = engine.submitOrder("bob", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            engine.onQuote(createQuote({ ask: 50000, askSize: 0.01 }));

            expectOrderStatus(engine.getOrder("alice", first.orderId), "filled");
            expectOrderStatus(engine.getOrder("bob", second.orderId), "open");

            // the next quote refreshes the liquidity
            engine.onQuote(createQuote({ ask: 50000, askSize: 0.01, timestamp: 1_700_000_001_000 }));
            expectOrderStatus(engine.getOrder("bob", second.orderId), "filled");
        });

        it("should not reuse liquidity consumed by an earlier fill for a new order", () => {
            engine.deposit("alice", "USDT", 10000);
            engine.onQuote(createQuote({ ask: 50000, askSize: 0.01 }));

            const first = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            const second = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            expectOrderStatus(first, "filled");
            expectOrderStatus(second, "open");
        });

        it("should keep available plus reserved equal to total through a session", () => {
            engine.deposit("alice", "USDT", 5000);
            engine.deposit("alice", "BTC", "0.5");
            engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 49000, quantity: "0.02" });
            const sell = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "sell", price: 51000, quantity: "0.1" });
            engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50500, quantity: "0.03" });
            expectReservationsBalanced(engine, "alice");

            engine.onQuote(createQuote({ bid: 50000, ask: 50500, askSize: 0.01 }));
            expectReservationsBalanced(engine, "alice");

            engine.cancelOrder("alice", sell.orderId);
            expectReservationsBalanced(engine, "alice");

            engine.onQuote(createQuote({ bid: 51000, bidSize: 1, ask: 48000, askSize: 1 }));
            expectReservationsBalanced(engine, "alice");
        });
    });

    describe("cancellation", () => {
        it("should release the reservation", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            const cancelled = engine.cancelOrder("alice", order.orderId);

            expectOrderStatus(cancelled, "cancelled");
            expectDecimalEquals(cancelled.reserved, 0);
            expectBalance(balanceOf(engine, "alice", "USDT"), 1000, 1000);
            expect(engine.getStats().openOrders).toBe(0);
        });

        it("should release only the unfilled part of a partial fill", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            engine.onQuote(createQuote({ ask: 50000, askSize: 0.004 }));

            engine.cancelOrder("alice", order.orderId);

            expectBalance(balanceOf(engine, "alice", "USDT"), 800, 800);
            expectBalance(balanceOf(engine, "alice", "BTC"), "0.004", "0.004");
        });

        it("should refuse to cancel a terminal order", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            engine.cancelOrder("alice", order.orderId);

            expect(() => engine.cancelOrder("alice", order.orderId)).toThrow(AlreadyTerminalError);
        });

        it("should not find unknown orders or orders of another user", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            expect(() => engine.cancelOrder("alice", "missing")).toThrow(OrderNotFoundError);
            expect(() => engine.cancelOrder("bob", order.orderId)).toThrow(OrderNotFoundError);
            expect(() => engine.getOrder("bob", order.orderId)).toThrow(OrderNotFoundError);
            expectOrderStatus(engine.getOrder("alice", order.orderId), "open");
        });
    });

    describe("stale exchanges", () => {
        it("should not match against a stale exchange", () => {
            engine.onQuote(createQuote({ exchange: "binance", ask: 50000, askSize: 1 }));
            engine.handleFeedEvent({ type: "stale", exchange: "binance", timestamp: 1_700_000_000_500 });
            engine.deposit("alice", "USDT", 1000);

            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            expectOrderStatus(order, "open");
            expect(engine.getBestTouch("BTCUSDT")?.stale).toBe(true);

            engine.handleFeedEvent({ type: "tick", tick: createQuote({ exchange: "okx", ask: 50000, askSize: 1 }) });
            expectOrderStatus(engine.getOrder("alice", order.orderId), "filled");
        });

        it("should ignore trades", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });

            engine.handleFeedEvent({
                type: "tick",
                tick: { kind: "trade", exchange: "binance", symbol: "BTCUSDT", price: 49000, size: 1, timestamp: 1 },
            });

            expectOrderStatus(engine.getOrder("alice", order.orderId), "open");
        });
    });

    describe("queries", () => {
        it("should list a user's orders newest first with filters", () => {
            engine.deposit("alice", "USDT", 10000);
            engine.deposit("alice", "ETH", 10);
            const a = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 40000, quantity: "0.01" });
            const b = engine.submitOrder("alice", { symbol: "ETHUSDT", side: "sell", price: 3000, quantity: 1 });
            const c = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 41000, quantity: "0.01" });
            engine.cancelOrder("alice", c.orderId);

            expect(engine.listOrders("alice").map((o) => o.orderId)).toEqual([c.orderId, b.orderId, a.orderId]);
            expect(engine.listOrders("alice", { symbol: "btcusdt" }).map((o) => o.orderId)).toEqual([c.orderId, a.orderId]);
            expect(engine.listOrders("alice", { status: "open" }).map((o) => o.orderId)).toEqual([b.orderId, a.orderId]);
            expect(engine.listOrders("bob")).toEqual([]);
        });
    });

    describe("snapshot and load", () => {
        it("should resume balances, open orders and sequence numbers", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            expect(engine.snapshot()).toEqual({ orders: 1, balances: 1 });

            const restored = new MatchingEngine(SYMBOLS, store);
            expect(restored.load()).toEqual({ orders: 1, openOrders: 1, balances: 1 });
            expectBalance(balanceOf(restored, "alice", "USDT"), 1000, 500);

            restored.onQuote(createQuote({ ask: 50000, askSize: 1 }));
            expectOrderStatus(restored.getOrder("alice", order.orderId), "filled");

            restored.deposit("alice", "USDT", 1000);
            const next = restored.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 1, quantity: 1 });
            expect(next.sequence).toBe(2);
        });

        it("should not rest terminal orders after load", () => {
            engine.deposit("alice", "USDT", 1000);
            const order = engine.submitOrder("alice", { symbol: "BTCUSDT", side: "buy", price: 50000, quantity: "0.01" });
            engine.cancelOrder("alice", order.orderId);
            engine.snapshot();

            const restored = new MatchingEngine(SYMBOLS, store);
            expect(restored.load()).toEqual({ orders: 1, openOrders: 0, balances: 1 });
            expectOrderStatus(restored.getOrder("alice", order.orderId), "cancelled");
        });

        it("should restore the last saved snapshot only", () => {
            engine.deposit("alice", "USDT", 1000);
            engine.snapshot();
            engine.deposit("alice", "USDT", 1000);

            expect(store.saves).toBe(1);
            const restored = new MatchingEngine(SYMBOLS, store);
            restored.load();
            expectBalance(balanceOf(restored, "alice", "USDT"), 1000, 1000);
        });
    });
});
