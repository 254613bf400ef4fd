/**
 * Matching Engine for paper trading against live exchange quotes
 *
 * Features:
 * - Balance reservation on admission (no partial reservation on failure)
 * - Matching against the consolidated best touch, in submission order
 * - Touch liquidity shared across resting orders until the next quote
 * - Execution at the order's own limit price
 * - Snapshot/load against an injected State Store
 */

import Decimal from "decimal.js";
import { randomUUID } from "node:crypto";
import type { FeedEvent } from "../feeds/types";
import { BestTouchBook } from "../market/best-touch";
import type { Balance, BestTouch, EngineEvent, Exchange, Order, OrderFilter, PlaceOrderRequest, QuoteTick } from "../types";
import { ALL_EXCHANGES, TERMINAL_STATUSES } from "../types";
import { logApp } from "../utils/logger";
import { assetsOf, splitSymbol } from "../utils/symbols";
import { AlreadyTerminalError, InvalidAmountError, InvalidOrderError, OrderNotFoundError } from "./errors";
import { BalanceLedger } from "./ledger";
import type { StateStore } from "./state-store";

// ============================================
// Types
// ============================================

export type EngineEventListener = (event: EngineEvent) => void;

export interface MatchingStats {
    orders: number;
    openOrders: number;
    fills: number;
}

/** Size still available at the consolidated touch since the last quote */
interface TouchLiquidity {
    bid: Decimal;
    ask: Decimal;
}

const ZERO = new Decimal(0);

function toPositiveDecimal(value: Decimal.Value, field: string): Decimal {
    let parsed: Decimal;
    try {
        parsed = new Decimal(value);
    } catch {
        throw new InvalidOrderError(`Invalid ${field}`, { field });
    }
    if (!parsed.isFinite() || parsed.lte(0)) {
        throw new InvalidOrderError(`${field} must be positive`, { field });
    }
    return parsed;
}

// ============================================
// Matching Engine
// ============================================

export class MatchingEngine {
    private ledger = new BalanceLedger();

    /** The engine's own view of the market, independent of the aggregation engine */
    private book = new BestTouchBook();

    /** Index of orderId -> Order for fast lookups */
    private orderIndex = new Map<string, Order>();

    /** symbol -> non-terminal orders in ascending sequence */
    private worklists = new Map<string, Order[]>();

    private liquidity = new Map<string, TouchLiquidity>();

    private listeners = new Set<EngineEventListener>();

    private readonly symbols: Set<string>;
    private nextSequence = 1;
    private fills = 0;

    constructor(
        symbols: readonly string[],
        private readonly store: StateStore,
    ) {
        this.symbols = new Set(symbols.map((s) => s.toUpperCase()));
    }

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * Restore balances and orders from the State Store.
     * Must run before any tick or order is processed.
     */
    load(): { orders: number; openOrders: number; balances: number } {
        const snapshot = this.store.load();

        this.ledger.restore(snapshot.balances);
        this.orderIndex.clear();
        this.worklists.clear();

        let maxSequence = 0;
        let openOrders = 0;
        const orders = [...snapshot.orders].sort((a, b) => a.sequence - b.sequence);
        for (const stored of orders) {
            const order = { ...stored };
            this.orderIndex.set(order.orderId, order);
            maxSequence = Math.max(maxSequence, order.sequence);
            if (!TERMINAL_STATUSES.has(order.status)) {
                this.getWorklist(order.symbol).push(order);
                openOrders++;
            }
        }
        this.nextSequence = maxSequence + 1;

        const result = { orders: orders.length, openOrders, balances: snapshot.balances.length };
        logApp("MatchingEngine", "State loaded", result);
        return result;
    }

    /**
     * Write every balance and order to the State Store
     */
    snapshot(): { orders: number; balances: number } {
        const balances = this.ledger.entries();
        const orders = [...this.orderIndex.values()].map((order) => ({ ...order }));
        this.store.save({ balances, orders });
        return { orders: orders.length, balances: balances.length };
    }

    /**
     * Register a listener for order and balance updates. Returns an unsubscribe function.
     */
    onEvent(listener: EngineEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ============================================
    // Market Data
    // ============================================

    /**
     * Tick bus entry point. Only quotes drive matching.
     */
    handleFeedEvent(event: FeedEvent): void {
        if (event.type === "stale") {
            this.markStale(event.exchange, event.timestamp);
        } else if (event.tick.kind === "quote") {
            this.onQuote(event.tick);
        }
    }

    onQuote(tick: QuoteTick): void {
        const { consolidated } = this.book.applyQuote(tick);
        this.resetLiquidity(consolidated);
        this.matchSymbol(tick.symbol, tick.timestamp);
    }

    /**
     * Drop an exchange's quotes from the consolidated view until it quotes again
     */
    markStale(exchange: Exchange, timestamp: number): void {
        for (const touch of this.book.markStale(exchange, timestamp)) {
            if (touch.scope !== ALL_EXCHANGES) continue;
            this.resetLiquidity(touch);
            this.matchSymbol(touch.symbol, timestamp);
        }
    }

    // ============================================
    // Commands
    // ============================================

    /**
     * Credit an asset to a user
     */
    deposit(userId: string, asset: string, amount: Decimal.Value): Balance {
        const name = asset.trim().toUpperCase();
        if (!name) {
            throw new InvalidAmountError("Asset is required");
        }
        let parsed: Decimal;
        try {
            parsed = new Decimal(amount);
        } catch {
            throw new InvalidAmountError("Invalid amount");
        }
        if (!parsed.isFinite() || parsed.lte(0)) {
            throw new InvalidAmountError("Amount must be positive");
        }

        const balance = this.ledger.credit(userId, name, parsed);
        logApp("MatchingEngine", "Deposit", { userId, asset: name, amount: parsed.toString() });
        this.emit({ type: "balance.updated", userId, balance });
        return balance;
    }

    /**
     * Validate, reserve funds, create the order and try to match it immediately
     */
    submitOrder(userId: string, request: PlaceOrderRequest): Order {
        const symbol = request.symbol.toUpperCase();
        if (!this.symbols.has(symbol)) {
            throw new InvalidOrderError(`Unknown symbol: ${request.symbol}`, { symbol: request.symbol });
        }
        if (request.side !== "buy" && request.side !== "sell") {
            throw new InvalidOrderError(`Invalid side: ${String(request.side)}`);
        }
        const price = toPositiveDecimal(request.price, "price");
        const quantity = toPositiveDecimal(request.quantity, "quantity");

        const { base, quote } = splitSymbol(symbol);
        const asset = request.side === "buy" ? quote : base;
        const required = request.side === "buy" ? price.times(quantity) : quantity;

        // Throws InsufficientBalanceError without touching the balance
        const balance = this.ledger.reserve(userId, asset, required);

        const now = new Date();
        const order: Order = {
            orderId: randomUUID(),
            sequence: this.nextSequence++,
            userId,
            symbol,
            side: request.side,
            price,
            quantity,
            filledQuantity: ZERO,
            reserved: required,
            status: "open",
            createdAt: now,
            updatedAt: now,
        };
        this.orderIndex.set(order.orderId, order);
        this.getWorklist(symbol).push(order);

        logApp("MatchingEngine", "Order accepted", {
            orderId: order.orderId,
            userId,
            symbol,
            side: order.side,
            price: price.toString(),
            quantity: quantity.toString(),
        });
        this.emit({ type: "order.updated", userId, order: { ...order } });
        this.emit({ type: "balance.updated", userId, balance });

        this.matchSymbol(symbol, now.getTime());
        return { ...order };
    }

    /**
     * Cancel a non-terminal order and release its reservation
     */
    cancelOrder(userId: string, orderId: string): Order {
        const order = this.findOwnedOrder(userId, orderId);
        if (TERMINAL_STATUSES.has(order.status)) {
            throw new AlreadyTerminalError(orderId, order.status);
        }

        const asset = this.reservedAsset(order);
        const balance = this.ledger.release(userId, asset, order.reserved);
        order.reserved = ZERO;
        order.status = "cancelled";
        order.updatedAt = new Date();
        this.removeFromWorklist(order);

        logApp("MatchingEngine", "Order cancelled", { orderId, userId });
        this.emit({ type: "order.updated", userId, order: { ...order } });
        this.emit({ type: "balance.updated", userId, balance });
        return { ...order };
    }

    // ============================================
    // Queries
    // ============================================

    getOrder(userId: string, orderId: string): Order {
        return { ...this.findOwnedOrder(userId, orderId) };
    }

    /**
     * Balance lines for every configured asset plus any other asset the user holds
     */
    getBalance(userId: string): Balance[] {
        const configured = assetsOf([...this.symbols]);
        const held = this.ledger.list(userId).map((b) => b.asset);
        const assets = [...new Set([...configured, ...held])];
        return assets.map((asset) => this.ledger.get(userId, asset));
    }

    /**
     * A user's orders, newest first
     */
    listOrders(userId: string, filter: OrderFilter = {}): Order[] {
        const symbol = filter.symbol?.toUpperCase();
        return [...this.orderIndex.values()]
            .filter((o) => o.userId === userId)
            .filter((o) => !symbol || o.symbol === symbol)
            .filter((o) => !filter.status || o.status === filter.status)
            .sort((a, b) => b.sequence - a.sequence)
            .map((o) => ({ ...o }));
    }

    getBestTouch(symbol: string): BestTouch | null {
        return this.book.get(symbol.toUpperCase(), ALL_EXCHANGES);
    }

    getStats(): MatchingStats {
        let openOrders = 0;
        for (const worklist of this.worklists.values()) openOrders += worklist.length;
        return { orders: this.orderIndex.size, openOrders, fills: this.fills };
    }

    // ============================================
    // Matching
    // ============================================

    /**
     * Walk the symbol's worklist in submission order and fill every crossable
     * order against the liquidity left at the touch.
     */
    private matchSymbol(symbol: string, timestamp: number): void {
        const worklist = this.worklists.get(symbol);
        const touch = this.book.get(symbol, ALL_EXCHANGES);
        const liquidity = this.liquidity.get(symbol);
        if (!worklist || worklist.length === 0 || !touch || touch.stale || !liquidity) {
            return;
        }

        for (const order of [...worklist]) {
            const remaining = order.quantity.minus(order.filledQuantity);

            if (order.side === "buy") {
                if (touch.ask === null || liquidity.ask.lte(0) || order.price.lt(touch.ask)) continue;
                const fillQty = Decimal.min(remaining, liquidity.ask);
                liquidity.ask = liquidity.ask.minus(fillQty);
                this.applyFill(order, fillQty, timestamp);
            } else {
                if (touch.bid === null || liquidity.bid.lte(0) || order.price.gt(touch.bid)) continue;
                const fillQty = Decimal.min(remaining, liquidity.bid);
                liquidity.bid = liquidity.bid.minus(fillQty);
                this.applyFill(order, fillQty, timestamp);
            }
        }
    }

    /**
     * Settle a fill at the order's limit price
     */
    private applyFill(order: Order, quantity: Decimal, timestamp: number): void {
        const { base, quote } = splitSymbol(order.symbol);
        const notional = order.price.times(quantity);
        const userId = order.userId;

        let baseBalance: Balance;
        let quoteBalance: Balance;
        if (order.side === "buy") {
            const spent = Decimal.min(notional, order.reserved);
            quoteBalance = this.ledger.consumeReserved(userId, quote, spent);
            order.reserved = order.reserved.minus(spent);
            baseBalance = this.ledger.credit(userId, base, quantity);
        } else {
            baseBalance = this.ledger.consumeReserved(userId, base, quantity);
            order.reserved = order.reserved.minus(quantity);
            quoteBalance = this.ledger.credit(userId, quote, notional);
        }

        order.filledQuantity = order.filledQuantity.plus(quantity);
        order.updatedAt = new Date(timestamp);
        this.fills++;

        if (order.filledQuantity.gte(order.quantity)) {
            order.status = "filled";
            if (order.reserved.gt(0)) {
                const released = this.ledger.release(userId, this.reservedAsset(order), order.reserved);
                if (order.side === "buy") {
                    quoteBalance = released;
                } else {
                    baseBalance = released;
                }
            }
            order.reserved = ZERO;
            this.removeFromWorklist(order);
        } else {
            order.status = "partially_filled";
        }

        logApp("MatchingEngine", order.status === "filled" ? "Order filled" : "Order partially filled", {
            orderId: order.orderId,
            userId,
            price: order.price.toString(),
            quantity: quantity.toString(),
        });
        this.emit({ type: "order.updated", userId, order: { ...order } });
        this.emit({ type: "balance.updated", userId, balance: quoteBalance });
        this.emit({ type: "balance.updated", userId, balance: baseBalance });
    }

    // ============================================
    // Private Methods
    // ============================================

    private findOwnedOrder(userId: string, orderId: string): Order {
        const order = this.orderIndex.get(orderId);
        if (!order || order.userId !== userId) {
            throw new OrderNotFoundError(orderId);
        }
        return order;
    }

    /** The asset an order's reservation is held in */
    private reservedAsset(order: Order): string {
        const { base, quote } = splitSymbol(order.symbol);
        return order.side === "buy" ? quote : base;
    }

    private getWorklist(symbol: string): Order[] {
        let worklist = this.worklists.get(symbol);
        if (!worklist) {
            worklist = [];
            this.worklists.set(symbol, worklist);
        }
        return worklist;
    }

    private removeFromWorklist(order: Order): void {
        const worklist = this.worklists.get(order.symbol);
        if (!worklist) return;
        const index = worklist.findIndex((o) => o.orderId === order.orderId);
        if (index >= 0) worklist.splice(index, 1);
    }

    private resetLiquidity(touch: BestTouch): void {
        this.liquidity.set(touch.symbol, {
            bid: new Decimal(touch.bid === null ? 0 : touch.bidSize),
            ask: new Decimal(touch.ask === null ? 0 : touch.askSize),
        });
    }

    private emit(event: EngineEvent): void {
        for (const listener of this.listeners) {
            listener(event);
        }
    }
}
