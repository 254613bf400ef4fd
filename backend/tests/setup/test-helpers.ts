/**
 * Common test utilities and helpers for marketrelay backend tests
 */

import Decimal from "decimal.js";
import { expect } from "vitest";
import type { MatchingEngine } from "../../src/matching";
import type { Balance, Order } from "../../src/types";
import { splitSymbol } from "../../src/utils/symbols";

// ============================================
// Decimal Comparison Helpers
// ============================================

/**
 * Assert that two Decimal values are equal
 */
export function expectDecimalEquals(actual: Decimal, expected: Decimal | number | string, message?: string): void {
    const expectedDecimal = new Decimal(expected);
    if (!actual.equals(expectedDecimal)) {
        throw new Error(message ?? `Expected ${actual.toString()} to equal ${expectedDecimal.toString()}`);
    }
}

// ============================================
// Order & Balance Helpers
// ============================================

/**
 * Assert order has expected status
 */
export function expectOrderStatus(order: Order, status: Order["status"]): void {
    expect(order.status).toBe(status);
}

/**
 * Assert order filled quantity matches expected
 */
export function expectOrderFilled(order: Order, filledQuantity: number | string): void {
    expectDecimalEquals(order.filledQuantity, filledQuantity, `Order ${order.orderId} filled quantity mismatch`);
}

/**
 * Assert a balance line
 */
export function expectBalance(balance: Balance, total: number | string, available: number | string): void {
    expectDecimalEquals(balance.total, total, `${balance.asset} total mismatch: ${balance.total.toString()}`);
    expectDecimalEquals(balance.available, available, `${balance.asset} available mismatch: ${balance.available.toString()}`);
}

/**
 * Find a user's balance line for an asset
 */
export function balanceOf(engine: MatchingEngine, userId: string, asset: string): Balance {
    const line = engine.getBalance(userId).find((b) => b.asset === asset);
    if (!line) {
        throw new Error(`No ${asset} balance for ${userId}`);
    }
    return line;
}

/**
 * Assert available + reserved == total for every asset the user holds
 */
export function expectReservationsBalanced(engine: MatchingEngine, userId: string): void {
    const reserved = new Map<string, Decimal>();
    for (const order of engine.listOrders(userId)) {
        const { base, quote } = splitSymbol(order.symbol);
        const asset = order.side === "buy" ? quote : base;
        reserved.set(asset, (reserved.get(asset) ?? new Decimal(0)).plus(order.reserved));
    }

    for (const balance of engine.getBalance(userId)) {
        const held = reserved.get(balance.asset) ?? new Decimal(0);
        expectDecimalEquals(
            balance.available.plus(held),
            balance.total,
            `${userId} ${balance.asset}: available ${balance.available.toString()} + reserved ${held.toString()} != total ${balance.total.toString()}`,
        );
    }
}
