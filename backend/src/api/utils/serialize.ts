/**
 * Serialization utilities for converting domain types to API response types
 *
 * Converts Decimal.js values to strings for JSON serialization
 */

import type { Balance, Order } from "../../types";
import type { BalanceResponse, OrderResponse } from "../types/api.types";

/**
 * Serialize an Order to API response format
 */
export function serializeOrder(order: Order): OrderResponse {
    return {
        orderId: order.orderId,
        sequence: order.sequence,
        userId: order.userId,
        symbol: order.symbol,
        side: order.side,
        price: order.price.toString(),
        quantity: order.quantity.toString(),
        filledQuantity: order.filledQuantity.toString(),
        remainingQuantity: order.quantity.minus(order.filledQuantity).toString(),
        reserved: order.reserved.toString(),
        status: order.status,
        createdAt: order.createdAt.toISOString(),
        updatedAt: order.updatedAt.toISOString(),
    };
}

/**
 * Serialize a Balance line to API response format
 */
export function serializeBalance(balance: Balance): BalanceResponse {
    return {
        asset: balance.asset,
        total: balance.total.toString(),
        available: balance.available.toString(),
    };
}
