/**
 * Order types for the paper-trading matching engine
 */

import type Decimal from "decimal.js";

/** Order side */
export type OrderSide = "buy" | "sell";

/** Order status lifecycle */
export type OrderStatus =
    | "open" // Resting, nothing filled yet
    | "partially_filled" // Some quantity filled, remainder resting
    | "filled" // Completely filled
    | "cancelled"; // User cancelled

export const ORDER_STATUSES: readonly OrderStatus[] = ["open", "partially_filled", "filled", "cancelled"];

export const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["filled", "cancelled"]);

/** Full order entity */
export interface Order {
    orderId: string;
    sequence: number; // Global submission order, drives matching priority
    userId: string;
    symbol: string;
    side: OrderSide;
    price: Decimal; // Limit price, also the execution price
    quantity: Decimal;
    filledQuantity: Decimal;
    reserved: Decimal; // Outstanding reservation in the spent asset
    status: OrderStatus;
    createdAt: Date;
    updatedAt: Date;
}

/** Request to place an order */
export interface PlaceOrderRequest {
    symbol: string;
    side: OrderSide;
    price: Decimal.Value;
    quantity: Decimal.Value;
}

/** Filter for listing a user's orders */
export interface OrderFilter {
    symbol?: string;
    status?: OrderStatus;
}
