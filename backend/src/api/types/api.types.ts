/**
 * API-specific types for request/response serialization
 *
 * These types use string instead of Decimal for JSON serialization
 */

import type { KlineInterval, OrderSide, OrderStatus } from "../../types";

// ============================================
// Serialized Response Types (Decimal -> string)
// ============================================

/** Serialized order for API response */
export interface OrderResponse {
    orderId: string;
    sequence: number;
    userId: string;
    symbol: string;
    side: OrderSide;
    price: string;
    quantity: string;
    filledQuantity: string;
    remainingQuantity: string;
    reserved: string;
    status: OrderStatus;
    createdAt: string;
    updatedAt: string;
}

/** Serialized balance line */
export interface BalanceResponse {
    asset: string;
    total: string;
    available: string;
}

// ============================================
// Standard Error Response
// ============================================

/** Standard error response format */
export interface ErrorResponse {
    error: string;
    code: string;
    details?: Record<string, unknown>;
}

// ============================================
// API-specific Response Types
// ============================================

/** Register / login response */
export interface TokenApiResponse {
    accessToken: string;
    tokenType: "bearer";
    expiresAt: number;
}

/** Market universe description */
export interface InfoResponse {
    exchanges: string[];
    assets: string[];
    pairs: string[];
    intervals: KlineInterval[];
}

/** Health check response */
export interface HealthResponse {
    status: "healthy" | "degraded" | "unhealthy";
    timestamp: string;
    version: string;
    components: {
        database: "healthy" | "unhealthy";
        feeds: Array<{ exchange: string; connected: boolean; ticksReceived: number; malformed: number }>;
        snapshot: "running" | "stopped";
    };
    stats: {
        tickBus: { published: number; consumers: Array<{ name: string; pending: number; errors: number }> };
        aggregation: { quotes: number; trades: number; outOfOrder: number };
        matching: { orders: number; openOrders: number; fills: number };
        websocket: { connections: number; authenticatedConnections: number; dropped: number; malformed: number };
    };
}
