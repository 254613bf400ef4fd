/**
 * Domain errors raised by the matching engine and the subscription hub
 */

export type MarketRelayErrorKind =
    | "InvalidOrder"
    | "InsufficientBalance"
    | "NotFound"
    | "AlreadyTerminal"
    | "Unauthorized"
    | "Stale"
    | "Malformed";

/**
 * Base class for domain errors. `kind` distinguishes the failure for callers;
 * `code` is the stable identifier surfaced to clients.
 */
export class MarketRelayError extends Error {
    constructor(
        public readonly kind: MarketRelayErrorKind,
        public readonly code: string,
        message: string,
        public readonly details?: Record<string, unknown>,
    ) {
        super(message);
        this.name = "MarketRelayError";
    }
}

export class InvalidOrderError extends MarketRelayError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("InvalidOrder", "INVALID_ORDER", message, details);
        this.name = "InvalidOrderError";
    }
}

export class InvalidAmountError extends MarketRelayError {
    constructor(message: string) {
        super("InvalidOrder", "INVALID_AMOUNT", message);
        this.name = "InvalidAmountError";
    }
}

export class InsufficientBalanceError extends MarketRelayError {
    constructor(asset: string, required: string, available: string) {
        super("InsufficientBalance", "INSUFFICIENT_BALANCE", `Insufficient ${asset} balance`, {
            asset,
            required,
            available,
        });
        this.name = "InsufficientBalanceError";
    }
}

export class OrderNotFoundError extends MarketRelayError {
    constructor(orderId: string) {
        super("NotFound", "ORDER_NOT_FOUND", `Order not found: ${orderId}`);
        this.name = "OrderNotFoundError";
    }
}

export class AlreadyTerminalError extends MarketRelayError {
    constructor(orderId: string, status: string) {
        super("AlreadyTerminal", "ALREADY_TERMINAL", `Order ${orderId} is already ${status}`, { status });
        this.name = "AlreadyTerminalError";
    }
}
