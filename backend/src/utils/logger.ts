/**
 * Logging utilities for the marketrelay backend
 *
 * Provides consistent, timestamped logging with context for:
 * - Exchange feed connections
 * - General application events
 * - WebSocket delivery
 */

type LogContext = Record<string, string | number | boolean | undefined>;

// ============================================
// Timestamp Helper
// ============================================

/**
 * Get current timestamp in HH:mm:ss.SSS format
 */
function getTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, "0");
    const minutes = now.getMinutes().toString().padStart(2, "0");
    const seconds = now.getSeconds().toString().padStart(2, "0");
    const millis = now.getMilliseconds().toString().padStart(3, "0");
    return `${hours}:${minutes}:${seconds}.${millis}`;
}

/**
 * Truncate a string (like a connection or user id) for display
 */
export function truncate(str: string | undefined, maxLen: number = 20): string {
    if (!str) return "n/a";
    if (str.length <= maxLen) return str;
    return `${str.slice(0, maxLen)}...`;
}

/**
 * Format context object into key=value string
 */
function formatContext(context: LogContext): string {
    return Object.entries(context)
        .filter(([_, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${v}`)
        .join(" ");
}

// ============================================
// Exchange Feed Logging
// ============================================

export type FeedAction = "CONNECTING" | "OPEN" | "CLOSED" | "RECONNECT" | "ERROR";

/**
 * Log an exchange feed connection transition
 *
 * @example
 * logFeed("binance", "RECONNECT", { delayMs: 2000, attempt: 2 })
 * // [14:32:05.123] [FEED:binance] RECONNECT | delayMs=2000 attempt=2
 */
export function logFeed(exchange: string, action: FeedAction, context?: LogContext): void {
    const timestamp = getTimestamp();
    const suffix = context ? ` | ${formatContext(context)}` : "";
    const line = `[${timestamp}] [FEED:${exchange}] ${action}${suffix}`;
    if (action === "ERROR") {
        console.error(line);
    } else {
        console.log(line);
    }
}

// ============================================
// General Application Logging
// ============================================

/**
 * Log an application event with timestamp
 *
 * @example
 * logApp("MatchingEngine", "Order filled", { orderId: "123", userId: "alice" })
 * // [14:32:07.456] [MatchingEngine] Order filled | orderId=123 userId=alice
 */
export function logApp(component: string, message: string, context?: LogContext): void {
    const timestamp = getTimestamp();
    if (context) {
        console.log(`[${timestamp}] [${component}] ${message} | ${formatContext(context)}`);
    } else {
        console.log(`[${timestamp}] [${component}] ${message}`);
    }
}

/**
 * Log an application error with timestamp
 */
export function logAppError(component: string, message: string, error?: unknown, context?: LogContext): void {
    const timestamp = getTimestamp();
    const errorMsg = error instanceof Error ? error.message : error ? String(error) : "";

    if (context) {
        console.error(
            `[${timestamp}] [${component}] ERROR: ${message} | ${formatContext(context)}${errorMsg ? ` | ${errorMsg}` : ""}`,
        );
    } else {
        console.error(`[${timestamp}] [${component}] ERROR: ${message}${errorMsg ? ` | ${errorMsg}` : ""}`);
    }
}

/**
 * Log a warning with timestamp
 */
export function logAppWarn(component: string, message: string, context?: LogContext): void {
    const timestamp = getTimestamp();
    if (context) {
        console.warn(`[${timestamp}] [${component}] WARN: ${message} | ${formatContext(context)}`);
    } else {
        console.warn(`[${timestamp}] [${component}] WARN: ${message}`);
    }
}

// ============================================
// WebSocket Logging
// ============================================

/**
 * Log a WebSocket broadcast
 *
 * @example
 * logWsBroadcast("klines:BTCUSDT:all:1m", "kline.closed", { receivers: 3 })
 * // [14:32:08.123] [WS:BROADCAST] klines:BTCUSDT:all:1m | kline.closed | receivers=3
 */
export function logWsBroadcast(key: string, event: string, context?: LogContext): void {
    const timestamp = getTimestamp();
    if (context) {
        console.log(`[${timestamp}] [WS:BROADCAST] ${key} | ${event} | ${formatContext(context)}`);
    } else {
        console.log(`[${timestamp}] [WS:BROADCAST] ${key} | ${event}`);
    }
}

/**
 * Log a WebSocket message sent to specific user
 *
 * @example
 * logWsUserMessage("alice", "orders", "order.updated", { orderId: "o1" })
 * // [14:32:08.456] [WS:USER] alice | orders | order.updated | orderId=o1
 */
export function logWsUserMessage(userId: string, stream: string, event: string, context?: LogContext): void {
    const timestamp = getTimestamp();
    const userDisplay = truncate(userId, 15);
    if (context) {
        console.log(`[${timestamp}] [WS:USER] ${userDisplay} | ${stream} | ${event} | ${formatContext(context)}`);
    } else {
        console.log(`[${timestamp}] [WS:USER] ${userDisplay} | ${stream} | ${event}`);
    }
}
