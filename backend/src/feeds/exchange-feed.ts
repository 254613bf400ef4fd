/**
 * Exchange Feed
 * Maintains one WebSocket connection to an exchange and publishes normalized ticks
 */

import WebSocket from "ws";
import type { Exchange, Tick } from "../types/market";
import { logFeed } from "../utils/logger";
import type { ExchangeFeedConfig, ExchangeFeedStatus, FeedNormalizer } from "./types";
import { DEFAULT_EXCHANGE_FEED_CONFIG } from "./types";

export interface ExchangeFeedHandlers {
    onTick: (tick: Tick) => void;
    /** Called once per lost connection, after at least one successful open */
    onStale: (exchange: Exchange, timestamp: number) => void;
}

/**
 * ExchangeFeed connects to a single exchange and turns its frames into ticks.
 *
 * Features:
 * - Automatic reconnection with exponential backoff
 * - Protocol-level pings to keep idle connections alive
 * - Malformed frames are counted and dropped, never thrown
 * - Reports staleness when an established connection is lost
 */
export class ExchangeFeed {
    // State
    private ws: WebSocket | null = null;
    private isRunning = false;
    private connected = false;
    private reconnectDelay: number;
    private reconnectAttempts = 0;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    private pingTimer: ReturnType<typeof setInterval> | null = null;
    private ticksReceived = 0;
    private malformed = 0;
    private errors = 0;
    private lastTickTime: Date | null = null;

    constructor(
        private readonly normalizer: FeedNormalizer,
        private readonly symbols: readonly string[],
        private readonly handlers: ExchangeFeedHandlers,
        private readonly config: ExchangeFeedConfig = DEFAULT_EXCHANGE_FEED_CONFIG,
    ) {
        this.reconnectDelay = config.initialReconnectDelayMs;
    }

    get exchange(): Exchange {
        return this.normalizer.exchange;
    }

    // ============================================
    // Public API
    // ============================================

    /**
     * Open the connection. Reconnects automatically until stop() is called.
     */
    start(): void {
        if (this.isRunning) return;
        this.isRunning = true;
        this.connect();
    }

    /**
     * Close the connection and cancel any pending reconnect
     */
    stop(): void {
        this.isRunning = false;
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        this.clearPing();
        const ws = this.ws;
        this.ws = null;
        if (ws) {
            ws.removeAllListeners();
            // Closing a socket that never opened emits an error
            ws.on("error", (err: Error) => logFeed(this.exchange, "ERROR", { message: err.message, phase: "stop" }));
            ws.close();
        }
        this.connected = false;
        logFeed(this.exchange, "CLOSED", { reason: "stopped" });
    }

    getStatus(): ExchangeFeedStatus {
        return {
            exchange: this.exchange,
            isRunning: this.isRunning,
            connected: this.connected,
            reconnectAttempts: this.reconnectAttempts,
            nextReconnectDelayMs: this.reconnectDelay,
            ticksReceived: this.ticksReceived,
            malformed: this.malformed,
            errors: this.errors,
            lastTickTime: this.lastTickTime,
        };
    }

    // ============================================
    // Socket Lifecycle
    // ============================================

    private connect(): void {
        const url = this.normalizer.url(this.symbols);
        logFeed(this.exchange, "CONNECTING", { url, attempt: this.reconnectAttempts });

        const ws = new WebSocket(url);
        this.ws = ws;

        ws.on("open", () => this.handleOpen());
        ws.on("message", (data: WebSocket.RawData) => this.handleMessage(data.toString(), Date.now()));
        ws.on("error", (err: Error) => this.handleError(err));
        ws.on("close", (code: number) => this.handleClose(code));
    }

    /**
     * Socket opened: subscribe, reset backoff, start pinging
     */
    handleOpen(): void {
        this.connected = true;
        this.reconnectDelay = this.config.initialReconnectDelayMs;
        this.reconnectAttempts = 0;

        for (const frame of this.normalizer.subscribeFrames(this.symbols)) {
            this.ws?.send(frame);
        }

        this.clearPing();
        this.pingTimer = setInterval(() => {
            if (this.ws?.readyState === WebSocket.OPEN) {
                this.ws.ping();
            }
        }, this.config.pingIntervalMs);
        this.pingTimer.unref();

        logFeed(this.exchange, "OPEN", { symbols: this.symbols.length });
    }

    /**
     * Raw frame received. Ticks are forwarded in receipt order.
     */
    handleMessage(raw: string, receivedAt: number): void {
        const { ticks, malformed } = this.normalizer.normalize(raw, receivedAt);
        this.malformed += malformed;
        for (const tick of ticks) {
            this.ticksReceived++;
            this.lastTickTime = new Date(receivedAt);
            this.handlers.onTick(tick);
        }
    }

    handleError(err: Error): void {
        this.errors++;
        logFeed(this.exchange, "ERROR", { message: err.message });
    }

    /**
     * Socket closed: mark the exchange stale and schedule a reconnect
     */
    handleClose(code: number): void {
        const wasConnected = this.connected;
        this.connected = false;
        this.ws = null;
        this.clearPing();
        logFeed(this.exchange, "CLOSED", { code });

        if (wasConnected) {
            this.handlers.onStale(this.exchange, Date.now());
        }

        if (!this.isRunning) return;

        const delay = this.reconnectDelay;
        this.reconnectAttempts++;
        logFeed(this.exchange, "RECONNECT", { delayMs: delay, attempt: this.reconnectAttempts });

        // Exponential backoff
        this.reconnectDelay = Math.min(delay * this.config.reconnectMultiplier, this.config.maxReconnectDelayMs);

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (this.isRunning) this.connect();
        }, delay);
    }

    private clearPing(): void {
        if (this.pingTimer) {
            clearInterval(this.pingTimer);
            this.pingTimer = null;
        }
    }
}
