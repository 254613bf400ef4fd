/**
 * Subscription Hub
 *
 * Manages client connections, the auth gate, stream subscriptions and
 * per-connection outbound queues for real-time delivery of market and
 * account events
 */

import { randomUUID } from "node:crypto";
import type { AggregationEngine } from "../../market/aggregation-engine";
import { InvalidTokenError } from "../../services/auth.service";
import type { EngineEvent, MarketEvent } from "../../types";
import { BoundedQueue } from "../../utils/bounded-queue";
import { logApp, logAppWarn, logWsBroadcast, logWsUserMessage, truncate } from "../../utils/logger";
import { serializeBalance, serializeOrder } from "../utils/serialize";
import {
    parseStreamSpec,
    streamKey,
    type StreamName,
    type StreamSpec,
    type StreamUniverse,
} from "./stream-spec";

// ============================================
// Types
// ============================================

/** Transport seen by the hub; `ws` sockets satisfy it */
export interface ClientSocket {
    send(data: string, cb: (err?: Error) => void): void;
    close(code?: number, reason?: string): void;
}

export interface TokenVerifier {
    verifyToken(token: string): Promise<string>;
}

export type MarketSnapshotSource = Pick<AggregationEngine, "getBestTouch" | "getKline" | "getEwma" | "retainEwma" | "releaseEwma">;

export interface SubscriptionHubConfig {
    /** Frames buffered per connection before the oldest is dropped (default: 1000) */
    outboundQueueSize: number;
    /** Connections without an inbound frame for this long are closed (default: 60000) */
    idleTimeoutMs: number;
    /** Log every broadcast and user delivery */
    logDeliveries: boolean;
}

export const DEFAULT_SUBSCRIPTION_HUB_CONFIG: SubscriptionHubConfig = {
    outboundQueueSize: 1000,
    idleTimeoutMs: 60000,
    logDeliveries: false,
};

export type HubErrorCode = "MALFORMED" | "UNAUTHORIZED" | "INVALID_SUBSCRIPTION" | "UNKNOWN_ACTION";

/** Frames sent from server to client */
export type HubFrame =
    | { type: "connected"; connectionId: string }
    | { type: "authenticated"; userId: string }
    | { type: "subscribed"; stream: StreamName; key: string }
    | { type: "unsubscribed"; key: string }
    | { type: "pong" }
    | { type: "error"; code: HubErrorCode; message: string }
    | { type: StreamName; key: string; data: unknown };

export interface HubStats {
    connections: number;
    authenticatedConnections: number;
    subscriptions: number;
    users: number;
    sent: number;
    dropped: number;
    malformed: number;
}

export interface ConnectionInfo {
    userId?: string;
    subscriptions: string[];
    queued: number;
    sent: number;
    dropped: number;
}

interface HubConnection {
    id: string;
    socket: ClientSocket;
    userId?: string;
    /** key -> spec */
    subscriptions: Map<string, StreamSpec>;
    outbound: BoundedQueue<string>;
    writing: boolean;
    /** Tail of the inbound frame chain; frames are handled one at a time in arrival order */
    inbound: Promise<void>;
    sent: number;
    dropped: number;
    lastSeen: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================
// Subscription Hub
// ============================================

export class SubscriptionHub {
    private connections = new Map<string, HubConnection>();
    private subscribers = new Map<string, Set<string>>(); // key -> connectionIds
    private userConnections = new Map<string, Set<string>>(); // userId -> connectionIds
    private idleTimer: ReturnType<typeof setInterval> | null = null;
    private isShuttingDown = false;
    private sent = 0;
    private dropped = 0;
    private malformed = 0;

    constructor(
        private readonly market: MarketSnapshotSource,
        private readonly auth: TokenVerifier,
        private readonly universe: StreamUniverse,
        private readonly config: SubscriptionHubConfig = DEFAULT_SUBSCRIPTION_HUB_CONFIG,
    ) {}

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * Start the idle-connection check
     */
    start(): void {
        if (this.idleTimer) return;
        this.isShuttingDown = false;
        const every = Math.min(30000, this.config.idleTimeoutMs);
        this.idleTimer = setInterval(() => this.closeIdle(Date.now()), every);
        this.idleTimer.unref();
    }

    /**
     * Close every connection and stop timers
     */
    shutdown(): void {
        this.isShuttingDown = true;

        if (this.idleTimer) {
            clearInterval(this.idleTimer);
            this.idleTimer = null;
        }

        for (const conn of [...this.connections.values()]) {
            this.removeConnection(conn.id);
            conn.socket.close(1001, "Server shutting down");
        }

        logApp("SubscriptionHub", "Shut down");
    }

    // ============================================
    // Connections
    // ============================================

    /**
     * Register a new client connection and greet it
     */
    addConnection(socket: ClientSocket): string {
        const id = randomUUID();
        if (this.isShuttingDown) {
            socket.close(1001, "Server shutting down");
            return id;
        }

        const conn: HubConnection = {
            id,
            socket,
            subscriptions: new Map(),
            outbound: new BoundedQueue(this.config.outboundQueueSize),
            writing: false,
            inbound: Promise.resolve(),
            sent: 0,
            dropped: 0,
            lastSeen: Date.now(),
        };
        this.connections.set(id, conn);
        this.enqueue(conn, { type: "connected", connectionId: id });
        logApp("SubscriptionHub", "Connection added", { connection: truncate(id, 8) });
        return id;
    }

    /**
     * Drop a connection and every subscription it holds
     */
    removeConnection(connectionId: string): void {
        const conn = this.connections.get(connectionId);
        if (!conn) return;

        for (const [key, spec] of conn.subscriptions) {
            this.detach(conn, key, spec);
        }

        if (conn.userId) {
            this.untrackUser(conn.userId, connectionId);
        }

        conn.outbound.clear();
        this.connections.delete(connectionId);
        logApp("SubscriptionHub", "Connection removed", { connection: truncate(connectionId, 8) });
    }

    /**
     * Close connections that have not sent a frame within the idle timeout
     */
    closeIdle(now: number): number {
        let closed = 0;
        for (const conn of [...this.connections.values()]) {
            if (now - conn.lastSeen > this.config.idleTimeoutMs) {
                logApp("SubscriptionHub", "Connection timed out", { connection: truncate(conn.id, 8) });
                this.removeConnection(conn.id);
                conn.socket.close(1000, "Connection timeout");
                closed++;
            }
        }
        return closed;
    }

    // ============================================
    // Inbound Frames
    // ============================================

    /**
     * Handle one client frame. A frame waits for the previous frames of its
     * connection to finish, so an auth still being verified gates what follows it.
     */
    handleMessage(connectionId: string, raw: string): Promise<void> {
        const conn = this.connections.get(connectionId);
        if (!conn) return Promise.resolve();
        conn.lastSeen = Date.now();

        const handled = conn.inbound.then(() => this.processFrame(conn, raw));
        // Failures reach the caller through `handled`; the chain itself keeps going
        conn.inbound = handled.catch(() => undefined);
        return handled;
    }

    private async processFrame(conn: HubConnection, raw: string): Promise<void> {
        if (!this.connections.has(conn.id)) return;

        let frame: unknown;
        try {
            frame = JSON.parse(raw);
        } catch {
            frame = undefined;
        }
        if (!isRecord(frame)) {
            this.malformed++;
            this.sendError(conn, "MALFORMED", "Frame must be a JSON object");
            return;
        }

        switch (frame.action) {
            case "auth":
                await this.handleAuth(conn, frame.token);
                return;
            case "subscribe":
                this.handleSubscribe(conn, frame);
                return;
            case "unsubscribe":
                this.handleUnsubscribe(conn, frame);
                return;
            case "ping":
                this.enqueue(conn, { type: "pong" });
                return;
            default:
                this.sendError(conn, "UNKNOWN_ACTION", `Unknown action: ${String(frame.action)}`);
        }
    }

    private async handleAuth(conn: HubConnection, token: unknown): Promise<void> {
        if (typeof token !== "string" || token.length === 0) {
            this.sendError(conn, "UNAUTHORIZED", "Token required for authentication");
            return;
        }

        let userId: string;
        try {
            userId = await this.auth.verifyToken(token);
        } catch (error) {
            if (error instanceof InvalidTokenError) {
                this.sendError(conn, "UNAUTHORIZED", error.message);
                return;
            }
            throw error;
        }

        // The connection may have closed while the token was being checked
        if (!this.connections.has(conn.id)) return;

        if (conn.userId && conn.userId !== userId) {
            this.untrackUser(conn.userId, conn.id);
        }
        conn.userId = userId;
        let userConns = this.userConnections.get(userId);
        if (!userConns) {
            userConns = new Set();
            this.userConnections.set(userId, userConns);
        }
        userConns.add(conn.id);

        this.enqueue(conn, { type: "authenticated", userId });
        logApp("SubscriptionHub", "Authenticated", { connection: truncate(conn.id, 8), userId });
    }

    private handleSubscribe(conn: HubConnection, frame: Record<string, unknown>): void {
        if (!conn.userId) {
            this.sendError(conn, "UNAUTHORIZED", "Authenticate before subscribing");
            return;
        }

        const result = parseStreamSpec(frame, this.universe);
        if (!result.ok) {
            this.sendError(conn, "INVALID_SUBSCRIPTION", result.message);
            return;
        }

        const { spec, key } = result;
        const isNew = !conn.subscriptions.has(key);
        if (isNew) {
            conn.subscriptions.set(key, spec);
            let subs = this.subscribers.get(key);
            if (!subs) {
                subs = new Set();
                this.subscribers.set(key, subs);
            }
            subs.add(conn.id);
        }

        this.enqueue(conn, { type: "subscribed", stream: spec.stream, key });

        const snapshot = this.snapshotFor(spec, isNew);
        if (snapshot !== null) {
            this.enqueue(conn, { type: spec.stream, key, data: snapshot });
        }
    }

    private handleUnsubscribe(conn: HubConnection, frame: Record<string, unknown>): void {
        const result = parseStreamSpec(frame, this.universe);
        if (!result.ok) {
            this.sendError(conn, "INVALID_SUBSCRIPTION", result.message);
            return;
        }

        const spec = conn.subscriptions.get(result.key);
        if (spec) {
            this.detach(conn, result.key, spec);
            conn.subscriptions.delete(result.key);
        }
        this.enqueue(conn, { type: "unsubscribed", key: result.key });
    }

    /**
     * Current value for a subscribed stream. A new EWMA subscription retains
     * its tracker here; detach() releases it.
     */
    private snapshotFor(spec: StreamSpec, isNew: boolean): unknown {
        switch (spec.stream) {
            case "best_touch":
                return this.market.getBestTouch(spec.symbol, spec.scope);
            case "klines":
                return this.market.getKline(spec.symbol, spec.scope, spec.interval);
            case "ewma":
                return isNew
                    ? this.market.retainEwma(spec.symbol, spec.scope, spec.halfLife)
                    : this.market.getEwma(spec.symbol, spec.scope, spec.halfLife);
            default:
                return null;
        }
    }

    private detach(conn: HubConnection, key: string, spec: StreamSpec): void {
        const subs = this.subscribers.get(key);
        if (subs) {
            subs.delete(conn.id);
            if (subs.size === 0) {
                this.subscribers.delete(key);
            }
        }
        if (spec.stream === "ewma") {
            this.market.releaseEwma(spec.symbol, spec.scope, spec.halfLife);
        }
    }

    private untrackUser(userId: string, connectionId: string): void {
        const userConns = this.userConnections.get(userId);
        if (!userConns) return;
        userConns.delete(connectionId);
        if (userConns.size === 0) {
            this.userConnections.delete(userId);
        }
    }

    // ============================================
    // Outbound Events
    // ============================================

    /**
     * Route an aggregation event to every connection subscribed to its key
     */
    publishMarketEvent(event: MarketEvent): void {
        switch (event.type) {
            case "best_touch.updated": {
                const { touch } = event;
                this.broadcast(streamKey({ stream: "best_touch", symbol: touch.symbol, scope: touch.scope }), "best_touch", touch);
                return;
            }
            case "trade":
                this.broadcast(
                    streamKey({ stream: "trades", symbol: event.trade.symbol, scope: event.scope }),
                    "trades",
                    event.trade,
                );
                return;
            case "kline.updated":
            case "kline.closed": {
                const { kline } = event;
                const key = streamKey({ stream: "klines", symbol: kline.symbol, scope: kline.scope, interval: kline.interval });
                this.broadcast(key, "klines", kline);
                return;
            }
            case "ewma.updated": {
                const { ewma } = event;
                const key = streamKey({ stream: "ewma", symbol: ewma.symbol, scope: ewma.scope, halfLife: ewma.halfLife });
                this.broadcast(key, "ewma", ewma);
                return;
            }
        }
    }

    /**
     * Deliver an order or balance update to the owning user's subscribed connections
     */
    publishEngineEvent(event: EngineEvent): void {
        if (event.type === "order.updated") {
            this.sendToUser(event.userId, "orders", serializeOrder(event.order));
        } else {
            this.sendToUser(event.userId, "balance", serializeBalance(event.balance));
        }
    }

    private broadcast(key: string, stream: StreamName, data: unknown): void {
        const subs = this.subscribers.get(key);
        if (!subs || subs.size === 0) return;

        for (const connId of subs) {
            const conn = this.connections.get(connId);
            if (conn) {
                this.enqueue(conn, { type: stream, key, data });
            }
        }

        if (this.config.logDeliveries) {
            logWsBroadcast(key, stream, { receivers: subs.size });
        }
    }

    private sendToUser(userId: string, stream: "orders" | "balance", data: unknown): void {
        const userConns = this.userConnections.get(userId);
        if (!userConns) return;

        for (const connId of userConns) {
            const conn = this.connections.get(connId);
            if (conn && conn.subscriptions.has(stream)) {
                this.enqueue(conn, { type: stream, key: stream, data });
                if (this.config.logDeliveries) {
                    logWsUserMessage(userId, stream, "update", { connection: truncate(connId, 8) });
                }
            }
        }
    }

    private sendError(conn: HubConnection, code: HubErrorCode, message: string): void {
        this.enqueue(conn, { type: "error", code, message });
    }

    // ============================================
    // Delivery
    // ============================================

    private enqueue(conn: HubConnection, frame: HubFrame): void {
        const payload = JSON.stringify({ ...frame, timestamp: new Date().toISOString() });
        const dropped = conn.outbound.push(payload);
        if (dropped > 0) {
            conn.dropped += dropped;
            this.dropped += dropped;
        }
        this.flush(conn);
    }

    /**
     * Single writer per connection: the next frame goes out only after the
     * previous send has completed
     */
    private flush(conn: HubConnection): void {
        if (conn.writing) return;
        const next = conn.outbound.shift();
        if (next === undefined) return;

        conn.writing = true;
        try {
            conn.socket.send(next, (err) => {
                conn.writing = false;
                if (err) {
                    this.failConnection(conn, err);
                    return;
                }
                conn.sent++;
                this.sent++;
                this.flush(conn);
            });
        } catch (error) {
            conn.writing = false;
            this.failConnection(conn, error);
        }
    }

    private failConnection(conn: HubConnection, error: unknown): void {
        if (!this.connections.has(conn.id)) return;
        logAppWarn("SubscriptionHub", "Send failed, closing connection", {
            connection: truncate(conn.id, 8),
            error: error instanceof Error ? error.message : String(error),
        });
        this.removeConnection(conn.id);
        conn.socket.close(1011, "Send failed");
    }

    // ============================================
    // Monitoring
    // ============================================

    getConnectionInfo(connectionId: string): ConnectionInfo | null {
        const conn = this.connections.get(connectionId);
        if (!conn) return null;
        return {
            userId: conn.userId,
            subscriptions: [...conn.subscriptions.keys()],
            queued: conn.outbound.size,
            sent: conn.sent,
            dropped: conn.dropped,
        };
    }

    getStats(): HubStats {
        let authenticated = 0;
        for (const conn of this.connections.values()) {
            if (conn.userId) authenticated++;
        }

        return {
            connections: this.connections.size,
            authenticatedConnections: authenticated,
            subscriptions: this.subscribers.size,
            users: this.userConnections.size,
            sent: this.sent,
            dropped: this.dropped,
            malformed: this.malformed,
        };
    }
}
