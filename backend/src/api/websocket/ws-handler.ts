/**
 * WebSocket host for the Node HTTP server
 *
 * Accepts client sockets on /ws and hands frames to the subscription hub
 */

import type { Server } from "node:http";
import { WebSocketServer, type RawData } from "ws";
import { logAppError } from "../../utils/logger";
import type { SubscriptionHub } from "./subscription-hub";

export const WS_PATH = "/ws";

function frameToString(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
    return data.toString("utf8");
}

/**
 * Attach a WebSocket server to an existing HTTP server
 */
export function attachWebSocketServer(server: Server, hub: SubscriptionHub): WebSocketServer {
    const wss = new WebSocketServer({ server, path: WS_PATH });

    wss.on("connection", (ws) => {
        const connectionId = hub.addConnection(ws);

        ws.on("message", (data) => {
            hub.handleMessage(connectionId, frameToString(data)).catch((error: unknown) => {
                logAppError("WebSocket", "Message handling failed", error, { connectionId });
            });
        });

        ws.on("close", () => {
            hub.removeConnection(connectionId);
        });

        ws.on("error", (error) => {
            logAppError("WebSocket", "Socket error", error, { connectionId });
            hub.removeConnection(connectionId);
        });
    });

    wss.on("error", (error) => {
        logAppError("WebSocket", "Server error", error);
    });

    return wss;
}
