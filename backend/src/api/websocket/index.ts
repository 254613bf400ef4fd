/**
 * Barrel exports for WebSocket module
 */

export {
    SubscriptionHub,
    DEFAULT_SUBSCRIPTION_HUB_CONFIG,
    type ClientSocket,
    type TokenVerifier,
    type SubscriptionHubConfig,
    type HubFrame,
    type HubStats,
} from "./subscription-hub";
export { parseStreamSpec, streamKey, STREAM_NAMES, type StreamSpec, type StreamName } from "./stream-spec";
export { attachWebSocketServer, WS_PATH } from "./ws-handler";
