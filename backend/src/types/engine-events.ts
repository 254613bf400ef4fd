/**
 * Events emitted by the matching engine for user-scoped streams
 */

import type { Balance } from "./account";
import type { Order } from "./order";

export type EngineEvent =
    | { type: "order.updated"; userId: string; order: Order }
    | { type: "balance.updated"; userId: string; balance: Balance };
