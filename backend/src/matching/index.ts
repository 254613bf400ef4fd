/**
 * Matching module exports
 *
 * This module provides the paper-trading infrastructure:
 * - BalanceLedger: Per-user balances with reservations
 * - MatchingEngine: Fills resting orders against the consolidated best touch
 * - StateStore: Snapshot contract (see db/state-store for the SQLite implementation)
 */

export { MatchingEngine } from "./engine";
export type { EngineEventListener, MatchingStats } from "./engine";
export { BalanceLedger } from "./ledger";
export type { UserBalance } from "./ledger";
export { InMemoryStateStore } from "./state-store";
export type { EngineSnapshot, StateStore } from "./state-store";
export * from "./errors";
