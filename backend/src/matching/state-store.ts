/**
 * State Store contract for matching engine snapshots
 */

import type { Order } from "../types/order";
import type { UserBalance } from "./ledger";

/** Everything the matching engine needs to resume */
export interface EngineSnapshot {
    balances: UserBalance[];
    orders: Order[];
}

/**
 * Snapshot persistence. The engine calls load() once before processing
 * anything and save() on a cadence and at shutdown.
 */
export interface StateStore {
    load(): EngineSnapshot;
    save(snapshot: EngineSnapshot): void;
}

/**
 * Keeps the last snapshot in memory. Stands in for the SQLite store in engine and service tests.
 */
export class InMemoryStateStore implements StateStore {
    private snapshot: EngineSnapshot = { balances: [], orders: [] };
    saves = 0;

    constructor(initial?: EngineSnapshot) {
        if (initial) this.save(initial);
        this.saves = 0;
    }

    load(): EngineSnapshot {
        return copySnapshot(this.snapshot);
    }

    save(snapshot: EngineSnapshot): void {
        this.snapshot = copySnapshot(snapshot);
        this.saves++;
    }
}

function copySnapshot(snapshot: EngineSnapshot): EngineSnapshot {
    return {
        balances: snapshot.balances.map(({ userId, balance }) => ({ userId, balance: { ...balance } })),
        orders: snapshot.orders.map((order) => ({ ...order })),
    };
}
