/**
 * SQLite-backed State Store for matching engine snapshots
 */

import type { EngineSnapshot, StateStore } from "../matching/state-store";
import type { Order } from "../types";
import { setSystemState } from "./database";
import type { SqliteDatabase } from "./database";
import { BalanceRepository } from "./repositories/balance.repository";
import { OrderRepository } from "./repositories/order.repository";

function orderVersion(order: Order): string {
    return `${order.status}|${order.filledQuantity.toString()}|${order.reserved.toString()}`;
}

export class SqliteStateStore implements StateStore {
    private readonly balances: BalanceRepository;
    private readonly orders: OrderRepository;
    /** orderId -> version last written */
    private readonly written = new Map<string, string>();
    private lastOrdersWritten = 0;

    constructor(private readonly db: SqliteDatabase) {
        this.balances = new BalanceRepository(db);
        this.orders = new OrderRepository(db);
    }

    load(): EngineSnapshot {
        const orders = this.orders.getAll();
        this.written.clear();
        for (const order of orders) {
            this.written.set(order.orderId, orderVersion(order));
        }
        return {
            balances: this.balances.getAll(),
            orders,
        };
    }

    /**
     * Write the snapshot atomically. Orders unchanged since the last save are skipped.
     */
    save(snapshot: EngineSnapshot): void {
        const changed = snapshot.orders
            .map((order) => ({ order, version: orderVersion(order) }))
            .filter(({ order, version }) => this.written.get(order.orderId) !== version);

        this.db.transaction(() => {
            this.balances.replaceAll(snapshot.balances);
            this.orders.upsertMany(changed.map(({ order }) => order));
            setSystemState(this.db, "last_snapshot_at", new Date().toISOString());
        });

        for (const { order, version } of changed) {
            this.written.set(order.orderId, version);
        }
        this.lastOrdersWritten = changed.length;
    }

    getStats(): { trackedOrders: number; lastOrdersWritten: number } {
        return { trackedOrders: this.written.size, lastOrdersWritten: this.lastOrdersWritten };
    }
}
