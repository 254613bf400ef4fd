/**
 * Balance repository for database operations
 */

import { BaseRepository } from "./base.repository";
import { readString, type SqlRow } from "../database";
import type { UserBalance } from "../../matching/ledger";

const UPSERT_BALANCE_SQL = `
      INSERT INTO balances (user_id, asset, total, available, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (user_id, asset) DO UPDATE SET
        total = excluded.total,
        available = excluded.available,
        updated_at = excluded.updated_at
    `;

export class BalanceRepository extends BaseRepository {
    /**
     * Get every balance line
     */
    getAll(): UserBalance[] {
        const rows = this.db.all("SELECT * FROM balances ORDER BY user_id, asset");

        return rows.map((row) => this.rowToBalance(row));
    }

    /**
     * Replace all balance lines. Call inside a transaction.
     */
    replaceAll(entries: UserBalance[]): void {
        const now = this.now();
        this.db.run("DELETE FROM balances");
        this.db.runMany(
            UPSERT_BALANCE_SQL,
            entries.map((entry) => [
                entry.userId,
                entry.balance.asset,
                this.toSqlDecimal(entry.balance.total),
                this.toSqlDecimal(entry.balance.available),
                now,
            ]),
        );
    }

    private rowToBalance(row: SqlRow): UserBalance {
        return {
            userId: readString(row, "user_id"),
            balance: {
                asset: readString(row, "asset"),
                total: this.fromSqlDecimal(readString(row, "total")),
                available: this.fromSqlDecimal(readString(row, "available")),
            },
        };
    }
}
