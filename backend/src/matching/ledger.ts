/**
 * Balance Ledger
 * Per-user, per-asset balances with reservation accounting
 */

import Decimal from "decimal.js";
import type { Balance } from "../types/account";
import { InsufficientBalanceError } from "./errors";

const ZERO = new Decimal(0);

export interface UserBalance {
    userId: string;
    balance: Balance;
}

/**
 * Holds `total` and `available` for every (user, asset).
 * `total - available` is the amount reserved by the user's open orders.
 *
 * Mutations:
 * - credit: total += x, available += x
 * - reserve: available -= x (fails if available < x)
 * - release: available += x
 * - consumeReserved: total -= x (the reservation is spent by a fill)
 */
export class BalanceLedger {
    /** userId -> asset -> balance */
    private balances = new Map<string, Map<string, Balance>>();

    get(userId: string, asset: string): Balance {
        const balance = this.balances.get(userId)?.get(asset);
        return balance ? { ...balance } : { asset, total: ZERO, available: ZERO };
    }

    /**
     * Every balance line the user holds
     */
    list(userId: string): Balance[] {
        return [...(this.balances.get(userId)?.values() ?? [])].map((b) => ({ ...b }));
    }

    credit(userId: string, asset: string, amount: Decimal): Balance {
        const balance = this.getOrCreate(userId, asset);
        balance.total = balance.total.plus(amount);
        balance.available = balance.available.plus(amount);
        return { ...balance };
    }

    reserve(userId: string, asset: string, amount: Decimal): Balance {
        const balance = this.getOrCreate(userId, asset);
        if (balance.available.lt(amount)) {
            throw new InsufficientBalanceError(asset, amount.toString(), balance.available.toString());
        }
        balance.available = balance.available.minus(amount);
        return { ...balance };
    }

    release(userId: string, asset: string, amount: Decimal): Balance {
        const balance = this.getOrCreate(userId, asset);
        balance.available = balance.available.plus(amount);
        return { ...balance };
    }

    consumeReserved(userId: string, asset: string, amount: Decimal): Balance {
        const balance = this.getOrCreate(userId, asset);
        balance.total = balance.total.minus(amount);
        return { ...balance };
    }

    /**
     * Replace all balances (snapshot load)
     */
    restore(entries: UserBalance[]): void {
        this.balances.clear();
        for (const { userId, balance } of entries) {
            const stored = this.getOrCreate(userId, balance.asset);
            stored.total = balance.total;
            stored.available = balance.available;
        }
    }

    entries(): UserBalance[] {
        const result: UserBalance[] = [];
        for (const [userId, byAsset] of this.balances) {
            for (const balance of byAsset.values()) {
                result.push({ userId, balance: { ...balance } });
            }
        }
        return result;
    }

    private getOrCreate(userId: string, asset: string): Balance {
        let byAsset = this.balances.get(userId);
        if (!byAsset) {
            byAsset = new Map();
            this.balances.set(userId, byAsset);
        }
        let balance = byAsset.get(asset);
        if (!balance) {
            balance = { asset, total: ZERO, available: ZERO };
            byAsset.set(asset, balance);
        }
        return balance;
    }
}
