/**
 * Account types for user balances
 */

import type Decimal from "decimal.js";

/** Per-asset balance; total - available is the amount reserved by open orders */
export interface Balance {
    asset: string;
    total: Decimal;
    available: Decimal;
}

/** Registered user */
export interface User {
    username: string;
    passwordHash: string;
    createdAt: Date;
}
