/**
 * Base repository class with common patterns
 */

import Decimal from "decimal.js";
import type { SqliteDatabase } from "../database";

export abstract class BaseRepository {
    constructor(protected db: SqliteDatabase) {}

    /**
     * Get current timestamp as ISO string
     */
    protected now(): string {
        return new Date().toISOString();
    }

    /**
     * Convert Decimal to its exact string form for SQLite storage
     */
    protected toSqlDecimal(value: Decimal): string {
        return value.toString();
    }

    /**
     * Convert stored decimal text to Decimal
     */
    protected fromSqlDecimal(value: string | null): Decimal {
        return new Decimal(value ?? 0);
    }

    /**
     * Convert Date to ISO string for SQLite
     */
    protected toSqlDate(date: Date): string {
        return date.toISOString();
    }

    /**
     * Convert ISO string to Date
     */
    protected fromSqlDate(value: string): Date {
        return new Date(value);
    }
}
