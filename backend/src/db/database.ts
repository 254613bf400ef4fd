/**
 * SQLite database connection and initialization
 * Uses sql.js (SQLite compiled to WebAssembly). The database lives in memory
 * and is written back to its file after every committed write.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import initSqlJs, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from "sql.js";
import { TABLES, INDEXES, SCHEMA_VERSION } from "./schema";
import { getConfig } from "../config";
import { logApp } from "../utils/logger";

export type SqlRow = ParamsObject;

// ============================================
// Connection
// ============================================

export class SqliteDatabase {
    private depth = 0;

    constructor(
        private readonly db: Database,
        readonly path: string,
    ) {}

    /**
     * Run a statement. Returns the number of rows changed.
     */
    run(sql: string, params: SqlValue[] = []): number {
        this.db.run(sql, params);
        const changes = this.db.getRowsModified();
        this.persistIfIdle();
        return changes;
    }

    /**
     * Run one statement for every parameter row, preparing it once
     */
    runMany(sql: string, rows: SqlValue[][]): void {
        if (rows.length === 0) return;
        const stmt = this.db.prepare(sql);
        try {
            for (const params of rows) {
                stmt.run(params);
            }
        } finally {
            stmt.free();
        }
        this.persistIfIdle();
    }

    get(sql: string, params: SqlValue[] = []): SqlRow | null {
        const stmt = this.db.prepare(sql);
        try {
            stmt.bind(params);
            return stmt.step() ? stmt.getAsObject() : null;
        } finally {
            stmt.free();
        }
    }

    all(sql: string, params: SqlValue[] = []): SqlRow[] {
        const stmt = this.db.prepare(sql);
        const rows: SqlRow[] = [];
        try {
            stmt.bind(params);
            while (stmt.step()) {
                rows.push(stmt.getAsObject());
            }
        } finally {
            stmt.free();
        }
        return rows;
    }

    /**
     * Execute callback in a transaction. Nested calls join the outer one.
     */
    transaction<T>(callback: () => T): T {
        if (this.depth > 0) {
            return callback();
        }

        this.db.run("BEGIN");
        this.depth++;
        let result: T;
        try {
            result = callback();
            this.db.run("COMMIT");
        } catch (error) {
            this.db.run("ROLLBACK");
            throw error;
        } finally {
            this.depth--;
        }

        this.persistIfIdle();
        return result;
    }

    /**
     * Write the database image to its file (no-op for ":memory:")
     */
    persist(): void {
        if (this.path === ":memory:") return;
        const tmpPath = `${this.path}.tmp`;
        writeFileSync(tmpPath, this.db.export());
        renameSync(tmpPath, this.path);
    }

    close(): void {
        this.persist();
        this.db.close();
    }

    private persistIfIdle(): void {
        if (this.depth === 0) {
            this.persist();
        }
    }
}

export interface DatabaseConnection {
    db: SqliteDatabase;
    close(): void;
}

// The WebAssembly module is compiled once per process
let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
    if (!sqlJs) {
        sqlJs = initSqlJs();
    }
    return sqlJs;
}

/**
 * Open (or create) the database file and apply the schema
 */
export async function initDatabase(path?: string): Promise<DatabaseConnection> {
    const config = getConfig();
    const dbPath = path ?? config.database.path;

    const SQL = await loadSqlJs();
    const existing = dbPath !== ":memory:" && existsSync(dbPath) ? readFileSync(dbPath) : null;
    const db = new SqliteDatabase(new SQL.Database(existing), dbPath);

    db.transaction(() => {
        for (const tableSql of Object.values(TABLES)) {
            db.run(tableSql);
        }
        for (const indexSql of INDEXES) {
            db.run(indexSql);
        }
        setSystemState(db, "schema_version", String(SCHEMA_VERSION));
    });

    logApp("Database", "Initialized", { path: dbPath, schema: SCHEMA_VERSION, restored: existing !== null });

    return {
        db,
        close() {
            db.close();
        },
    };
}

// ============================================
// Row Helpers
// ============================================

export function readString(row: SqlRow, column: string): string {
    const value = row[column];
    if (typeof value !== "string") {
        throw new Error(`Expected text in column ${column}`);
    }
    return value;
}

export function readNumber(row: SqlRow, column: string): number {
    const value = row[column];
    if (typeof value !== "number") {
        throw new Error(`Expected a number in column ${column}`);
    }
    return value;
}

// ============================================
// System State
// ============================================

/**
 * Get current schema version from database
 */
export function getSchemaVersion(db: SqliteDatabase): number {
    const value = getSystemState(db, "schema_version");
    return value ? parseInt(value, 10) : 0;
}

/**
 * Get or set a system state value
 */
export function getSystemState(db: SqliteDatabase, key: string): string | null {
    const row = db.get("SELECT value FROM system_state WHERE key = ?", [key]);
    return row ? readString(row, "value") : null;
}

export function setSystemState(db: SqliteDatabase, key: string, value: string): void {
    db.run("INSERT OR REPLACE INTO system_state (key, value) VALUES (?, ?)", [key, value]);
}
