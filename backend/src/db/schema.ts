/**
 * SQLite schema definitions for the marketrelay backend
 *
 * Amounts are stored as TEXT so decimal values round-trip exactly.
 */

export const SCHEMA_VERSION = 1;

/** All table creation statements */
export const TABLES = {
    users: `
    CREATE TABLE IF NOT EXISTS users (
      username TEXT PRIMARY KEY,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `,

    balances: `
    CREATE TABLE IF NOT EXISTS balances (
      user_id TEXT NOT NULL,
      asset TEXT NOT NULL,
      total TEXT NOT NULL,
      available TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (user_id, asset)
    )
  `,

    orders: `
    CREATE TABLE IF NOT EXISTS orders (
      order_id TEXT PRIMARY KEY,
      sequence INTEGER NOT NULL UNIQUE,
      user_id TEXT NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL CHECK (side IN ('buy', 'sell')),
      price TEXT NOT NULL,
      quantity TEXT NOT NULL,
      filled_quantity TEXT NOT NULL,
      reserved TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('open', 'partially_filled', 'filled', 'cancelled')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `,

    system_state: `
    CREATE TABLE IF NOT EXISTS system_state (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `,
};

/** Index creation statements */
export const INDEXES = [
    "CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id)",
    "CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status)",
    "CREATE INDEX IF NOT EXISTS idx_balances_user ON balances(user_id)",
];
