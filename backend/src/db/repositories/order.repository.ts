/**
 * Order repository for database operations
 */

import { BaseRepository } from "./base.repository";
import { readNumber, readString, type SqlRow } from "../database";
import type { Order, OrderSide, OrderStatus } from "../../types";
import { ORDER_STATUSES } from "../../types";

const UPSERT_ORDER_SQL = `
      INSERT INTO orders
      (order_id, sequence, user_id, symbol, side, price, quantity,
       filled_quantity, reserved, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (order_id) DO UPDATE SET
        filled_quantity = excluded.filled_quantity,
        reserved = excluded.reserved,
        status = excluded.status,
        updated_at = excluded.updated_at
    `;

function parseSide(value: string): OrderSide {
    if (value === "buy" || value === "sell") return value;
    throw new Error(`Invalid order side in database: ${value}`);
}

function parseStatus(value: string): OrderStatus {
    const status = ORDER_STATUSES.find((s) => s === value);
    if (!status) throw new Error(`Invalid order status in database: ${value}`);
    return status;
}

export class OrderRepository extends BaseRepository {
    /**
     * Get all orders in submission order
     */
    getAll(): Order[] {
        const rows = this.db.all("SELECT * FROM orders ORDER BY sequence ASC");

        return rows.map((row) => this.rowToOrder(row));
    }

    /**
     * Insert or update orders with one prepared statement
     */
    upsertMany(orders: Order[]): void {
        this.db.runMany(
            UPSERT_ORDER_SQL,
            orders.map((order) => [
                order.orderId,
                order.sequence,
                order.userId,
                order.symbol,
                order.side,
                this.toSqlDecimal(order.price),
                this.toSqlDecimal(order.quantity),
                this.toSqlDecimal(order.filledQuantity),
                this.toSqlDecimal(order.reserved),
                order.status,
                this.toSqlDate(order.createdAt),
                this.toSqlDate(order.updatedAt),
            ]),
        );
    }

    private rowToOrder(row: SqlRow): Order {
        return {
            orderId: readString(row, "order_id"),
            sequence: readNumber(row, "sequence"),
            userId: readString(row, "user_id"),
            symbol: readString(row, "symbol"),
            side: parseSide(readString(row, "side")),
            price: this.fromSqlDecimal(readString(row, "price")),
            quantity: this.fromSqlDecimal(readString(row, "quantity")),
            filledQuantity: this.fromSqlDecimal(readString(row, "filled_quantity")),
            reserved: this.fromSqlDecimal(readString(row, "reserved")),
            status: parseStatus(readString(row, "status")),
            createdAt: this.fromSqlDate(readString(row, "created_at")),
            updatedAt: this.fromSqlDate(readString(row, "updated_at")),
        };
    }
}
