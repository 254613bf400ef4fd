/**
 * Orders endpoints
 *
 * GET    /orders           - List orders for authenticated user
 * GET    /orders/:orderId  - Get single order
 * POST   /orders           - Place a new limit order
 * DELETE /orders/:orderId  - Cancel an order
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { ORDER_STATUSES } from "../../types";
import { userAuth } from "../middleware";
import { serializeOrder } from "../utils/serialize";
import {
    validateDecimalInput,
    validateEnum,
    validateJsonObject,
    validateOptionalEnum,
    validateRequiredString,
} from "../utils/validation";

const orders = new Hono();

// All order routes require user authentication
orders.use("*", userAuth);

/**
 * GET /orders
 * List orders for the authenticated user, newest first
 * Optional filters: symbol, status
 */
orders.get("/", (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const symbol = c.req.query("symbol") || undefined;
    const status = validateOptionalEnum(c.req.query("status"), ORDER_STATUSES, "status");

    const userOrders = ctx.matchingEngine.listOrders(userId, { symbol, status });

    return c.json({
        data: userOrders.map(serializeOrder),
    });
});

/**
 * GET /orders/:orderId
 * Other users' orders are reported as not found
 */
orders.get("/:orderId", (c) => {
    const ctx = getAppContext();
    const order = ctx.matchingEngine.getOrder(c.get("userId"), c.req.param("orderId"));
    return c.json(serializeOrder(order));
});

/**
 * POST /orders
 * Reserves funds and attempts an immediate match against the current touch
 */
orders.post("/", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const body = validateJsonObject(await c.req.json());

    const symbol = validateRequiredString(body.symbol, "symbol").trim().toUpperCase();
    const side = validateEnum(body.side, ["buy", "sell"] as const, "side");
    const price = validateDecimalInput(body.price, "price");
    const quantity = validateDecimalInput(body.quantity, "quantity");

    const order = ctx.matchingEngine.submitOrder(userId, { symbol, side, price, quantity });

    return c.json(serializeOrder(order), 201);
});

/**
 * DELETE /orders/:orderId
 */
orders.delete("/:orderId", (c) => {
    const ctx = getAppContext();
    const cancelled = ctx.matchingEngine.cancelOrder(c.get("userId"), c.req.param("orderId"));

    return c.json({
        ...serializeOrder(cancelled),
        message: "Order cancelled successfully",
    });
});

export { orders };
