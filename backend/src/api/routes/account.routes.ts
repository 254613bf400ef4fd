/**
 * Account endpoints
 *
 * GET  /balance - Balance lines for every configured asset
 * POST /deposit - Credit an asset to the authenticated user
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { userAuth } from "../middleware";
import { serializeBalance } from "../utils/serialize";
import { validateDecimalInput, validateJsonObject, validateRequiredString } from "../utils/validation";
import type { BalanceResponse } from "../types/api.types";

const account = new Hono();

account.use("/balance", userAuth);
account.use("/deposit", userAuth);

/**
 * GET /balance
 */
account.get("/balance", (c) => {
    const ctx = getAppContext();
    const balances: BalanceResponse[] = ctx.matchingEngine.getBalance(c.get("userId")).map(serializeBalance);
    return c.json({ balances });
});

/**
 * POST /deposit
 * Simulated deposit; any asset name is accepted
 */
account.post("/deposit", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const body = validateJsonObject(await c.req.json());

    const asset = validateRequiredString(body.asset, "asset");
    const amount = validateDecimalInput(body.amount, "amount");

    const balance = ctx.matchingEngine.deposit(userId, asset, amount);

    return c.json(serializeBalance(balance));
});

export { account };
