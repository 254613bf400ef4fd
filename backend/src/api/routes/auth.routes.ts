/**
 * Auth endpoints
 *
 * POST /register - Create a user and return an access token
 * POST /login    - Exchange credentials for an access token
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { validateJsonObject, validateRequiredString } from "../utils/validation";
import type { TokenApiResponse } from "../types/api.types";

const auth = new Hono();

/**
 * POST /register
 */
auth.post("/register", async (c) => {
    const ctx = getAppContext();
    const body = validateJsonObject(await c.req.json());

    const username = validateRequiredString(body.username, "username", 3, 64).trim();
    const password = validateRequiredString(body.password, "password", 6, 256);

    const token = await ctx.authService.register(username, password);
    const response: TokenApiResponse = token;

    return c.json(response, 201);
});

/**
 * POST /login
 */
auth.post("/login", async (c) => {
    const ctx = getAppContext();
    const body = validateJsonObject(await c.req.json());

    const username = validateRequiredString(body.username, "username").trim();
    const password = validateRequiredString(body.password, "password");

    const response: TokenApiResponse = await ctx.authService.login(username, password);
    return c.json(response);
});

export { auth };
