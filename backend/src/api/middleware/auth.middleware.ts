/**
 * Authentication middleware
 *
 * Resolves the caller from an `Authorization: Bearer <token>` header
 */

import type { Context, Next } from "hono";
import { getAppContext } from "../../context";
import { InvalidTokenError } from "../../services";
import { UnauthorizedError } from "../types/errors";

/**
 * Extract the bearer token from an Authorization header value
 */
export function parseBearerToken(header: string | undefined): string | null {
    if (!header) return null;
    const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
    return match?.[1] ?? null;
}

/**
 * User authentication middleware
 * Verifies the bearer token and sets userId in context for downstream handlers
 */
export async function userAuth(c: Context, next: Next): Promise<void | Response> {
    const token = parseBearerToken(c.req.header("Authorization"));

    if (!token) {
        throw new UnauthorizedError("Bearer token required", "MISSING_TOKEN");
    }

    const ctx = getAppContext();
    let userId: string;
    try {
        userId = await ctx.authService.verifyToken(token);
    } catch (error) {
        if (error instanceof InvalidTokenError) {
            throw new UnauthorizedError(error.message, "INVALID_TOKEN");
        }
        throw error;
    }

    c.set("userId", userId);

    await next();
}

// Type augmentation for Hono context
declare module "hono" {
    interface ContextVariableMap {
        userId: string;
    }
}
