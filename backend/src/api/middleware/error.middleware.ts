/**
 * Global error handler middleware
 *
 * Converts domain errors and API errors to consistent JSON responses
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ApiError } from "../types/errors";
import { MarketRelayError, type MarketRelayErrorKind } from "../../matching/errors";
import { InvalidCredentialsError, InvalidTokenError, UserExistsError } from "../../services";
import { logAppError } from "../../utils/logger";
import type { ErrorResponse } from "../types/api.types";

const KIND_STATUS: Record<MarketRelayErrorKind, ContentfulStatusCode> = {
    InvalidOrder: 400,
    InsufficientBalance: 400,
    NotFound: 404,
    AlreadyTerminal: 409,
    Unauthorized: 401,
    Stale: 503,
    Malformed: 400,
};

/**
 * Global error handler for Hono
 * Maps various error types to appropriate HTTP responses
 */
export async function errorHandler(err: Error, c: Context): Promise<Response> {
    // Handle known API errors (our custom error classes)
    if (err instanceof ApiError) {
        const response: ErrorResponse = {
            error: err.message,
            code: err.code,
        };
        if (err.details) {
            response.details = err.details;
        }
        return c.json(response, err.statusCode);
    }

    // Handle domain errors from the matching engine
    if (err instanceof MarketRelayError) {
        const response: ErrorResponse = {
            error: err.message,
            code: err.code,
        };
        if (err.details) {
            response.details = err.details;
        }
        return c.json(response, KIND_STATUS[err.kind]);
    }

    // Handle auth service errors
    if (err instanceof UserExistsError) {
        const response: ErrorResponse = { error: err.message, code: err.code };
        return c.json(response, 409);
    }

    if (err instanceof InvalidCredentialsError || err instanceof InvalidTokenError) {
        const response: ErrorResponse = { error: err.message, code: err.code };
        return c.json(response, 401);
    }

    // Handle JSON parse errors
    if (err instanceof SyntaxError) {
        const response: ErrorResponse = {
            error: "Invalid JSON in request body",
            code: "INVALID_JSON",
        };
        return c.json(response, 400);
    }

    logAppError("API", `${err.name}: ${err.message}`);
    if (process.env.NODE_ENV !== "production" && err.stack) {
        console.error(err.stack);
    }

    // Generic server error (don't leak internal details in production)
    const response: ErrorResponse = {
        error: process.env.NODE_ENV === "production" ? "Internal server error" : err.message,
        code: "INTERNAL_ERROR",
    };
    return c.json(response, 500);
}
