/**
 * Request validation utilities
 */

import { BadRequestError } from "../types/errors";

/**
 * Read a JSON object body, rejecting anything else
 */
export function validateJsonObject(value: unknown): Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new BadRequestError("Request body must be a JSON object", "INVALID_BODY");
    }
    return Object.fromEntries(Object.entries(value));
}

/**
 * Validate a decimal amount given as a JSON number or numeric string.
 * Range checks are left to the matching engine.
 */
export function validateDecimalInput(value: unknown, fieldName: string): string | number {
    if (value === undefined || value === null) {
        throw new BadRequestError(`${fieldName} is required`, "MISSING_FIELD");
    }

    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new BadRequestError(`${fieldName} must be a number`, "INVALID_NUMBER");
        }
        return value;
    }

    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
        return value.trim();
    }

    throw new BadRequestError(`${fieldName} must be a number`, "INVALID_NUMBER");
}

/**
 * Validate that a value is one of the allowed enum values
 */
export function validateEnum<T extends string>(value: unknown, allowed: readonly T[], fieldName: string): T {
    if (value === undefined || value === null) {
        throw new BadRequestError(`${fieldName} is required`, "MISSING_FIELD");
    }

    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
        throw new BadRequestError(`${fieldName} must be one of: ${allowed.join(", ")}`, "INVALID_ENUM");
    }

    return match;
}

/**
 * Validate an optional enum query parameter
 */
export function validateOptionalEnum<T extends string>(
    value: string | undefined,
    allowed: readonly T[],
    fieldName: string,
): T | undefined {
    if (value === undefined || value === "") {
        return undefined;
    }
    return validateEnum(value, allowed, fieldName);
}

/**
 * Validate a required string field
 */
export function validateRequiredString(value: unknown, fieldName: string, minLength = 1, maxLength?: number): string {
    if (value === undefined || value === null) {
        throw new BadRequestError(`${fieldName} is required`, "MISSING_FIELD");
    }

    if (typeof value !== "string") {
        throw new BadRequestError(`${fieldName} must be a string`, "INVALID_TYPE");
    }

    if (value.length < minLength) {
        throw new BadRequestError(`${fieldName} must be at least ${minLength} characters`, "STRING_TOO_SHORT");
    }

    if (maxLength !== undefined && value.length > maxLength) {
        throw new BadRequestError(`${fieldName} cannot exceed ${maxLength} characters`, "STRING_TOO_LONG");
    }

    return value;
}
