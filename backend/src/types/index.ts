/**
 * Barrel exports for all types
 */

export * from "./market";
export * from "./order";
export * from "./account";
export * from "./engine-events";
