/**
 * Barrel exports for routes
 */

export { health } from "./health.routes";
export { auth } from "./auth.routes";
export { info } from "./info.routes";
export { orders } from "./orders.routes";
export { account } from "./account.routes";
