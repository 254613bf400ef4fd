/**
 * Barrel exports for all repositories
 */

export { BaseRepository } from "./base.repository";
export { UserRepository } from "./user.repository";
export { BalanceRepository } from "./balance.repository";
export { OrderRepository } from "./order.repository";
