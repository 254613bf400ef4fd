/**
 * Services module exports
 */

export {
    AuthService,
    UserExistsError,
    InvalidCredentialsError,
    InvalidTokenError,
    hashPassword,
    verifyPassword,
} from "./auth.service";
export type { AuthServiceConfig, TokenResponse } from "./auth.service";

export { SnapshotService, DEFAULT_SNAPSHOT_CONFIG } from "./snapshot.service";
export type { SnapshotConfig, SnapshotStatus } from "./snapshot.service";
