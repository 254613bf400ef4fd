/**
 * Auth Service
 *
 * Registration and login with salted PBKDF2 password hashes, and issuance /
 * verification of HS256 bearer tokens whose subject is the username.
 */

import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";
import { sign, verify } from "hono/jwt";
import type { UserRepository } from "../db/repositories/user.repository";
import { logApp } from "../utils/logger";

const pbkdf2Async = promisify(pbkdf2);

const HASH_SCHEME = "pbkdf2-sha256";
const KEY_LENGTH = 32;

// ============================================
// Types
// ============================================

export interface AuthServiceConfig {
    jwtSecret: string;
    jwtExpiresMinutes: number;
    /** PBKDF2 iterations (default: 100000) */
    hashIterations?: number;
}

export interface TokenResponse {
    accessToken: string;
    tokenType: "bearer";
    expiresAt: number; // epoch seconds
}

export class UserExistsError extends Error {
    readonly code = "USER_EXISTS";
    constructor(username: string) {
        super(`User already exists: ${username}`);
        this.name = "UserExistsError";
    }
}

export class InvalidCredentialsError extends Error {
    readonly code = "INVALID_CREDENTIALS";
    constructor() {
        super("Invalid username or password");
        this.name = "InvalidCredentialsError";
    }
}

export class InvalidTokenError extends Error {
    readonly code = "INVALID_TOKEN";
    constructor(message = "Invalid or expired token") {
        super(message);
        this.name = "InvalidTokenError";
    }
}

// ============================================
// Password Hashing
// ============================================

/**
 * Hash a password as `pbkdf2-sha256$<iterations>$<salt>$<hash>`
 */
export async function hashPassword(password: string, iterations: number = 100_000): Promise<string> {
    const salt = randomBytes(16);
    const derived = await pbkdf2Async(password, salt, iterations, KEY_LENGTH, "sha256");
    return [HASH_SCHEME, iterations, salt.toString("hex"), derived.toString("hex")].join("$");
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
    const [scheme, iterationsText, saltHex, hashHex] = stored.split("$");
    const iterations = Number(iterationsText);
    if (scheme !== HASH_SCHEME || !Number.isInteger(iterations) || !saltHex || !hashHex) {
        return false;
    }

    const expected = Buffer.from(hashHex, "hex");
    const derived = await pbkdf2Async(password, Buffer.from(saltHex, "hex"), iterations, expected.length, "sha256");
    return derived.length === expected.length && timingSafeEqual(derived, expected);
}

// ============================================
// Auth Service
// ============================================

export class AuthService {
    private readonly hashIterations: number;

    constructor(
        private readonly users: UserRepository,
        private readonly config: AuthServiceConfig,
    ) {
        this.hashIterations = config.hashIterations ?? 100_000;
    }

    /**
     * Create a user and return a token for it
     */
    async register(username: string, password: string): Promise<TokenResponse> {
        if (this.users.getByUsername(username)) {
            throw new UserExistsError(username);
        }

        const passwordHash = await hashPassword(password, this.hashIterations);
        // The insert is the authority if two registrations race past the check above
        if (!this.users.create({ username, passwordHash, createdAt: new Date() })) {
            throw new UserExistsError(username);
        }

        logApp("AuthService", "User registered", { username });
        return this.issueToken(username);
    }

    async login(username: string, password: string): Promise<TokenResponse> {
        const user = this.users.getByUsername(username);
        if (!user || !(await verifyPassword(password, user.passwordHash))) {
            throw new InvalidCredentialsError();
        }
        return this.issueToken(username);
    }

    async issueToken(username: string): Promise<TokenResponse> {
        const issuedAt = Math.floor(Date.now() / 1000);
        const expiresAt = issuedAt + this.config.jwtExpiresMinutes * 60;
        const accessToken = await sign({ sub: username, iat: issuedAt, exp: expiresAt }, this.config.jwtSecret, "HS256");
        return { accessToken, tokenType: "bearer", expiresAt };
    }

    /**
     * Verify a bearer token and return its username
     */
    async verifyToken(token: string): Promise<string> {
        let payload: Record<string, unknown>;
        try {
            payload = await verify(token, this.config.jwtSecret, "HS256");
        } catch (error) {
            throw new InvalidTokenError(error instanceof Error ? error.message : undefined);
        }

        const subject = payload.sub;
        if (typeof subject !== "string" || !subject || !this.users.getByUsername(subject)) {
            throw new InvalidTokenError("Unknown token subject");
        }
        return subject;
    }
}
