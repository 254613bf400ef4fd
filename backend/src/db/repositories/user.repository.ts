/**
 * User repository for database operations
 */

import { BaseRepository } from "./base.repository";
import { readString, type SqlRow } from "../database";
import type { User } from "../../types";

export class UserRepository extends BaseRepository {
    /**
     * Get user by username
     */
    getByUsername(username: string): User | null {
        const row = this.db.get("SELECT * FROM users WHERE username = ?", [username]);

        return row ? this.rowToUser(row) : null;
    }

    /**
     * Create a new user. Returns false if the username is taken.
     */
    create(user: User): boolean {
        const changes = this.db.run("INSERT OR IGNORE INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", [
            user.username,
            user.passwordHash,
            this.toSqlDate(user.createdAt),
        ]);

        return changes === 1;
    }

    private rowToUser(row: SqlRow): User {
        return {
            username: readString(row, "username"),
            passwordHash: readString(row, "password_hash"),
            createdAt: this.fromSqlDate(readString(row, "created_at")),
        };
    }
}
