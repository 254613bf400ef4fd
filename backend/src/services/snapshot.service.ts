/**
 * Snapshot Service
 * Periodically writes matching engine state to the State Store
 */

import type { MatchingEngine } from "../matching/engine";
import { logApp, logAppError, logAppWarn } from "../utils/logger";

// ============================================
// Types
// ============================================

/** Snapshot service configuration */
export interface SnapshotConfig {
    /** How often to snapshot in ms (default: 5000) */
    intervalMs: number;
}

/** Default configuration values */
export const DEFAULT_SNAPSHOT_CONFIG: SnapshotConfig = {
    intervalMs: 5000,
};

/** Snapshot service status for monitoring */
export interface SnapshotStatus {
    isRunning: boolean;
    lastRunTime: Date | null;
    snapshots: number;
    errors: number;
}

// ============================================
// Service
// ============================================

export class SnapshotService {
    private isRunning = false;
    private timer: ReturnType<typeof setInterval> | null = null;
    private lastRunTime: Date | null = null;
    private snapshots = 0;
    private errors = 0;

    constructor(
        private readonly engine: MatchingEngine,
        private readonly config: SnapshotConfig = DEFAULT_SNAPSHOT_CONFIG,
    ) {}

    /**
     * Start the snapshot loop
     */
    start(): void {
        if (this.isRunning) {
            logAppWarn("Snapshot", "Already running");
            return;
        }

        this.isRunning = true;
        logApp("Snapshot", "Starting", { intervalMs: this.config.intervalMs });

        this.timer = setInterval(() => {
            this.runSnapshot();
        }, this.config.intervalMs);
        this.timer.unref();
    }

    /**
     * Stop the loop and write a final snapshot
     */
    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.isRunning) {
            this.isRunning = false;
            this.runSnapshot();
            logApp("Snapshot", "Stopped", { snapshots: this.snapshots });
        }
    }

    /**
     * Write one snapshot. Errors are logged and counted; the next run retries.
     */
    runSnapshot(): boolean {
        try {
            this.engine.snapshot();
            this.snapshots++;
            this.lastRunTime = new Date();
            return true;
        } catch (error) {
            this.errors++;
            logAppError("Snapshot", "Snapshot failed", error);
            return false;
        }
    }

    getStatus(): SnapshotStatus {
        return {
            isRunning: this.isRunning,
            lastRunTime: this.lastRunTime,
            snapshots: this.snapshots,
            errors: this.errors,
        };
    }
}
