/**
 * Unit tests for SnapshotService
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MatchingEngine } from "../../../src/matching/engine";
import { InMemoryStateStore, type EngineSnapshot, type StateStore } from "../../../src/matching/state-store";
import { SnapshotService } from "../../../src/services/snapshot.service";

class FailingStateStore implements StateStore {
    load(): EngineSnapshot {
        return { balances: [], orders: [] };
    }

    save(): void {
        throw new Error("disk full");
    }
}

describe("SnapshotService", () => {
    let store: InMemoryStateStore;
    let engine: MatchingEngine;
    let service: SnapshotService;

    beforeEach(() => {
        vi.useFakeTimers();
        store = new InMemoryStateStore();
        engine = new MatchingEngine(["BTCUSDT"], store);
        engine.load();
        service = new SnapshotService(engine, { intervalMs: 1000 });
    });

    afterEach(() => {
        service.stop();
        vi.useRealTimers();
    });

    it("should snapshot on every interval", () => {
        service.start();
        vi.advanceTimersByTime(3000);

        expect(store.saves).toBe(3);
        expect(service.getStatus()).toMatchObject({ isRunning: true, snapshots: 3, errors: 0 });
    });

    it("should write a final snapshot on stop", () => {
        service.start();
        engine.deposit("alice", "USDT", 100);

        service.stop();

        expect(store.saves).toBe(1);
        expect(store.load().balances).toHaveLength(1);
        expect(service.getStatus().isRunning).toBe(false);

        vi.advanceTimersByTime(5000);
        expect(store.saves).toBe(1);
    });

    it("should not snapshot on stop when it never started", () => {
        service.stop();
        expect(store.saves).toBe(0);
    });

    it("should ignore a second start", () => {
        service.start();
        service.start();
        vi.advanceTimersByTime(1000);

        expect(store.saves).toBe(1);
    });

    it("should count failures and keep running", () => {
        const failing = new MatchingEngine(["BTCUSDT"], new FailingStateStore());
        const faulty = new SnapshotService(failing, { intervalMs: 1000 });
        faulty.start();

        vi.advanceTimersByTime(2000);

        expect(faulty.getStatus()).toMatchObject({ isRunning: true, snapshots: 0, errors: 2 });
        expect(faulty.runSnapshot()).toBe(false);
        faulty.stop();
    });
});
