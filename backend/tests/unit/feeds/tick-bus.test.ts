/**
 * Unit tests for TickBus
 *
 * Tests:
 * - Per-consumer ordering
 * - Consumer independence (errors, unsubscribe)
 * - Statistics
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TickBus } from "../../../src/feeds/tick-bus";
import type { FeedEvent } from "../../../src/feeds/types";
import { quoteEvent, tradeEvent } from "../../setup/test-fixtures";

function timestamps(events: FeedEvent[]): number[] {
    return events.map((e) => (e.type === "tick" ? e.tick.timestamp : e.timestamp));
}

describe("TickBus", () => {
    let bus: TickBus;

    beforeEach(() => {
        bus = new TickBus();
    });

    it("should deliver events asynchronously and in publish order", async () => {
        const received: FeedEvent[] = [];
        bus.subscribe("collector", (event) => received.push(event));

        bus.publish(quoteEvent({ timestamp: 1 }));
        bus.publish(tradeEvent({ timestamp: 2 }));
        bus.publish({ type: "stale", exchange: "okx", timestamp: 3 });

        expect(received).toHaveLength(0);

        await bus.whenIdle();

        expect(timestamps(received)).toEqual([1, 2, 3]);
    });

    it("should keep delivering to healthy consumers when one throws", async () => {
        const healthy: FeedEvent[] = [];
        bus.subscribe("failing", () => {
            throw new Error("boom");
        });
        bus.subscribe("healthy", (event) => healthy.push(event));

        for (let t = 1; t <= 5; t++) {
            bus.publish(tradeEvent({ timestamp: t }));
        }
        await bus.whenIdle();

        expect(timestamps(healthy)).toEqual([1, 2, 3, 4, 5]);

        const stats = bus.getStats();
        expect(stats.published).toBe(5);
        expect(stats.consumers).toEqual([
            { name: "failing", pending: 0, delivered: 0, errors: 5 },
            { name: "healthy", pending: 0, delivered: 5, errors: 0 },
        ]);
    });

    it("should drain more events than one batch", async () => {
        let count = 0;
        bus.subscribe("counter", () => {
            count++;
        });

        for (let t = 0; t < 1500; t++) {
            bus.publish(tradeEvent({ timestamp: t }));
        }
        await bus.whenIdle();

        expect(count).toBe(1500);
    });

    it("should stop delivering after unsubscribe", async () => {
        const received: FeedEvent[] = [];
        const unsubscribe = bus.subscribe("collector", (event) => received.push(event));

        bus.publish(tradeEvent({ timestamp: 1 }));
        await bus.whenIdle();
        unsubscribe();
        bus.publish(tradeEvent({ timestamp: 2 }));
        await bus.whenIdle();

        expect(timestamps(received)).toEqual([1]);
        expect(bus.getStats().consumers).toEqual([]);
    });

    it("should reject duplicate consumer names", () => {
        bus.subscribe("engine", () => undefined);
        expect(() => bus.subscribe("engine", () => undefined)).toThrow("Consumer already registered: engine");
    });
});
