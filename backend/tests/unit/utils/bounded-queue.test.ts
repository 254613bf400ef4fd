/**
 * Unit tests for BoundedQueue
 */

import { describe, it, expect } from "vitest";
import { BoundedQueue } from "../../../src/utils/bounded-queue";

describe("BoundedQueue", () => {
    it("should be FIFO", () => {
        const queue = new BoundedQueue<number>(5);
        queue.push(1);
        queue.push(2);
        queue.push(3);

        expect(queue.shift()).toBe(1);
        expect(queue.shift()).toBe(2);
        expect(queue.size).toBe(1);
    });

    it("should drop the oldest item when full", () => {
        const queue = new BoundedQueue<string>(2);

        expect(queue.push("a")).toBe(0);
        expect(queue.push("b")).toBe(0);
        expect(queue.push("c")).toBe(1);

        expect(queue.size).toBe(2);
        expect(queue.shift()).toBe("b");
        expect(queue.shift()).toBe("c");
        expect(queue.shift()).toBeUndefined();
    });

    it("should stay bounded under sustained overflow", () => {
        const queue = new BoundedQueue<number>(10);
        let dropped = 0;
        for (let i = 0; i < 5000; i++) {
            dropped += queue.push(i);
        }

        expect(dropped).toBe(4990);
        expect(queue.size).toBe(10);
        expect(queue.shift()).toBe(4990);
    });

    it("should clear", () => {
        const queue = new BoundedQueue<number>(3);
        queue.push(1);
        queue.clear();
        expect(queue.size).toBe(0);
        expect(queue.shift()).toBeUndefined();
    });

    it("should reject a non-positive capacity", () => {
        expect(() => new BoundedQueue(0)).toThrow("Queue capacity must be a positive integer, got 0");
    });
});
