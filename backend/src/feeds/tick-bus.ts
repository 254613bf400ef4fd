/**
 * Tick Bus
 * Ordered fan-out of feed events with an independent queue per consumer
 */

import { logAppError } from "../utils/logger";
import type { FeedEvent } from "./types";

export type FeedEventHandler = (event: FeedEvent) => void;

/** Per-consumer delivery counters */
export interface ConsumerStats {
    name: string;
    pending: number;
    delivered: number;
    errors: number;
}

export interface TickBusStats {
    published: number;
    consumers: ConsumerStats[];
}

// Events handled per consumer before yielding back to the event loop
const DRAIN_BATCH = 512;

class ConsumerQueue {
    private items: FeedEvent[] = [];
    private head = 0;
    private scheduled = false;
    delivered = 0;
    errors = 0;

    constructor(
        readonly name: string,
        private readonly handler: FeedEventHandler,
    ) {}

    get pending(): number {
        return this.items.length - this.head;
    }

    push(event: FeedEvent): void {
        this.items.push(event);
        this.schedule();
    }

    clear(): void {
        this.items = [];
        this.head = 0;
    }

    private schedule(): void {
        if (this.scheduled) return;
        this.scheduled = true;
        setImmediate(() => this.drain());
    }

    private drain(): void {
        this.scheduled = false;
        let handled = 0;
        while (this.head < this.items.length && handled < DRAIN_BATCH) {
            const event = this.items[this.head];
            this.head++;
            handled++;
            try {
                this.handler(event);
                this.delivered++;
            } catch (error) {
                this.errors++;
                logAppError("TickBus", "Consumer failed", error, { consumer: this.name, event: event.type });
            }
        }

        if (this.head >= this.items.length) {
            this.clear();
        } else {
            // Compact consumed prefix and continue on the next turn
            this.items = this.items.slice(this.head);
            this.head = 0;
            this.schedule();
        }
    }
}

/**
 * TickBus decouples exchange feeds from the engines.
 * Events are delivered to each consumer in publish order; a slow or failing
 * consumer never delays another.
 */
export class TickBus {
    private consumers = new Map<string, ConsumerQueue>();
    private published = 0;

    /**
     * Register a consumer. Returns an unsubscribe function.
     */
    subscribe(name: string, handler: FeedEventHandler): () => void {
        if (this.consumers.has(name)) {
            throw new Error(`Consumer already registered: ${name}`);
        }
        const queue = new ConsumerQueue(name, handler);
        this.consumers.set(name, queue);
        return () => {
            queue.clear();
            this.consumers.delete(name);
        };
    }

    publish(event: FeedEvent): void {
        this.published++;
        for (const queue of this.consumers.values()) {
            queue.push(event);
        }
    }

    /**
     * Resolves once every consumer queue is empty
     */
    async whenIdle(): Promise<void> {
        while ([...this.consumers.values()].some((q) => q.pending > 0)) {
            await new Promise<void>((resolve) => setImmediate(resolve));
        }
    }

    getStats(): TickBusStats {
        return {
            published: this.published,
            consumers: [...this.consumers.values()].map((q) => ({
                name: q.name,
                pending: q.pending,
                delivered: q.delivered,
                errors: q.errors,
            })),
        };
    }
}
