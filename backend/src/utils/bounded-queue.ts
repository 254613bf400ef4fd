/**
 * FIFO queue with a fixed capacity that drops the oldest item on overflow
 */
export class BoundedQueue<T> {
    private items: T[] = [];
    private head = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length - this.head;
    }

    /**
     * Append an item. Returns the number of items dropped to make room (0 or 1).
     */
    push(item: T): number {
        let dropped = 0;
        if (this.size >= this.capacity) {
            this.head++;
            dropped = 1;
        }
        this.items.push(item);
        this.compact();
        return dropped;
    }

    shift(): T | undefined {
        if (this.head >= this.items.length) return undefined;
        const item = this.items[this.head];
        this.head++;
        this.compact();
        return item;
    }

    clear(): void {
        this.items = [];
        this.head = 0;
    }

    private compact(): void {
        if (this.head === this.items.length) {
            this.clear();
        } else if (this.head > 1024 && this.head * 2 > this.items.length) {
            this.items = this.items.slice(this.head);
            this.head = 0;
        }
    }
}
