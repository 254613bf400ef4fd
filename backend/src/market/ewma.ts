/**
 * Time-decayed EWMA over trade prices
 */

import type { EwmaState, ExchangeScope } from "../types/market";

/**
 * Weight kept by the previous value after `elapsedSeconds`: 2^(-dt/h).
 * Exactly 0.5 after one half-life.
 */
export function ewmaDecay(elapsedSeconds: number, halfLifeSeconds: number): number {
    return Math.pow(2, -elapsedSeconds / halfLifeSeconds);
}

/**
 * One EWMA for a (symbol, scope, half-life). The first trade seeds the value;
 * each later trade blends in with weight 1 - decay(dt).
 */
export class EwmaTracker {
    private state: EwmaState | null = null;
    refCount = 0;

    constructor(
        readonly symbol: string,
        readonly scope: ExchangeScope,
        readonly halfLife: number,
    ) {}

    update(price: number, timestamp: number): EwmaState {
        if (!this.state) {
            this.state = { symbol: this.symbol, scope: this.scope, halfLife: this.halfLife, value: price, lastTimestamp: timestamp };
            return { ...this.state };
        }

        const elapsedSeconds = Math.max(0, timestamp - this.state.lastTimestamp) / 1000;
        const alpha = ewmaDecay(elapsedSeconds, this.halfLife);
        this.state.value = alpha * this.state.value + (1 - alpha) * price;
        this.state.lastTimestamp = timestamp;
        return { ...this.state };
    }

    get(): EwmaState | null {
        return this.state ? { ...this.state } : null;
    }
}
