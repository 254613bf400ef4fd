/**
 * Best-touch book
 * Per-exchange best bid/ask plus the consolidated view across exchanges
 */

import type { BestTouch, Exchange, ExchangeScope, QuoteTick } from "../types/market";
import { ALL_EXCHANGES } from "../types/market";

/**
 * Tracks the latest quote of every exchange for every symbol.
 *
 * The consolidated ("all") touch takes the highest bid and lowest ask among
 * exchanges that have quoted and are not stale. Size at the consolidated price
 * is the sum over every exchange quoting exactly that price.
 */
export class BestTouchBook {
    // symbol -> exchange -> touch
    private touches = new Map<string, Map<Exchange, BestTouch>>();
    private consolidated = new Map<string, BestTouch>();

    /**
     * Apply a quote. Returns the updated exchange touch and consolidated touch.
     */
    applyQuote(tick: QuoteTick): { exchange: BestTouch; consolidated: BestTouch } {
        let bySymbol = this.touches.get(tick.symbol);
        if (!bySymbol) {
            bySymbol = new Map();
            this.touches.set(tick.symbol, bySymbol);
        }

        const touch: BestTouch = {
            symbol: tick.symbol,
            scope: tick.exchange,
            bid: tick.bid,
            bidSize: tick.bidSize,
            ask: tick.ask,
            askSize: tick.askSize,
            bidExchange: tick.exchange,
            askExchange: tick.exchange,
            stale: false,
            updatedAt: tick.timestamp,
        };
        bySymbol.set(tick.exchange, touch);

        const consolidated = this.recompute(tick.symbol, tick.timestamp);
        return { exchange: { ...touch }, consolidated };
    }

    /**
     * Flag every touch of an exchange as stale and drop it from consolidation.
     * Returns all touches whose view changed.
     */
    markStale(exchange: Exchange, timestamp: number): BestTouch[] {
        const changed: BestTouch[] = [];
        for (const [symbol, bySymbol] of this.touches) {
            const touch = bySymbol.get(exchange);
            if (!touch || touch.stale) continue;
            touch.stale = true;
            touch.updatedAt = timestamp;
            changed.push({ ...touch });
            changed.push(this.recompute(symbol, timestamp));
        }
        return changed;
    }

    /**
     * Current touch for a symbol and scope, or null if nothing has been quoted
     */
    get(symbol: string, scope: ExchangeScope): BestTouch | null {
        const touch = scope === ALL_EXCHANGES ? this.consolidated.get(symbol) : this.touches.get(symbol)?.get(scope);
        return touch ? { ...touch } : null;
    }

    symbols(): string[] {
        return [...this.touches.keys()];
    }

    private recompute(symbol: string, timestamp: number): BestTouch {
        const bySymbol = this.touches.get(symbol);
        const all: BestTouch = {
            symbol,
            scope: ALL_EXCHANGES,
            bid: null,
            bidSize: 0,
            ask: null,
            askSize: 0,
            stale: true,
            updatedAt: timestamp,
        };

        for (const touch of bySymbol?.values() ?? []) {
            if (touch.stale) continue;
            all.stale = false;

            if (touch.bid !== null) {
                if (all.bid === null || touch.bid > all.bid) {
                    all.bid = touch.bid;
                    all.bidSize = touch.bidSize;
                    all.bidExchange = touch.scope;
                } else if (touch.bid === all.bid) {
                    all.bidSize += touch.bidSize;
                }
            }

            if (touch.ask !== null) {
                if (all.ask === null || touch.ask < all.ask) {
                    all.ask = touch.ask;
                    all.askSize = touch.askSize;
                    all.askExchange = touch.scope;
                } else if (touch.ask === all.ask) {
                    all.askSize += touch.askSize;
                }
            }
        }

        this.consolidated.set(symbol, all);
        return { ...all };
    }
}
