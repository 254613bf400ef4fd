/**
 * Symbol helpers shared by the feeds, the matching engine and the API
 */

const QUOTE_ASSETS = ["USDT", "USDC", "USD"];

/**
 * Split a concatenated trading pair into base and quote assets
 *
 * @example
 * splitSymbol("BTCUSDT") // { base: "BTC", quote: "USDT" }
 * splitSymbol("ETHBTC")  // { base: "ETH", quote: "BTC" }
 */
export function splitSymbol(symbol: string): { base: string; quote: string } {
    const upper = symbol.toUpperCase();
    for (const quote of QUOTE_ASSETS) {
        if (upper.endsWith(quote) && upper.length > quote.length) {
            return { base: upper.slice(0, -quote.length), quote };
        }
    }
    return { base: upper.slice(0, -3), quote: upper.slice(-3) };
}

/**
 * Every asset referenced by a list of symbols, in first-seen order
 */
export function assetsOf(symbols: readonly string[]): string[] {
    const assets = new Set<string>();
    for (const symbol of symbols) {
        const { base, quote } = splitSymbol(symbol);
        assets.add(base);
        assets.add(quote);
    }
    return [...assets];
}

/** BTCUSDT -> BTC-USDT */
export function toDashedInstrument(symbol: string): string {
    const { base, quote } = splitSymbol(symbol);
    return `${base}-${quote}`;
}

/** BTC-USDT -> BTCUSDT */
export function fromDashedInstrument(instId: string): string {
    return instId.replace("-", "").toUpperCase();
}
