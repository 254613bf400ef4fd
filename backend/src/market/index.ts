/**
 * Market data aggregation
 */

export { AggregationEngine } from "./aggregation-engine";
export type { AggregationStats, MarketEventListener } from "./aggregation-engine";
export { BestTouchBook } from "./best-touch";
export { KlineSeries, bucketStartOf } from "./kline";
export { EwmaTracker, ewmaDecay } from "./ewma";
