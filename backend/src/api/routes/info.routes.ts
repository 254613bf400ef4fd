/**
 * Market universe endpoint
 *
 * GET /info - Configured exchanges, assets, pairs and kline intervals
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { KLINE_INTERVALS, isKlineInterval } from "../../types";
import { assetsOf } from "../../utils/symbols";
import type { InfoResponse } from "../types/api.types";

const info = new Hono();

info.get("/", (c) => {
    const { config } = getAppContext();
    const intervals = Object.keys(KLINE_INTERVALS).filter(isKlineInterval);

    const response: InfoResponse = {
        exchanges: [...config.market.exchanges],
        assets: assetsOf(config.market.symbols),
        pairs: [...config.market.symbols],
        intervals,
    };

    return c.json(response);
});

export { info };
