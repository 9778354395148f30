import YahooFinance from "yahoo-finance2";

import { endOfDayUtc } from "../../lib/date";
import { toMarketBars } from "../normalize";
import type { LatestVolume, RawSeries } from "../types";

import type { DailyBarsSource, DailySeriesRequest, SizeSource, VolumeSource } from "./sources";

const DAY_MS = 24 * 60 * 60 * 1000;
const PROVIDER = "yahoo-finance";

// A week reaches back over weekends and market holidays to the last session.
const LATEST_VOLUME_LOOKBACK_DAYS = 7;

const MAX_DAILY_BARS = 900;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolvePeriod2(asOfDate: string | undefined, now: number): Date {
  if (!asOfDate) {
    return new Date(now);
  }

  let requested: Date;
  try {
    requested = endOfDayUtc(asOfDate);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[yahoo:fetchDailySeries] Invalid asOfDate '${asOfDate}': ${message}`);
  }

  // Never ask for bars past "now".
  return new Date(Math.min(requested.getTime(), now));
}

export class YahooMarketDataProvider implements DailyBarsSource, VolumeSource, SizeSource {
  readonly #yf: InstanceType<typeof YahooFinance>;

  constructor() {
    this.#yf = new YahooFinance();
  }

  async fetchDailySeries(symbol: string, req: DailySeriesRequest): Promise<RawSeries> {
    const fetchedAt = new Date().toISOString();
    const period2 = resolvePeriod2(req.asOfDate, Date.now());
    const period1 = new Date(period2.getTime() - req.lookbackDays * DAY_MS);

    const res = await this.#yf.chart(symbol, { interval: "1d", period1, period2 });
    const quotes = Array.isArray(res.quotes) ? res.quotes : [];
    const bars = toMarketBars(quotes);

    return {
      symbol,
      interval: "1d",
      provider: PROVIDER,
      fetchedAt,
      bars: bars.slice(Math.max(0, bars.length - MAX_DAILY_BARS))
    };
  }

  /**
  * Volume of the most recent daily bar at or before `asOfDate`; for today this is the
  * session's cumulative volume so far.
  */
  async fetchLatestVolume(symbol: string, asOfDate?: string): Promise<LatestVolume | null> {
    const series = await this.fetchDailySeries(symbol, {
      lookbackDays: LATEST_VOLUME_LOOKBACK_DAYS,
      asOfDate
    });

    const last = series.bars.at(-1);
    if (!last) {
      return null;
    }
    return { symbol, t: last.t, volume: last.v };
  }

  async fetchTotalAssets(symbol: string): Promise<number | null> {
    const res = await this.#yf.quoteSummary(symbol, { modules: ["summaryDetail"] });
    const detail: unknown = res.summaryDetail;
    if (!isRecord(detail)) {
      return null;
    }

    const totalAssets = detail.totalAssets;
    return typeof totalAssets === "number" && Number.isFinite(totalAssets) && totalAssets > 0 ? totalAssets : null;
  }
}
