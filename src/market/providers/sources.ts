import type { LatestVolume, LiveQuote, RawSeries } from "../types";

export type DailySeriesRequest = {
  lookbackDays: number;
  /**
  * Inclusive last day (`YYYY-MM-DD`). Defaults to now.
  */
  asOfDate?: string;
};

export interface DailyBarsSource {
  fetchDailySeries(symbol: string, req: DailySeriesRequest): Promise<RawSeries>;
}

export interface VolumeSource {
  fetchLatestVolume(symbol: string, asOfDate?: string): Promise<LatestVolume | null>;
}

export interface SizeSource {
  fetchTotalAssets(symbol: string): Promise<number | null>;
}

export interface QuoteSource {
  fetchQuote(symbol: string): Promise<LiveQuote | null>;
}
