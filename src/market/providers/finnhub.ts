import { endOfDayUtc } from "../../lib/date";
import { getFinnhubApiKey } from "../config";
import { fromFinnhubCandles } from "../normalize";
import type { LiveQuote, RawSeries } from "../types";

import type { DailyBarsSource, DailySeriesRequest, QuoteSource } from "./sources";

const DEFAULT_BASE_URL = "https://finnhub.io/api/v1";
const DEFAULT_TIMEOUT_MS = 5000;
const DAY_SECONDS = 24 * 60 * 60;
const PROVIDER = "finnhub";

export type FinnhubProviderOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNullableNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error as { name?: unknown }).name === "AbortError"
  );
}

/**
* Normalizes a Finnhub `/quote` payload (`c`, `d`, `dp`, `h`, `l`, `o`, `pc`, `t`).
*
* Finnhub answers unknown symbols with `c: 0` rather than an error, so a missing or zero
* current price means "no quote".
*/
export function parseFinnhubQuote(symbol: string, payload: unknown): LiveQuote | null {
  if (!isRecord(payload)) {
    return null;
  }

  const price = toNullableNumber(payload.c);
  if (price === null || price === 0) {
    return null;
  }

  const t = toNullableNumber(payload.t);
  return {
    symbol,
    price,
    change: toNullableNumber(payload.d),
    changePct: toNullableNumber(payload.dp),
    high: toNullableNumber(payload.h),
    low: toNullableNumber(payload.l),
    open: toNullableNumber(payload.o),
    previousClose: toNullableNumber(payload.pc),
    t: t !== null && t > 0 ? new Date(t * 1000).toISOString() : null
  };
}

export class FinnhubProvider implements QuoteSource, DailyBarsSource {
  readonly #apiKey: string;
  readonly #baseUrl: string;
  readonly #timeoutMs: number;
  readonly #fetch: typeof fetch;

  constructor(opts: FinnhubProviderOptions = {}) {
    const apiKey = opts.apiKey ?? getFinnhubApiKey();
    if (!apiKey) {
      throw new Error("[finnhub] FINNHUB_API_KEY is not set");
    }

    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (timeoutMs <= 0) {
      throw new Error(`[finnhub] timeoutMs must be > 0, got ${timeoutMs}`);
    }

    this.#apiKey = apiKey;
    this.#baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.#timeoutMs = timeoutMs;
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async #getJson(pathname: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.#baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    // Messages below use this form so the token never ends up in logs.
    const label = `${pathname}?${new URLSearchParams(params).toString()}`;
    url.searchParams.set("token", this.#apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.#timeoutMs);
    try {
      const res = await this.#fetch(url, { signal: controller.signal });
      if (!res.ok) {
        throw new Error(`[finnhub] HTTP ${res.status} for ${label}`);
      }
      return await res.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw new Error(`[finnhub] Timed out after ${this.#timeoutMs}ms for ${label}`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  async fetchQuote(symbol: string): Promise<LiveQuote | null> {
    const payload = await this.#getJson("/quote", { symbol });
    return parseFinnhubQuote(symbol, payload);
  }

  async fetchDailySeries(symbol: string, req: DailySeriesRequest): Promise<RawSeries> {
    const fetchedAt = new Date().toISOString();
    const nowSeconds = Math.floor(Date.now() / 1000);
    const to = req.asOfDate
      ? Math.min(Math.floor(endOfDayUtc(req.asOfDate).getTime() / 1000), nowSeconds)
      : nowSeconds;
    const from = to - req.lookbackDays * DAY_SECONDS;

    const payload = await this.#getJson("/stock/candle", {
      symbol,
      resolution: "D",
      from: String(from),
      to: String(to)
    });

    return {
      symbol,
      interval: "1d",
      provider: PROVIDER,
      fetchedAt,
      bars: fromFinnhubCandles(payload)
    };
  }
}
