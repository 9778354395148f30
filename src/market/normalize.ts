import type { FlowInputRow, InstrumentSeries, MarketBar } from "./types";

/**
* Loose shape of a provider OHLCV row (Yahoo `chart().quotes`, CSV-ish tables).
*/
export type ProviderBarRow = {
  date?: unknown;
  open?: unknown;
  high?: unknown;
  low?: unknown;
  close?: unknown;
  volume?: unknown;
};

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function toIsoTimestamp(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : null;
  }
  if (typeof value === "string" && value.length > 0) {
    const parsed = new Date(value);
    return Number.isFinite(parsed.getTime()) ? parsed.toISOString() : null;
  }
  if (isFiniteNumber(value)) {
    // Epoch seconds (Finnhub) vs milliseconds.
    const ms = value < 1e11 ? value * 1000 : value;
    return new Date(ms).toISOString();
  }
  return null;
}

/**
* Volume that is missing, non-finite or negative carries no flow. The bar itself is kept
* because its price is still needed to difference the next bar.
*/
function toVolume(value: unknown): number {
  return isFiniteNumber(value) && value > 0 ? value : 0;
}

// Larger volume first, then close, high, low and open.
function compareBarContent(a: MarketBar, b: MarketBar): number {
  return b.v - a.v || b.c - a.c || b.h - a.h || b.l - a.l || b.o - a.o;
}

/**
* Sorts by `t` and keeps one bar per timestamp. Duplicates resolve by content (the bar with
* the larger volume, then the larger close), so input order never changes the result.
*/
export function sortAndDedupeBars(bars: readonly MarketBar[]): MarketBar[] {
  const byTime = new Map<string, MarketBar>();
  for (const bar of bars) {
    const existing = byTime.get(bar.t);
    if (!existing || compareBarContent(bar, existing) < 0) {
      byTime.set(bar.t, bar);
    }
  }

  // ISO-8601 strings sort chronologically.
  return Array.from(byTime.values()).sort((a, b) => a.t.localeCompare(b.t));
}

export function toMarketBars(rows: readonly ProviderBarRow[]): MarketBar[] {
  const bars: MarketBar[] = [];

  for (const row of rows) {
    const t = toIsoTimestamp(row.date);
    const { high, low, close } = row;
    if (t === null || !isFiniteNumber(high) || !isFiniteNumber(low) || !isFiniteNumber(close)) {
      continue;
    }

    bars.push({
      t,
      o: isFiniteNumber(row.open) ? row.open : close,
      h: high,
      l: low,
      c: close,
      v: toVolume(row.volume)
    });
  }

  return sortAndDedupeBars(bars);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function arrayField(payload: Record<string, unknown>, key: string): unknown[] {
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

/**
* Finnhub `stock/candle` responses are column arrays: `{ s, t[], o[], h[], l[], c[], v[] }`.
*/
export function fromFinnhubCandles(payload: unknown): MarketBar[] {
  if (!isRecord(payload) || payload.s !== "ok") {
    return [];
  }

  const t = arrayField(payload, "t");
  const o = arrayField(payload, "o");
  const h = arrayField(payload, "h");
  const l = arrayField(payload, "l");
  const c = arrayField(payload, "c");
  const v = arrayField(payload, "v");

  const rows: ProviderBarRow[] = t.map((date, i) => ({
    date,
    open: o[i],
    high: h[i],
    low: l[i],
    close: c[i],
    volume: v[i]
  }));

  return toMarketBars(rows);
}

/**
* Splits a flat table into one series per instrument so that day-over-day differences
* are never taken across instruments.
*
* `groupOf` maps a symbol to its aggregation key; rows may also carry `group` directly,
* and a row's own `group` wins. Rows of one symbol naming different groups are rejected.
*/
export function groupRowsBySymbol(
  rows: readonly FlowInputRow[],
  groupOf?: (symbol: string) => string | undefined
): InstrumentSeries[] {
  const bySymbol = new Map<string, { groups: Set<string>; rows: ProviderBarRow[] }>();

  for (const row of rows) {
    let entry = bySymbol.get(row.symbol);
    if (!entry) {
      entry = { groups: new Set(), rows: [] };
      bySymbol.set(row.symbol, entry);
    }

    if (row.group !== undefined) {
      entry.groups.add(row.group);
    }
    entry.rows.push({ date: row.t, high: row.h, low: row.l, close: row.c, volume: row.v });
  }

  return Array.from(bySymbol.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([symbol, entry]) => {
      const groups = Array.from(entry.groups).sort();
      if (groups.length > 1) {
        throw new Error(`[flows:normalize] Conflicting groups for ${symbol}: ${groups.join(", ")}`);
      }

      return {
        symbol,
        group: groups[0] ?? groupOf?.(symbol) ?? symbol,
        bars: toMarketBars(entry.rows)
      };
    });
}
