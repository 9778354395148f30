import { toTradingDate } from "../lib/date";

import { rollingSum } from "./indicators";
import { groupRowsBySymbol } from "./normalize";
import type {
  Direction,
  FlowDailySeries,
  FlowInputRow,
  FlowPoint,
  FlowSummary,
  InstrumentSeries,
  MarketBar
} from "./types";

export function typicalPrice(bar: Pick<MarketBar, "h" | "l" | "c">): number {
  return (bar.h + bar.l + bar.c) / 3;
}

export function direction(change: number): Direction {
  if (change > 0) {
    return 1;
  }
  if (change < 0) {
    return -1;
  }
  return 0;
}

function isSorted(bars: readonly MarketBar[]): boolean {
  for (let i = 1; i < bars.length; i += 1) {
    if (bars[i - 1].t.localeCompare(bars[i].t) >= 0) {
      return false;
    }
  }
  return true;
}

/**
* Money-flow proxy per bar: `sign(Δ typical price) × typical price × volume`.
*
* Each instrument is differenced on its own bars only. The first bar of an instrument has
* no prior price and produces no point, so a single-bar instrument contributes nothing.
*/
export function computeFlowPoints(series: readonly InstrumentSeries[]): FlowPoint[] {
  const out: FlowPoint[] = [];
  const seen = new Set<string>();

  for (const s of series) {
    if (seen.has(s.symbol)) {
      throw new Error(`[flows:computeFlowPoints] Duplicate series for ${s.symbol}; merge bars per instrument first`);
    }
    seen.add(s.symbol);

    const bars = isSorted(s.bars) ? s.bars : [...s.bars].sort((a, b) => a.t.localeCompare(b.t));

    let prevTypical: number | null = null;
    for (const bar of bars) {
      const tp = typicalPrice(bar);
      if (!Number.isFinite(tp)) {
        continue;
      }

      if (prevTypical !== null) {
        const priceChange = tp - prevTypical;
        const dir = direction(priceChange);
        const volume = Number.isFinite(bar.v) && bar.v > 0 ? bar.v : 0;
        // `0 * x` is -0 for negative x; keep flat days a plain zero.
        const flow = dir === 0 || volume === 0 ? 0 : dir * tp * volume;

        out.push({
          symbol: s.symbol,
          group: s.group,
          t: bar.t,
          date: toTradingDate(bar.t),
          typicalPrice: tp,
          priceChange,
          direction: dir,
          volume,
          flow
        });
      }

      prevTypical = tp;
    }
  }

  return out;
}

export function computeFlowPointsFromRows(
  rows: readonly FlowInputRow[],
  groupOf?: (symbol: string) => string | undefined
): FlowPoint[] {
  return computeFlowPoints(groupRowsBySymbol(rows, groupOf));
}

/**
* Keeps the points dated on the last `days` distinct trading dates present in `points`.
* Dates are taken across every group so that all groups are compared over the same days.
* `null` keeps everything.
*/
export function selectTrailingWindow(points: readonly FlowPoint[], days: number | null): FlowPoint[] {
  if (days === null) {
    return [...points];
  }
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error(`[flows:selectTrailingWindow] days must be a positive integer, got ${days}`);
  }

  const dates = Array.from(new Set(points.map((p) => p.date))).sort();
  const kept = new Set(dates.slice(Math.max(0, dates.length - days)));
  return points.filter((p) => kept.has(p.date));
}

export type DailyGroupFlow = {
  date: string;
  flow: number;
};

/**
* Sums member flows per group and trading date. Dates come back in ascending order.
*/
export function dailyGroupFlows(points: readonly FlowPoint[]): Map<string, DailyGroupFlow[]> {
  const byGroup = new Map<string, Map<string, number>>();

  for (const p of points) {
    let byDate = byGroup.get(p.group);
    if (!byDate) {
      byDate = new Map();
      byGroup.set(p.group, byDate);
    }
    byDate.set(p.date, (byDate.get(p.date) ?? 0) + p.flow);
  }

  const out = new Map<string, DailyGroupFlow[]>();
  for (const [group, byDate] of byGroup) {
    out.set(
      group,
      Array.from(byDate.entries())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([date, flow]) => ({ date, flow }))
    );
  }
  return out;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
* Sample standard deviation (n - 1).
*/
function sampleStd(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null || values.length < 2) {
    return null;
  }

  const sumSq = values.reduce((sum, v) => sum + (v - m) * (v - m), 0);
  return Math.sqrt(sumSq / (values.length - 1));
}

export type SummarizeFlowsOptions = {
  /**
  * Groups that must be reported even without any flow point, mapped to their member symbols.
  */
  groups?: ReadonlyMap<string, readonly string[]>;
  /**
  * Static size per symbol (e.g. total assets) used for `flowToSize`.
  */
  sizes?: ReadonlyMap<string, number>;
};

function groupSize(symbols: readonly string[], sizes: ReadonlyMap<string, number> | undefined): number | null {
  if (!sizes || symbols.length === 0) {
    return null;
  }

  let total = 0;
  for (const symbol of symbols) {
    const size = sizes.get(symbol);
    if (size === undefined || !Number.isFinite(size) || size <= 0) {
      return null;
    }
    total += size;
  }
  return total;
}

export function summarizeFlows(points: readonly FlowPoint[], opts: SummarizeFlowsOptions = {}): FlowSummary[] {
  const members = new Map<string, Set<string>>();
  for (const [group, symbols] of opts.groups ?? []) {
    members.set(group, new Set(symbols));
  }
  for (const p of points) {
    const set = members.get(p.group) ?? new Set<string>();
    set.add(p.symbol);
    members.set(p.group, set);
  }

  const daily = dailyGroupFlows(points);
  const summaries: FlowSummary[] = [];

  for (const [key, symbolSet] of members) {
    const days = daily.get(key) ?? [];
    const flows = days.map((d) => d.flow);
    const netFlow = flows.reduce((sum, v) => sum + v, 0);
    const symbols = Array.from(symbolSet).sort();
    const size = groupSize(symbols, opts.sizes);

    summaries.push({
      key,
      symbols,
      days: flows.length,
      netFlow,
      meanFlow: mean(flows),
      stdFlow: sampleStd(flows),
      positiveDays: flows.filter((v) => v > 0).length,
      negativeDays: flows.filter((v) => v < 0).length,
      flatDays: flows.filter((v) => v === 0).length,
      size,
      flowToSize: size === null ? null : netFlow / size,
      firstDate: days[0]?.date ?? null,
      lastDate: days.at(-1)?.date ?? null
    });
  }

  return summaries.sort((a, b) => a.key.localeCompare(b.key));
}

export function buildDailySeries(points: readonly FlowPoint[], rollingPeriod: number): FlowDailySeries[] {
  const out: FlowDailySeries[] = [];

  for (const [key, days] of dailyGroupFlows(points)) {
    const rolling = rollingSum(
      days.map((d) => d.flow),
      rollingPeriod
    );

    let cumulative = 0;
    out.push({
      key,
      points: days.map((d, i) => {
        cumulative += d.flow;
        return { date: d.date, flow: d.flow, cumulative, rolling: rolling[i] ?? null };
      })
    });
  }

  return out.sort((a, b) => a.key.localeCompare(b.key));
}

export type FlowRankKey = "netFlow" | "flowToSize";

/**
* Descending by `by`; summaries without a value sort last, ties by key.
*/
export function rankSummaries(summaries: readonly FlowSummary[], by: FlowRankKey = "netFlow"): FlowSummary[] {
  return [...summaries].sort((a, b) => {
    const av = a[by];
    const bv = b[by];
    if (av === null && bv === null) {
      return a.key.localeCompare(b.key);
    }
    if (av === null) {
      return 1;
    }
    if (bv === null) {
      return -1;
    }
    return bv - av || a.key.localeCompare(b.key);
  });
}
