import { errorMessage } from "../lib/fsErrors";

import { mapWithConcurrency } from "./concurrency";
import { loadFlowConfig, loadSectors } from "./config";
import { computeFlowPoints } from "./flow";
import { buildSectorPerformance } from "./performance";
import { FinnhubProvider } from "./providers/finnhub";
import type { DailyBarsSource, QuoteSource, SizeSource, VolumeSource } from "./providers/sources";
import { YahooMarketDataProvider } from "./providers/yahoo";
import { buildFlowReport, buildFlowReportMarkdown } from "./report";
import { writeFlowReport, writePerformanceSnapshot } from "./storage";
import type {
  BarsProvider,
  FlowGroupBy,
  FlowReport,
  InstrumentSeries,
  LatestVolume,
  LiveQuote,
  SectorDefinition,
  SectorPerformanceSnapshot
} from "./types";

type PipelineOptions = {
  rootDir?: string;
  concurrency?: number;
};

export type FlowSources = {
  bars: DailyBarsSource;
  sizes?: SizeSource;
};

export type PerformanceSources = {
  quotes: QuoteSource;
  volumes: VolumeSource;
};

function groupKeyFor(sector: SectorDefinition, groupBy: FlowGroupBy): string {
  return groupBy === "sector" ? sector.name : sector.symbol;
}

function defaultFlowSources(barsProvider: BarsProvider): FlowSources {
  const yahoo = new YahooMarketDataProvider();
  return {
    bars: barsProvider === "finnhub" ? new FinnhubProvider() : yahoo,
    sizes: yahoo
  };
}

async function resolveSizes(
  sectors: readonly SectorDefinition[],
  source: SizeSource | undefined,
  concurrency: number
): Promise<Map<string, number>> {
  const sizes = new Map<string, number>();
  const toFetch: SectorDefinition[] = [];
  for (const sector of sectors) {
    if (sector.totalAssets !== undefined) {
      sizes.set(sector.symbol, sector.totalAssets);
    } else {
      toFetch.push(sector);
    }
  }

  if (!source || toFetch.length === 0) {
    return sizes;
  }

  const fetched = await mapWithConcurrency(toFetch, concurrency, async (sector) => {
    try {
      return { symbol: sector.symbol, size: await source.fetchTotalAssets(sector.symbol) };
    } catch (error) {
      console.warn(`[flows:sizes] totalAssets unavailable for ${sector.symbol}: ${errorMessage(error)}`);
      return { symbol: sector.symbol, size: null };
    }
  });

  for (const { symbol, size } of fetched) {
    if (size !== null) {
      sizes.set(symbol, size);
    }
  }
  return sizes;
}

export async function runFlowReport(
  date: string,
  opts: PipelineOptions & {
    window?: number | null;
    groupBy?: FlowGroupBy;
    sources?: FlowSources;
    now?: Date;
  } = {}
): Promise<{
  report: FlowReport;
  jsonPath: string;
  markdownPath: string;
}> {
  const rootDir = opts.rootDir ?? process.cwd();
  const cfg = await loadFlowConfig(rootDir);
  const sectors = await loadSectors(rootDir);
  const concurrency = opts.concurrency ?? cfg.concurrency;
  const groupBy = opts.groupBy ?? cfg.groupBy;
  const window = opts.window === undefined ? cfg.window : opts.window;
  const sources = opts.sources ?? defaultFlowSources(cfg.barsProvider);

  const fetched = await mapWithConcurrency(sectors, concurrency, async (sector) => {
    try {
      const series = await sources.bars.fetchDailySeries(sector.symbol, {
        lookbackDays: cfg.lookbackDays,
        asOfDate: date
      });
      return { sector, bars: series.bars };
    } catch (error) {
      console.error(`[flows:data] failed for ${sector.symbol} (${date}): ${errorMessage(error)}`);
      return { sector, bars: null };
    }
  });

  const missingSymbols = fetched
    .filter((r) => r.bars === null || r.bars.length === 0)
    .map((r) => r.sector.symbol)
    .sort();

  const series: InstrumentSeries[] = [];
  for (const { sector, bars } of fetched) {
    if (bars && bars.length > 0) {
      series.push({ symbol: sector.symbol, group: groupKeyFor(sector, groupBy), bars });
    }
  }

  const groups = new Map<string, string[]>();
  for (const sector of sectors) {
    const key = groupKeyFor(sector, groupBy);
    groups.set(key, [...(groups.get(key) ?? []), sector.symbol]);
  }

  const sizes =
    cfg.sizeMetric === "totalAssets" ? await resolveSizes(sectors, sources.sizes, concurrency) : undefined;

  const report = buildFlowReport({
    date,
    groupBy,
    sizeMetric: cfg.sizeMetric,
    symbols: sectors.map((s) => s.symbol),
    missingSymbols,
    points: computeFlowPoints(series),
    groups,
    window,
    windows: cfg.windows,
    rollingPeriod: cfg.rollingPeriod,
    sizes,
    now: opts.now
  });

  const paths = await writeFlowReport(report, buildFlowReportMarkdown(report), rootDir);
  return { report, ...paths };
}

export async function runSectorPerformance(
  date: string,
  opts: PipelineOptions & {
    sources?: PerformanceSources;
    now?: Date;
  } = {}
): Promise<{ snapshot: SectorPerformanceSnapshot; path: string }> {
  const rootDir = opts.rootDir ?? process.cwd();
  const cfg = await loadFlowConfig(rootDir);
  const sectors = await loadSectors(rootDir);
  const concurrency = opts.concurrency ?? cfg.concurrency;
  const sources: PerformanceSources = opts.sources ?? {
    quotes: new FinnhubProvider(),
    volumes: new YahooMarketDataProvider()
  };

  const quotes = new Map<string, LiveQuote | null>();
  const volumes = new Map<string, LatestVolume | null>();

  await mapWithConcurrency(sectors, concurrency, async (sector) => {
    const [quote, volume] = await Promise.allSettled([
      sources.quotes.fetchQuote(sector.symbol),
      sources.volumes.fetchLatestVolume(sector.symbol, date)
    ]);

    if (quote.status === "fulfilled") {
      quotes.set(sector.symbol, quote.value);
    } else {
      console.error(`[flows:quotes] failed for ${sector.symbol}: ${errorMessage(quote.reason)}`);
      quotes.set(sector.symbol, null);
    }

    if (volume.status === "fulfilled") {
      volumes.set(sector.symbol, volume.value);
    } else {
      console.error(`[flows:volume] failed for ${sector.symbol}: ${errorMessage(volume.reason)}`);
      volumes.set(sector.symbol, null);
    }
  });

  const snapshot = buildSectorPerformance({ date, sectors, quotes, volumes, now: opts.now });
  if (snapshot.rows.length === 0) {
    throw new Error(`[flows:performance] No live quotes loaded for ${date}; check FINNHUB_API_KEY.`);
  }

  const path = await writePerformanceSnapshot(snapshot, rootDir);
  return { snapshot, path };
}
