export type MarketInterval = "1d";

export type MarketBar = {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
};

export type RawSeries = {
  symbol: string;
  interval: MarketInterval;
  provider: string;
  fetchedAt: string;
  bars: MarketBar[];
};

/**
* One row of a flat bar table. Rows of different instruments may be interleaved
* and arrive in any order; `groupRowsBySymbol` separates them before any differencing.
*/
export type FlowInputRow = {
  symbol: string;
  group?: string;
  t: string;
  h: number;
  l: number;
  c: number;
  v: number;
};

export type InstrumentSeries = {
  symbol: string;
  group: string;
  bars: MarketBar[];
};

export type Direction = -1 | 0 | 1;

export type FlowPoint = {
  symbol: string;
  group: string;
  t: string;
  /**
  * Trading day (`YYYY-MM-DD`) derived from `t`; windows and daily totals key on this.
  */
  date: string;
  typicalPrice: number;
  priceChange: number;
  direction: Direction;
  volume: number;
  flow: number;
};

export const FLOW_GROUP_BYS = ["sector", "symbol"] as const;

export type FlowGroupBy = (typeof FLOW_GROUP_BYS)[number];

export const SIZE_METRICS = ["totalAssets", "none"] as const;

export type SizeMetric = (typeof SIZE_METRICS)[number];

export const BARS_PROVIDERS = ["yahoo", "finnhub"] as const;

export type BarsProvider = (typeof BARS_PROVIDERS)[number];

export type FlowSummary = {
  key: string;
  symbols: string[];
  /**
  * Number of daily group flows inside the window (days with at least one flow point).
  */
  days: number;
  netFlow: number;
  meanFlow: number | null;
  stdFlow: number | null;
  positiveDays: number;
  negativeDays: number;
  flatDays: number;
  size: number | null;
  flowToSize: number | null;
  firstDate: string | null;
  lastDate: string | null;
};

export type FlowDailyPoint = {
  date: string;
  flow: number;
  cumulative: number;
  rolling: number | null;
};

export type FlowDailySeries = {
  key: string;
  points: FlowDailyPoint[];
};

export type SectorDefinition = {
  name: string;
  symbol: string;
  /**
  * Static fund size in USD. Takes precedence over the provider's `totalAssets`.
  */
  totalAssets?: number;
};

export type LiveQuote = {
  symbol: string;
  price: number;
  change: number | null;
  changePct: number | null;
  high: number | null;
  low: number | null;
  open: number | null;
  previousClose: number | null;
  t: string | null;
};

export type LatestVolume = {
  symbol: string;
  t: string;
  volume: number;
};

export type SectorPerformanceRow = {
  sector: string;
  symbol: string;
  price: number;
  change: number;
  /**
  * `null` when the quote carries no percent change; such rows rank last and are never
  * leader or laggard.
  */
  changePct: number | null;
  volume: number;
  label: string;
};

export type SectorPerformanceSnapshot = {
  date: string;
  generatedAt: string;
  rows: SectorPerformanceRow[];
  leader: SectorPerformanceRow | null;
  laggard: SectorPerformanceRow | null;
  missingSymbols: string[];
};

export type FlowWindowReport = {
  days: number | null;
  summaries: FlowSummary[];
};

export type FlowReport = {
  date: string;
  generatedAt: string;
  groupBy: FlowGroupBy;
  sizeMetric: SizeMetric;
  symbols: string[];
  missingSymbols: string[];
  /**
  * The primary window; its summaries also drive `daily`.
  */
  window: FlowWindowReport;
  /**
  * Extra trailing windows (e.g. 5/20/60 days) summarized side by side.
  */
  windows: FlowWindowReport[];
  daily: FlowDailySeries[];
};
