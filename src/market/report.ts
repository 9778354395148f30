import { buildDailySeries, rankSummaries, selectTrailingWindow, summarizeFlows } from "./flow";
import { formatDollarsCompact } from "./performance";
import type { FlowGroupBy, FlowPoint, FlowReport, FlowSummary, FlowWindowReport, SizeMetric } from "./types";

function windowLabel(days: number | null): string {
  return days === null ? "full history" : `last ${days} trading days`;
}

function summarizeWindow(
  points: readonly FlowPoint[],
  days: number | null,
  groups: ReadonlyMap<string, readonly string[]>,
  sizes: ReadonlyMap<string, number> | undefined
): FlowWindowReport {
  const windowed = selectTrailingWindow(points, days);
  return {
    days,
    summaries: rankSummaries(summarizeFlows(windowed, { groups, sizes }))
  };
}

export function buildFlowReport(args: {
  date: string;
  groupBy: FlowGroupBy;
  sizeMetric: SizeMetric;
  symbols: string[];
  missingSymbols: string[];
  points: readonly FlowPoint[];
  /**
  * Every group key mapped to its member symbols, so groups without data still show up.
  */
  groups: ReadonlyMap<string, readonly string[]>;
  window: number | null;
  windows: readonly number[];
  rollingPeriod: number;
  sizes?: ReadonlyMap<string, number>;
  now?: Date;
}): FlowReport {
  const sizes = args.sizeMetric === "none" ? undefined : args.sizes;
  const primary = summarizeWindow(args.points, args.window, args.groups, sizes);
  const extra = args.windows
    .filter((days) => days !== args.window)
    .map((days) => summarizeWindow(args.points, days, args.groups, sizes));

  return {
    date: args.date,
    generatedAt: (args.now ?? new Date()).toISOString(),
    groupBy: args.groupBy,
    sizeMetric: args.sizeMetric,
    symbols: args.symbols,
    missingSymbols: args.missingSymbols,
    window: primary,
    windows: extra,
    daily: buildDailySeries(selectTrailingWindow(args.points, args.window), args.rollingPeriod)
  };
}

function formatFrontmatterString(value: string): string {
  return JSON.stringify(value);
}

function formatSignedDollars(value: number): string {
  return `${value > 0 ? "+" : ""}${formatDollarsCompact(value)}`;
}

function formatOptional(value: number | null, format: (v: number) => string): string {
  return value === null ? "n/a" : format(value);
}

function formatRatioPct(value: number): string {
  return `${value > 0 ? "+" : ""}${(value * 100).toFixed(2)}%`;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

function summaryRow(s: FlowSummary): string {
  const cells = [
    escapeCell(s.key),
    formatSignedDollars(s.netFlow),
    formatOptional(s.meanFlow, formatSignedDollars),
    formatOptional(s.stdFlow, formatDollarsCompact),
    String(s.positiveDays),
    String(s.negativeDays),
    formatOptional(s.flowToSize, formatRatioPct)
  ];
  return `| ${cells.join(" | ")} |`;
}

/**
* One-line read of the primary window: strongest inflow and outflow.
*/
export function describeFlowExtremes(summaries: readonly FlowSummary[]): string {
  const active = summaries.filter((s) => s.days > 0);
  if (active.length === 0) {
    return "No flow observations in the selected window.";
  }

  const ranked = rankSummaries(active);
  const top = ranked[0];
  const bottom = ranked[ranked.length - 1];
  if (top.key === bottom.key) {
    return `Only ${top.key} has flow data: ${formatSignedDollars(top.netFlow)}.`;
  }

  return `Strongest inflow: ${top.key} (${formatSignedDollars(top.netFlow)}). Strongest outflow: ${bottom.key} (${formatSignedDollars(bottom.netFlow)}).`;
}

export function buildFlowReportMarkdown(report: FlowReport): string {
  const lines: string[] = [];
  lines.push("---");
  lines.push(`title: ${formatFrontmatterString(`Sector Money Flow: ${report.date}`)}`);
  lines.push(`date: ${formatFrontmatterString(report.date)}`);
  lines.push(`generatedAt: ${formatFrontmatterString(report.generatedAt)}`);
  lines.push(`groupBy: ${formatFrontmatterString(report.groupBy)}`);
  lines.push("---");
  lines.push("");

  lines.push(`## Net flow (${windowLabel(report.window.days)})`);
  lines.push("");
  lines.push(describeFlowExtremes(report.window.summaries));
  lines.push("");
  lines.push("| Group | Net flow | Mean/day | Std/day | Up days | Down days | Flow/Assets |");
  lines.push("| --- | ---: | ---: | ---: | ---: | ---: | ---: |");
  for (const s of report.window.summaries) {
    lines.push(summaryRow(s));
  }
  lines.push("");

  if (report.windows.length > 0) {
    const ordered = [report.window, ...report.windows].sort(
      (a, b) => (a.days ?? Number.POSITIVE_INFINITY) - (b.days ?? Number.POSITIVE_INFINITY)
    );
    const keys = report.window.summaries.map((s) => s.key);

    lines.push("## Net flow by window");
    lines.push("");
    lines.push(`| Group | ${ordered.map((w) => (w.days === null ? "All" : `${w.days}d`)).join(" | ")} |`);
    lines.push(`| --- | ${ordered.map(() => "---:").join(" | ")} |`);
    for (const key of keys) {
      const cells = ordered.map((w) => {
        const s = w.summaries.find((x) => x.key === key);
        return s ? formatSignedDollars(s.netFlow) : "n/a";
      });
      lines.push(`| ${escapeCell(key)} | ${cells.join(" | ")} |`);
    }
    lines.push("");
  }

  if (report.missingSymbols.length > 0) {
    lines.push("## Missing data");
    lines.push("");
    lines.push(`No bars for: ${report.missingSymbols.join(", ")}`);
    lines.push("");
  }

  return `${lines.join("\n")}\n`;
}
