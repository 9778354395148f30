import type {
  LatestVolume,
  LiveQuote,
  SectorDefinition,
  SectorPerformanceRow,
  SectorPerformanceSnapshot
} from "./types";

export function formatVolume(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value) || value === 0) {
    return "N/A";
  }
  if (value > 1_000_000) {
    return `${(value / 1_000_000).toFixed(2)}M`;
  }
  if (value > 1_000) {
    return `${(value / 1_000).toFixed(2)}K`;
  }
  return String(Math.trunc(value));
}

/**
* Compact USD amount with sign, used for flow figures (`-1.25B`, `830.00M`).
*/
export function formatDollarsCompact(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e12) {
    return `${(value / 1e12).toFixed(2)}T`;
  }
  if (abs >= 1e9) {
    return `${(value / 1e9).toFixed(2)}B`;
  }
  if (abs >= 1e6) {
    return `${(value / 1e6).toFixed(2)}M`;
  }
  if (abs >= 1e3) {
    return `${(value / 1e3).toFixed(2)}K`;
  }
  return value.toFixed(0);
}

export function formatSignedPct(value: number | null): string {
  if (value === null) {
    return "N/A";
  }
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

export function formatBarLabel(row: Pick<SectorPerformanceRow, "changePct" | "volume">): string {
  const pct = row.changePct === null ? "N/A" : `${row.changePct.toFixed(2)}%`;
  return ` ${pct} (Vol: ${formatVolume(row.volume)}) `;
}

function compareChangePct(a: SectorPerformanceRow, b: SectorPerformanceRow): number {
  const byPct =
    a.changePct === null || b.changePct === null
      ? Number(a.changePct === null) - Number(b.changePct === null)
      : b.changePct - a.changePct;
  return byPct || a.symbol.localeCompare(b.symbol);
}

export function buildSectorPerformance(args: {
  date: string;
  sectors: readonly SectorDefinition[];
  quotes: ReadonlyMap<string, LiveQuote | null>;
  volumes: ReadonlyMap<string, LatestVolume | null>;
  now?: Date;
}): SectorPerformanceSnapshot {
  const rows: SectorPerformanceRow[] = [];
  const missingSymbols: string[] = [];

  for (const sector of args.sectors) {
    const quote = args.quotes.get(sector.symbol);
    if (!quote || quote.price === 0 || !Number.isFinite(quote.price)) {
      missingSymbols.push(sector.symbol);
      continue;
    }

    // Left join: a quote without a volume reading still shows up, at zero volume.
    const volume = args.volumes.get(sector.symbol)?.volume ?? 0;
    const changePct = quote.changePct;
    rows.push({
      sector: sector.name,
      symbol: sector.symbol,
      price: quote.price,
      change: quote.change ?? 0,
      changePct,
      volume,
      label: formatBarLabel({ changePct, volume })
    });
  }

  rows.sort(compareChangePct);
  const ranked = rows.filter((r) => r.changePct !== null);

  return {
    date: args.date,
    generatedAt: (args.now ?? new Date()).toISOString(),
    rows,
    leader: ranked[0] ?? null,
    laggard: ranked.at(-1) ?? null,
    missingSymbols: missingSymbols.sort()
  };
}

function pad(value: string, width: number, align: "left" | "right"): string {
  return align === "left" ? value.padEnd(width) : value.padStart(width);
}

export function formatPerformanceTable(snapshot: SectorPerformanceSnapshot): string {
  const header = ["Sector", "Symbol", "Price", "Change", "Change %", "Volume"];
  const body = snapshot.rows.map((r) => [
    r.sector,
    r.symbol,
    r.price.toFixed(2),
    r.change.toFixed(2),
    formatSignedPct(r.changePct),
    formatVolume(r.volume)
  ]);

  const widths = header.map((h, i) => Math.max(h.length, ...body.map((row) => row[i].length)));
  const render = (cells: string[]) =>
    cells.map((cell, i) => pad(cell, widths[i], i < 2 ? "left" : "right")).join("  ").trimEnd();

  const lines = [render(header), widths.map((w) => "-".repeat(w)).join("  "), ...body.map(render)];
  if (snapshot.leader && snapshot.laggard) {
    lines.push(
      "",
      `Leader:  ${snapshot.leader.sector} ${formatSignedPct(snapshot.leader.changePct)} (${snapshot.leader.change.toFixed(2)})`,
      `Laggard: ${snapshot.laggard.sector} ${formatSignedPct(snapshot.laggard.changePct)} (${snapshot.laggard.change.toFixed(2)})`
    );
  }
  if (snapshot.missingSymbols.length > 0) {
    lines.push("", `Missing quotes: ${snapshot.missingSymbols.join(", ")}`);
  }

  return lines.join("\n");
}
