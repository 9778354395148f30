import { describe, expect, it } from "vitest";

import {
  buildSectorPerformance,
  formatBarLabel,
  formatDollarsCompact,
  formatPerformanceTable,
  formatVolume
} from "./performance";
import type { LatestVolume, LiveQuote } from "./types";

function quote(symbol: string, price: number, change: number | null, changePct: number | null): LiveQuote {
  return {
    symbol,
    price,
    change,
    changePct,
    high: null,
    low: null,
    open: null,
    previousClose: null,
    t: null
  };
}

function volume(symbol: string, v: number): LatestVolume {
  return { symbol, t: "2024-03-04T14:30:00.000Z", volume: v };
}

describe("formatVolume", () => {
  it("renders missing and zero volume as N/A", () => {
    expect(formatVolume(0)).toBe("N/A");
    expect(formatVolume(null)).toBe("N/A");
    expect(formatVolume(Number.NaN)).toBe("N/A");
  });

  it("scales to millions and thousands", () => {
    expect(formatVolume(12_345_678)).toBe("12.35M");
    expect(formatVolume(1_500)).toBe("1.50K");
    expect(formatVolume(1_000_000)).toBe("1000.00K");
    expect(formatVolume(999.7)).toBe("999");
  });
});

describe("formatDollarsCompact", () => {
  it("keeps the sign", () => {
    expect(formatDollarsCompact(-1_250_000_000)).toBe("-1.25B");
    expect(formatDollarsCompact(830_000_000)).toBe("830.00M");
    expect(formatDollarsCompact(42)).toBe("42");
  });
});

describe("formatBarLabel", () => {
  it("pairs the change with the volume", () => {
    expect(formatBarLabel({ changePct: -1.234, volume: 2_500 })).toBe(" -1.23% (Vol: 2.50K) ");
    expect(formatBarLabel({ changePct: null, volume: 2_500 })).toBe(" N/A (Vol: 2.50K) ");
  });
});

describe("buildSectorPerformance", () => {
  const sectors = [
    { name: "Technology", symbol: "XLK" },
    { name: "Energy", symbol: "XLE" },
    { name: "Utilities", symbol: "XLU" },
    { name: "Materials", symbol: "XLB" }
  ];

  const snapshot = buildSectorPerformance({
    date: "2024-03-04",
    sectors,
    quotes: new Map<string, LiveQuote | null>([
      ["XLK", quote("XLK", 200, 2, 1.01)],
      ["XLE", quote("XLE", 90, -1.5, -1.64)],
      ["XLU", quote("XLU", 0, null, null)],
      ["XLB", null]
    ]),
    volumes: new Map<string, LatestVolume | null>([
      ["XLK", volume("XLK", 12_345_678)],
      ["XLU", volume("XLU", 1_000)]
    ]),
    now: new Date("2024-03-04T15:00:00.000Z")
  });

  it("ranks by change and names leader and laggard", () => {
    expect(snapshot.rows.map((r) => r.symbol)).toEqual(["XLK", "XLE"]);
    expect(snapshot.leader?.sector).toBe("Technology");
    expect(snapshot.laggard?.sector).toBe("Energy");
    expect(snapshot.generatedAt).toBe("2024-03-04T15:00:00.000Z");
  });

  it("drops sectors without a usable quote", () => {
    expect(snapshot.missingSymbols).toEqual(["XLB", "XLU"]);
  });

  it("treats a missing volume as zero", () => {
    expect(snapshot.rows[1]).toEqual({
      sector: "Energy",
      symbol: "XLE",
      price: 90,
      change: -1.5,
      changePct: -1.64,
      volume: 0,
      label: " -1.64% (Vol: N/A) "
    });
    expect(snapshot.rows[0].label).toBe(" 1.01% (Vol: 12.35M) ");
  });

  it("ranks rows without a percent change last and never names them leader", () => {
    const partial = buildSectorPerformance({
      date: "2024-03-04",
      sectors: [
        { name: "Alpha", symbol: "AAA" },
        { name: "Beta", symbol: "BBB" },
        { name: "Gamma", symbol: "CCC" }
      ],
      quotes: new Map<string, LiveQuote | null>([
        ["AAA", quote("AAA", 10, -0.1, -1)],
        ["BBB", quote("BBB", 10, -0.2, -2)],
        ["CCC", quote("CCC", 10, null, null)]
      ]),
      volumes: new Map<string, LatestVolume | null>()
    });

    expect(partial.rows.map((r) => r.symbol)).toEqual(["AAA", "BBB", "CCC"]);
    expect(partial.leader?.symbol).toBe("AAA");
    expect(partial.laggard?.symbol).toBe("BBB");
    expect(partial.rows[2].label).toBe(" N/A (Vol: N/A) ");
  });

  it("renders a console table", () => {
    expect(formatPerformanceTable(snapshot).split("\n")).toEqual([
      "Sector      Symbol   Price  Change  Change %  Volume",
      "----------  ------  ------  ------  --------  ------",
      "Technology  XLK     200.00    2.00    +1.01%  12.35M",
      "Energy      XLE      90.00   -1.50    -1.64%     N/A",
      "",
      "Leader:  Technology +1.01% (2.00)",
      "Laggard: Energy -1.64% (-1.50)",
      "",
      "Missing quotes: XLB, XLU"
    ]);
  });
});
