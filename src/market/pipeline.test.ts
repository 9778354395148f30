import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runFlowReport, runSectorPerformance } from "./pipeline";
import type { DailyBarsSource, QuoteSource, SizeSource, VolumeSource } from "./providers/sources";
import type { LiveQuote, MarketBar } from "./types";

const DATES = ["2024-03-01", "2024-03-04", "2024-03-05", "2024-03-06"];

function bars(prices: number[], volumes: number[]): MarketBar[] {
  return prices.map((p, i) => ({ t: `${DATES[i]}T14:30:00.000Z`, o: p, h: p, l: p, c: p, v: volumes[i] }));
}

const BARS: Record<string, MarketBar[]> = {
  XLK: bars([10, 11, 11, 9], [100, 200, 300, 400]),
  XLE: bars([50, 40, 45, 46], [10, 10, 20, 0]),
  XLU: bars([70], [1000]).map((b) => ({ ...b, t: "2024-03-06T14:30:00.000Z" }))
};

class FakeBars implements DailyBarsSource {
  readonly requests: Array<{ symbol: string; lookbackDays: number; asOfDate?: string }> = [];

  async fetchDailySeries(symbol: string, req: { lookbackDays: number; asOfDate?: string }) {
    this.requests.push({ symbol, ...req });
    const found = BARS[symbol];
    if (!found) {
      throw new Error(`no data for ${symbol}`);
    }
    return { symbol, interval: "1d" as const, provider: "fake", fetchedAt: "2024-03-06T21:00:00.000Z", bars: found };
  }
}

const fakeSizes: SizeSource = {
  async fetchTotalAssets(symbol) {
    if (symbol === "XLE") {
      return 90_000;
    }
    if (symbol === "XLB") {
      throw new Error("quoteSummary failed");
    }
    return null;
  }
};

const SECTORS = {
  sectors: [
    { name: "Technology", symbol: "XLK", totalAssets: 1_000_000 },
    { name: "Energy", symbol: "XLE" },
    { name: "Utilities", symbol: "XLU" },
    { name: "Materials", symbol: "XLB" }
  ]
};

const FLOW_YML = `lookbackDays: 30
window: 2
windows: [2, 3]
rollingPeriod: 2
groupBy: sector
sizeMetric: totalAssets
concurrency: 2
`;

describe("pipeline", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "sector-flows-pipeline-"));
    await mkdir(path.join(rootDir, "config"));
    await writeFile(path.join(rootDir, "config", "sectors.json"), JSON.stringify(SECTORS), "utf8");
    await writeFile(path.join(rootDir, "config", "flow.yml"), FLOW_YML, "utf8");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(rootDir, { recursive: true, force: true });
  });

  describe("runFlowReport", () => {
    it("summarizes every sector and records failures as missing", async () => {
      const barsSource = new FakeBars();
      const res = await runFlowReport("2024-03-06", {
        rootDir,
        sources: { bars: barsSource, sizes: fakeSizes },
        now: new Date("2024-03-06T21:00:00.000Z")
      });

      expect(barsSource.requests.map((r) => r.symbol).sort()).toEqual(["XLB", "XLE", "XLK", "XLU"]);
      expect(barsSource.requests[0]).toMatchObject({ lookbackDays: 30, asOfDate: "2024-03-06" });
      expect(res.report.missingSymbols).toEqual(["XLB"]);
      expect(console.error).toHaveBeenCalledWith("[flows:data] failed for XLB (2024-03-06): no data for XLB");

      expect(
        res.report.window.summaries.map((s) => ({ key: s.key, netFlow: s.netFlow, flowToSize: s.flowToSize }))
      ).toEqual([
        { key: "Energy", netFlow: 900, flowToSize: 0.01 },
        { key: "Materials", netFlow: 0, flowToSize: null },
        { key: "Utilities", netFlow: 0, flowToSize: null },
        { key: "Technology", netFlow: -3600, flowToSize: -3600 / 1_000_000 }
      ]);
      expect(res.report.windows.map((w) => w.days)).toEqual([3]);
    });

    it("writes the report files", async () => {
      const res = await runFlowReport("2024-03-06", {
        rootDir,
        sources: { bars: new FakeBars(), sizes: fakeSizes },
        now: new Date("2024-03-06T21:00:00.000Z")
      });

      expect(res.jsonPath).toBe(path.join(rootDir, "content", "reports", "2024-03-06.flows.json"));
      expect(JSON.parse(await readFile(res.jsonPath, "utf8"))).toEqual(res.report);

      const md = await readFile(res.markdownPath, "utf8");
      expect(md.split("\n")).toContain("| Energy | +900 | +450 | 636 | 1 | 0 | +1.00% |");
    });

    it("honors window and grouping overrides", async () => {
      const res = await runFlowReport("2024-03-06", {
        rootDir,
        window: null,
        groupBy: "symbol",
        sources: { bars: new FakeBars() }
      });

      expect(res.report.window.days).toBeNull();
      expect(res.report.window.summaries.map((s) => [s.key, s.netFlow])).toEqual([
        ["XLE", 500],
        ["XLB", 0],
        ["XLU", 0],
        ["XLK", -1400]
      ]);
      // Only the static size is known without a size source.
      expect(res.report.window.summaries.find((s) => s.key === "XLK")?.size).toBe(1_000_000);
    });
  });

  describe("runSectorPerformance", () => {
    const quotes: Record<string, LiveQuote | null> = {
      XLK: {
        symbol: "XLK",
        price: 200,
        change: 2,
        changePct: 1.01,
        high: null,
        low: null,
        open: null,
        previousClose: 198,
        t: null
      },
      XLE: {
        symbol: "XLE",
        price: 90,
        change: -1.5,
        changePct: -1.64,
        high: null,
        low: null,
        open: null,
        previousClose: 91.5,
        t: null
      },
      XLU: null
    };

    const quoteSource: QuoteSource = {
      async fetchQuote(symbol) {
        if (!(symbol in quotes)) {
          throw new Error("HTTP 500");
        }
        return quotes[symbol];
      }
    };

    const volumeSource: VolumeSource = {
      async fetchLatestVolume(symbol) {
        if (symbol === "XLK") {
          return { symbol, t: "2024-03-06T14:30:00.000Z", volume: 12_345_678 };
        }
        if (symbol === "XLB") {
          throw new Error("chart failed");
        }
        return null;
      }
    };

    it("merges quotes with volume and writes the snapshot", async () => {
      const res = await runSectorPerformance("2024-03-06", {
        rootDir,
        sources: { quotes: quoteSource, volumes: volumeSource },
        now: new Date("2024-03-06T15:00:00.000Z")
      });

      expect(res.snapshot.rows.map((r) => [r.symbol, r.volume, r.label])).toEqual([
        ["XLK", 12_345_678, " 1.01% (Vol: 12.35M) "],
        ["XLE", 0, " -1.64% (Vol: N/A) "]
      ]);
      expect(res.snapshot.leader?.symbol).toBe("XLK");
      expect(res.snapshot.laggard?.symbol).toBe("XLE");
      expect(res.snapshot.missingSymbols).toEqual(["XLB", "XLU"]);
      expect(console.error).toHaveBeenCalledWith("[flows:quotes] failed for XLB: HTTP 500");
      expect(console.error).toHaveBeenCalledWith("[flows:volume] failed for XLB: chart failed");
      expect(JSON.parse(await readFile(res.path, "utf8"))).toEqual(res.snapshot);
    });

    it("fails when no quote loads", async () => {
      const noQuotes: QuoteSource = {
        async fetchQuote() {
          return null;
        }
      };

      await expect(
        runSectorPerformance("2024-03-06", { rootDir, sources: { quotes: noQuotes, volumes: volumeSource } })
      ).rejects.toThrow("[flows:performance] No live quotes loaded for 2024-03-06; check FINNHUB_API_KEY.");
    });
  });
});
