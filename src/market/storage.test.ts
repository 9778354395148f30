import { mkdir, mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  getFlowReportJsonPath,
  listReportDates,
  readFlowReport,
  writeFlowReport,
  writePerformanceSnapshot
} from "./storage";
import type { FlowReport, SectorPerformanceSnapshot } from "./types";

function emptyReport(date: string): FlowReport {
  return {
    date,
    generatedAt: `${date}T21:00:00.000Z`,
    groupBy: "sector",
    sizeMetric: "none",
    symbols: ["XLK"],
    missingSymbols: [],
    window: { days: 20, summaries: [] },
    windows: [],
    daily: []
  };
}

function performanceSnapshot(date: string): SectorPerformanceSnapshot {
  return {
    date,
    generatedAt: `${date}T15:00:00.000Z`,
    rows: [],
    leader: null,
    laggard: null,
    missingSymbols: ["XLK"]
  };
}

describe("storage", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "sector-flows-storage-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("writes the JSON and Markdown report without leaving temp files", async () => {
    const report = emptyReport("2024-03-04");
    const paths = await writeFlowReport(report, "# report\n", rootDir);

    expect(paths.jsonPath).toBe(path.join(rootDir, "content", "reports", "2024-03-04.flows.json"));
    expect(await readFile(paths.markdownPath, "utf8")).toBe("# report\n");
    expect((await readdir(path.join(rootDir, "content", "reports"))).sort()).toEqual([
      "2024-03-04.flows.json",
      "2024-03-04.flows.md"
    ]);
    expect(await readFlowReport("2024-03-04", rootDir)).toEqual(report);
  });

  it("returns null for a report that was never written", async () => {
    expect(await readFlowReport("2024-03-04", rootDir)).toBeNull();
  });

  it("lists report dates in order", async () => {
    expect(await listReportDates(rootDir)).toEqual([]);

    await writeFlowReport(emptyReport("2024-03-05"), "", rootDir);
    await writeFlowReport(emptyReport("2024-03-01"), "", rootDir);

    expect(await listReportDates(rootDir)).toEqual(["2024-03-01", "2024-03-05"]);
  });

  it("rejects malformed dates in paths", () => {
    expect(() => getFlowReportJsonPath("../etc", rootDir)).toThrow("Expected YYYY-MM-DD, got: ../etc");
  });

  it("writes performance snapshots", async () => {
    const snapshot = performanceSnapshot("2024-03-04");

    const filePath = await writePerformanceSnapshot(snapshot, rootDir);

    expect(filePath).toBe(path.join(rootDir, "content", "performance", "2024-03-04.json"));
    expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual(snapshot);
  });

  it("labels a failed snapshot write and removes the temp file", async () => {
    const dir = path.join(rootDir, "content", "performance");
    // A directory where the snapshot file belongs makes the rename fail.
    await mkdir(path.join(dir, "2024-03-04.json"), { recursive: true });

    await expect(writePerformanceSnapshot(performanceSnapshot("2024-03-04"), rootDir)).rejects.toThrow(
      "[flows:storage] Failed writing performance snapshot for 2024-03-04: "
    );
    expect(await readdir(dir)).toEqual(["2024-03-04.json"]);
  });
});
