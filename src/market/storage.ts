import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { assertYYYYMMDD } from "../lib/date";
import { errorMessage, isEnoent } from "../lib/fsErrors";

import type { FlowReport, SectorPerformanceSnapshot } from "./types";

// Output layout (relative to the working directory):
//   content/reports/<YYYY-MM-DD>.flows.json
//   content/reports/<YYYY-MM-DD>.flows.md
//   content/performance/<YYYY-MM-DD>.json

export function getContentDir(rootDir = process.cwd()): string {
  return path.join(rootDir, "content");
}

export function getReportsDir(rootDir = process.cwd()): string {
  return path.join(getContentDir(rootDir), "reports");
}

export function getPerformanceDir(rootDir = process.cwd()): string {
  return path.join(getContentDir(rootDir), "performance");
}

export function getFlowReportJsonPath(date: string, rootDir = process.cwd()): string {
  assertYYYYMMDD(date);
  return path.join(getReportsDir(rootDir), `${date}.flows.json`);
}

export function getFlowReportMarkdownPath(date: string, rootDir = process.cwd()): string {
  assertYYYYMMDD(date);
  return path.join(getReportsDir(rootDir), `${date}.flows.md`);
}

export function getPerformancePath(date: string, rootDir = process.cwd()): string {
  assertYYYYMMDD(date);
  return path.join(getPerformanceDir(rootDir), `${date}.json`);
}

export async function writeJson(
  filePath: string,
  value: unknown,
  opts: {
    pretty?: boolean;
  } = {}
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const json = opts.pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
  await writeFile(filePath, `${json}\n`, "utf8");
}

export async function readJson<T>(filePath: string): Promise<T> {
  const raw = await readFile(filePath, "utf8");
  return JSON.parse(raw) as T;
}

/**
* Writes the JSON artifact and its Markdown rendering. Each file is swapped in atomically via
* rename; a failure removes the temp files and leaves any previous report in place.
*/
export async function writeFlowReport(report: FlowReport, markdown: string, rootDir = process.cwd()): Promise<{
  jsonPath: string;
  markdownPath: string;
}> {
  const jsonPath = getFlowReportJsonPath(report.date, rootDir);
  const markdownPath = getFlowReportMarkdownPath(report.date, rootDir);
  const jsonTmp = `${jsonPath}.tmp`;
  const markdownTmp = `${markdownPath}.tmp`;

  await mkdir(getReportsDir(rootDir), { recursive: true });

  try {
    await writeJson(jsonTmp, report, { pretty: true });
    await writeFile(markdownTmp, markdown, "utf8");
    await rename(jsonTmp, jsonPath);
    await rename(markdownTmp, markdownPath);
  } catch (error) {
    await Promise.allSettled([rm(jsonTmp, { force: true }), rm(markdownTmp, { force: true })]);
    throw new Error(`[flows:storage] Failed writing report for ${report.date}: ${errorMessage(error)}`);
  }

  return { jsonPath, markdownPath };
}

export async function readFlowReport(date: string, rootDir = process.cwd()): Promise<FlowReport | null> {
  try {
    return await readJson<FlowReport>(getFlowReportJsonPath(date, rootDir));
  } catch (error) {
    if (isEnoent(error)) {
      return null;
    }
    throw error;
  }
}

export async function listReportDates(rootDir = process.cwd()): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(getReportsDir(rootDir));
  } catch (error) {
    if (isEnoent(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((e) => e.endsWith(".flows.json"))
    .map((e) => e.replace(/\.flows\.json$/, ""))
    .filter((name) => /^\d{4}-\d{2}-\d{2}$/.test(name))
    .sort();
}

export async function writePerformanceSnapshot(
  snapshot: SectorPerformanceSnapshot,
  rootDir = process.cwd()
): Promise<string> {
  const filePath = getPerformancePath(snapshot.date, rootDir);
  const tmpPath = `${filePath}.tmp`;

  try {
    await writeJson(tmpPath, snapshot, { pretty: true });
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new Error(
      `[flows:storage] Failed writing performance snapshot for ${snapshot.date}: ${errorMessage(error)}`
    );
  }
  return filePath;
}
