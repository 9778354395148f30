import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { errorMessage } from "../lib/fsErrors";

import type { BarsProvider, FlowGroupBy, SectorDefinition, SizeMetric } from "./types";
import { BARS_PROVIDERS, FLOW_GROUP_BYS, SIZE_METRICS } from "./types";

export type FlowConfig = {
  /**
  * Calendar days of daily history requested per symbol.
  */
  lookbackDays: number;
  /**
  * Default trailing window, in trading days. `null` summarizes the whole history.
  */
  window: number | null;
  windows: number[];
  rollingPeriod: number;
  groupBy: FlowGroupBy;
  sizeMetric: SizeMetric;
  barsProvider: BarsProvider;
  concurrency: number;
};

const DEFAULT_FLOW_CONFIG: FlowConfig = {
  lookbackDays: 365,
  window: 20,
  windows: [5, 20, 60],
  rollingPeriod: 5,
  groupBy: "sector",
  sizeMetric: "totalAssets",
  barsProvider: "yahoo",
  concurrency: 4
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${name} must be a non-empty string`);
  }
  return value;
}

function assertPositiveInteger(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function assertOneOf<T extends string>(value: unknown, allowed: readonly T[], name: string): T {
  const found = allowed.find((a) => a === value);
  if (found === undefined) {
    throw new Error(`${name} must be one of ${allowed.join(", ")}, got ${String(value)}`);
  }
  return found;
}

export function parseWindowDays(value: unknown, name = "window"): number | null {
  if (value === null || value === "all") {
    return null;
  }
  return assertPositiveInteger(value, name);
}

function validateSector(raw: unknown, index: number): SectorDefinition {
  if (!isRecord(raw)) {
    throw new Error(`sectors[${index}] must be an object`);
  }

  const name = assertString(raw.name, `sectors[${index}].name`);
  const symbol = assertString(raw.symbol, `sectors[${index}].symbol`).toUpperCase();
  if (raw.totalAssets === undefined) {
    return { name, symbol };
  }

  if (typeof raw.totalAssets !== "number" || !Number.isFinite(raw.totalAssets) || raw.totalAssets <= 0) {
    throw new Error(`sectors[${index}].totalAssets must be a positive number`);
  }
  return { name, symbol, totalAssets: raw.totalAssets };
}

export function validateSectors(json: unknown): SectorDefinition[] {
  if (!isRecord(json) || !Array.isArray(json.sectors) || json.sectors.length === 0) {
    throw new Error("config/sectors.json must contain { sectors: [{ name, symbol }] }");
  }

  const sectors = json.sectors.map(validateSector);
  const seen = new Set<string>();
  for (const s of sectors) {
    if (seen.has(s.symbol)) {
      throw new Error(`Duplicate symbol in config/sectors.json: ${s.symbol}`);
    }
    seen.add(s.symbol);
  }
  return sectors;
}

export async function loadSectors(rootDir = process.cwd()): Promise<SectorDefinition[]> {
  const raw = await readFile(path.join(rootDir, "config", "sectors.json"), "utf8");
  return validateSectors(JSON.parse(raw));
}

export function validateFlowConfig(raw: unknown): FlowConfig {
  if (raw === null || raw === undefined) {
    return { ...DEFAULT_FLOW_CONFIG, windows: [...DEFAULT_FLOW_CONFIG.windows] };
  }
  if (!isRecord(raw)) {
    throw new Error("flow.yml must be a mapping");
  }

  const windowsRaw: unknown = raw.windows ?? DEFAULT_FLOW_CONFIG.windows;
  if (!Array.isArray(windowsRaw)) {
    throw new Error("flow.yml windows must be a list of positive integers");
  }
  const windowValues: unknown[] = windowsRaw;

  return {
    lookbackDays:
      raw.lookbackDays === undefined
        ? DEFAULT_FLOW_CONFIG.lookbackDays
        : assertPositiveInteger(raw.lookbackDays, "lookbackDays"),
    window: raw.window === undefined ? DEFAULT_FLOW_CONFIG.window : parseWindowDays(raw.window),
    windows: Array.from(new Set(windowValues.map((w, i) => assertPositiveInteger(w, `windows[${i}]`)))).sort(
      (a, b) => a - b
    ),
    rollingPeriod:
      raw.rollingPeriod === undefined
        ? DEFAULT_FLOW_CONFIG.rollingPeriod
        : assertPositiveInteger(raw.rollingPeriod, "rollingPeriod"),
    groupBy:
      raw.groupBy === undefined ? DEFAULT_FLOW_CONFIG.groupBy : assertOneOf(raw.groupBy, FLOW_GROUP_BYS, "groupBy"),
    sizeMetric:
      raw.sizeMetric === undefined
        ? DEFAULT_FLOW_CONFIG.sizeMetric
        : assertOneOf(raw.sizeMetric, SIZE_METRICS, "sizeMetric"),
    barsProvider:
      raw.barsProvider === undefined
        ? DEFAULT_FLOW_CONFIG.barsProvider
        : assertOneOf(raw.barsProvider, BARS_PROVIDERS, "barsProvider"),
    concurrency:
      raw.concurrency === undefined
        ? DEFAULT_FLOW_CONFIG.concurrency
        : assertPositiveInteger(raw.concurrency, "concurrency")
  };
}

export async function loadFlowConfig(rootDir = process.cwd()): Promise<FlowConfig> {
  const raw = await readFile(path.join(rootDir, "config", "flow.yml"), "utf8");
  try {
    return validateFlowConfig(parseYaml(raw));
  } catch (error) {
    throw new Error(`[flows:config] Invalid config/flow.yml: ${errorMessage(error)}`);
  }
}

export function getFinnhubApiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  const key = env.FINNHUB_API_KEY?.trim();
  return key ? key : null;
}
