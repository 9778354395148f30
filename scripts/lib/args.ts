import { assertYYYYMMDD, getTodayNYDateString } from "../../src/lib/date";
import { parseWindowDays } from "../../src/market/config";
import type { FlowGroupBy } from "../../src/market/types";
import { FLOW_GROUP_BYS } from "../../src/market/types";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function getDateArg(argv: string[], today = getTodayNYDateString()): string {
  const date = getArg(argv, "date") ?? today;
  assertYYYYMMDD(date);

  if (date > today) {
    throw new Error(`Date cannot be in the future (NY). Got ${date}, today is ${today}`);
  }

  return date;
}

/**
* Live quotes only describe the current session, so stages built on them take today's date.
*/
export function getLiveDateArg(argv: string[], today = getTodayNYDateString()): string {
  const date = getDateArg(argv, today);
  if (date !== today) {
    throw new Error(`Live quotes only cover today (NY). Got ${date}, today is ${today}`);
  }
  return date;
}

export function getPositiveIntArg(argv: string[], name: string, max: number): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > max) {
    throw new Error(`--${name} must be a positive integer ≤ ${max}, got '${raw}'`);
  }
  return parsed;
}

/**
* `--window=20` or `--window=all`. `undefined` when the flag is absent.
*/
export function getWindowArg(argv: string[]): number | null | undefined {
  const raw = getArg(argv, "window");
  if (raw === undefined) {
    return undefined;
  }
  return parseWindowDays(raw === "all" ? raw : Number(raw), "--window");
}

export function getGroupByArg(argv: string[]): FlowGroupBy | undefined {
  const raw = getArg(argv, "group-by");
  if (raw === undefined) {
    return undefined;
  }

  const found = FLOW_GROUP_BYS.find((g) => g === raw);
  if (!found) {
    throw new Error(`--group-by must be one of ${FLOW_GROUP_BYS.join(", ")}, got '${raw}'`);
  }
  return found;
}
