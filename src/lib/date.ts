const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export type IsoDateYmd = {
  year: number;
  month: number;
  day: number;
};

export function formatDateYYYYMMDD(date: Date, timeZone = "America/New_York"): string {
  // `formatToParts()` keeps us independent of locale-specific separators/order.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(date);

  const year = parts.find((p) => p.type === "year")?.value;
  const month = parts.find((p) => p.type === "month")?.value;
  const day = parts.find((p) => p.type === "day")?.value;

  if (!year || !month || !day) {
    throw new Error(`Failed to format date (tz=${timeZone})`);
  }

  return `${year}-${month}-${day}`;
}

export function getTodayNYDateString(now = new Date()): string {
  return formatDateYYYYMMDD(now, "America/New_York");
}

export function assertYYYYMMDD(date: string): void {
  if (!ISO_DATE_RE.test(date)) {
    throw new Error(`Expected YYYY-MM-DD, got: ${date}`);
  }
}

export function parseIsoDateYmd(date: string): IsoDateYmd {
  if (!ISO_DATE_RE.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYY-MM-DD.`);
  }

  const [year, month, day] = date.split("-").map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }

  return { year, month, day };
}

/**
* Last millisecond of `date` in UTC, used as the inclusive upper bound of provider requests.
*/
export function endOfDayUtc(date: string): Date {
  const { year, month, day } = parseIsoDateYmd(date);
  return new Date(Date.UTC(year, month - 1, day, 23, 59, 59, 999));
}

/**
* Trading-day key of an ISO timestamp. Daily bars carry the session date in their UTC date part.
*/
export function toTradingDate(t: string): string {
  const date = t.slice(0, 10);
  if (!ISO_DATE_RE.test(date)) {
    throw new Error(`Invalid bar timestamp: ${t}`);
  }
  return date;
}
