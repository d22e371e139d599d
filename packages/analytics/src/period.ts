import type { DateRange, PeriodCode } from "@fleetfuel/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export type PeriodFilter = {
  code: PeriodCode;
  range: DateRange;
  label: string;
};

const PERIOD_CODES: readonly PeriodCode[] = ["today", "yesterday", "week", "month", "this_month", "3months", "all"];

export function isPeriodCode(value: string): value is PeriodCode {
  return PERIOD_CODES.some((code) => code === value);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDayMonth(d: Date): string {
  return `${pad2(d.getUTCDate())}.${pad2(d.getUTCMonth() + 1)}`;
}

export function formatDate(d: Date): string {
  return `${formatDayMonth(d)}.${d.getUTCFullYear()}`;
}

function startOfDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

function startOf(code: "week" | "month" | "this_month" | "3months", now: Date): Date {
  switch (code) {
    case "week":
      return new Date(now.getTime() - 7 * DAY_MS);
    case "month":
      return new Date(now.getTime() - 30 * DAY_MS);
    case "3months":
      return new Date(now.getTime() - 90 * DAY_MS);
    case "this_month":
      return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  }
}

/**
 * Turns a period code into a createdAt range ending at `now`.
 * "all" yields an unbounded range; "today" and "yesterday" are UTC calendar days.
 */
export function resolvePeriod(code: PeriodCode, now: Date = new Date()): PeriodFilter {
  switch (code) {
    case "all":
      return { code, range: {}, label: "All time" };
    case "today": {
      const from = startOfDay(now);
      return { code, range: { from }, label: formatDate(from) };
    }
    case "yesterday": {
      const to = startOfDay(now);
      const from = new Date(to.getTime() - DAY_MS);
      return { code, range: { from, to }, label: formatDate(from) };
    }
    default: {
      const from = startOf(code, now);
      return { code, range: { from }, label: `${formatDayMonth(from)} — ${formatDate(now)}` };
    }
  }
}

export function inRange(at: Date, range: DateRange): boolean {
  const t = at.getTime();
  if (range.from && t < range.from.getTime()) return false;
  if (range.to && t >= range.to.getTime()) return false;
  return true;
}
