import type { AggregateRow, Report } from "@fleetfuel/core";

import { aggregateBy, compareKeys, summarize, type PeriodSummary } from "./aggregate.js";
import { formatDayMonth, type PeriodFilter } from "./period.js";
import { formatLiters, formatProgram } from "./render.js";

/** Per-report table with boat and captain subtotals, meant to be forwarded to management. */
export type PeriodReport = {
  title: string;
  period: PeriodFilter;
  // Oldest first.
  reports: Report[];
  boats: AggregateRow[];
  captains: AggregateRow[];
  totals: PeriodSummary;
};

// Keeps the chat message well under Telegram's 4096 character limit; the CSV has every row.
export const PERIOD_REPORT_MAX_LINES = 30;

function byName(rows: AggregateRow[]): AggregateRow[] {
  return rows.sort((a, b) => compareKeys(a.key, b.key));
}

export function buildPeriodReport(reports: readonly Report[], period: PeriodFilter, title: string): PeriodReport {
  return {
    title,
    period,
    reports: [...reports].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime()),
    boats: byName(aggregateBy(reports, "boat")),
    captains: byName(aggregateBy(reports, "captain")),
    totals: summarize(reports),
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTime(d: Date): string {
  return `${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function subtotal(row: AggregateRow): string {
  return `${row.key} — ${plural(row.reportCount, "report")}, ${formatLiters(row.totalLiters)}`;
}

export function renderPeriodReport(report: PeriodReport): string {
  const lines = [report.title, `📅 Period: ${report.period.label}`, ""];

  if (!report.reports.length) {
    lines.push("No reports for this period.");
    return lines.join("\n");
  }

  report.reports.slice(0, PERIOD_REPORT_MAX_LINES).forEach((r, idx) => {
    lines.push(
      `${idx + 1}. ${formatDayMonth(r.createdAt)} ${formatTime(r.createdAt)} ${r.boat} | ${r.captain} | ${formatProgram(r)} | ${formatLiters(r.liters)}`,
    );
  });
  const hidden = report.reports.length - PERIOD_REPORT_MAX_LINES;
  if (hidden > 0) lines.push(`… and ${hidden} more in the CSV`);

  lines.push("", "🚤 By boat:", ...report.boats.map(subtotal));
  lines.push("", "👨‍✈️ By captain:", ...report.captains.map(subtotal));
  lines.push(
    "",
    `TOTAL: ${plural(report.totals.reportCount, "report")}, ${formatLiters(report.totals.totalLiters)}`,
  );
  return lines.join("\n");
}
