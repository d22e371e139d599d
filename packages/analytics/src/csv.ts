import type { AggregateRow, Dimension, Report } from "@fleetfuel/core";

import { formatDate } from "./period.js";
import { formatTime, type PeriodReport } from "./periodReport.js";
import { formatProgram, round1 } from "./render.js";

// Spreadsheet apps need the BOM to detect UTF-8.
const BOM = "\uFEFF";
const EOL = "\r\n";

export const REPORT_CSV_HEADER = ["Timestamp", "Boat", "Captain", "Program", "Pier", "Liters", "User ID"] as const;

const DIMENSION_LABELS: Record<Dimension, string> = {
  boat: "Boat",
  captain: "Captain",
  program: "Program",
};

export function csvCell(value: string | number): string {
  const s = String(value);
  if (!/[",\r\n]/.test(s)) return s;
  return `"${s.replace(/"/g, '""')}"`;
}

function toCsv(rows: ReadonlyArray<ReadonlyArray<string | number>>): Buffer {
  const text = rows.map((row) => row.map(csvCell).join(",")).join(EOL) + EOL;
  return Buffer.from(BOM + text, "utf8");
}

/** One row per report, oldest first. */
export function reportsToCsv(reports: readonly Report[]): Buffer {
  const ordered = [...reports].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  return toCsv([
    REPORT_CSV_HEADER,
    ...ordered.map((r) => [
      r.createdAt.toISOString(),
      r.boat,
      r.captain,
      formatProgram(r),
      r.pier,
      r.liters,
      r.userId,
    ]),
  ]);
}

export function aggregatesToCsv(rows: readonly AggregateRow[], dimension: Dimension): Buffer {
  return toCsv([
    [DIMENSION_LABELS[dimension], "Reports", "Total Liters", "Avg Liters per Report"],
    ...rows.map((r) => [r.key, r.reportCount, round1(r.totalLiters), round1(r.averageLitersPerReport)]),
  ]);
}

/** Report rows, a boat and a captain subtotal block and a total line, separated by blank rows. */
export function periodReportToCsv(report: PeriodReport): Buffer {
  const subtotal = (r: AggregateRow) => [r.key, r.reportCount, round1(r.totalLiters)];
  return toCsv([
    [report.title, report.period.label],
    [],
    ["Date", "Boat", "Captain", "Program", "Pier", "Liters"],
    ...report.reports.map((r) => [
      `${formatDate(r.createdAt)} ${formatTime(r.createdAt)}`,
      r.boat,
      r.captain,
      formatProgram(r),
      r.pier,
      r.liters,
    ]),
    [],
    ["Boat", "Reports", "Total Liters"],
    ...report.boats.map(subtotal),
    [],
    ["Captain", "Reports", "Total Liters"],
    ...report.captains.map(subtotal),
    [],
    ["TOTAL", report.totals.reportCount, round1(report.totals.totalLiters)],
  ]);
}

export function csvFileName(prefix: string, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${prefix}_${stamp}.csv`;
}
