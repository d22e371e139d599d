import type { AggregateRow, Report } from "@fleetfuel/core";

import type { EfficiencyRanking, PeriodSummary } from "./aggregate.js";
import { formatDate, type PeriodFilter } from "./period.js";

const MEDALS = ["🥇", "🥈", "🥉"] as const;

export type AggregateViewOptions = {
  title: string;
  period: PeriodFilter;
  medals?: boolean;
};

export function formatProgram(r: Pick<Report, "program" | "privateRoute">): string {
  return r.privateRoute ? `${r.program} → ${r.privateRoute}` : r.program;
}

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function formatLiters(n: number): string {
  return `${round1(n)} L`;
}

function medalFor(index: number): string {
  const m = MEDALS[index];
  return m ? `${m} ` : "";
}

export function renderAggregateView(rows: readonly AggregateRow[], opts: AggregateViewOptions): string {
  const lines: string[] = [opts.title, `📅 Period: ${opts.period.label}`, ""];

  if (!rows.length) {
    lines.push("No data for selected period.");
    return lines.join("\n");
  }

  rows.forEach((row, idx) => {
    lines.push(`${opts.medals ? medalFor(idx) : ""}${row.key}`);
    lines.push(`   📊 Reports: ${row.reportCount}`);
    lines.push(`   ⛽ Avg. per report: ${formatLiters(row.averageLitersPerReport)}`);
    lines.push(`   🔋 Total: ${formatLiters(row.totalLiters)}`);
  });

  return lines.join("\n");
}

export function renderSummary(summary: PeriodSummary, period: PeriodFilter): string {
  const lines = ["📊 Period Summary", `📅 Period: ${period.label}`, ""];
  if (!summary.reportCount) {
    lines.push("No data for selected period.");
    return lines.join("\n");
  }
  lines.push(`🚤 Reports: ${summary.reportCount}`);
  lines.push(`⛽ Total fuel: ${formatLiters(summary.totalLiters)}`);
  lines.push(`📊 Avg. per report: ${formatLiters(summary.averageLitersPerReport)}`);
  return lines.join("\n");
}

export function renderEfficiencyRanking(ranking: EfficiencyRanking, period: PeriodFilter, minReports = 3): string {
  const lines = ["🏆 Efficiency Ranking", `📅 Period: ${period.label}`];

  if (!ranking.boats.length && !ranking.activeCaptains.length) {
    lines.push("", "No data for selected period.");
    return lines.join("\n");
  }

  lines.push("", "🚤 Most efficient boats:");
  ranking.boats.forEach((b, idx) => {
    lines.push(`${medalFor(idx)}${b.key} — ${formatLiters(b.averageLitersPerReport)}/report`);
  });

  lines.push("", "👨‍✈️ Most active captains:");
  ranking.activeCaptains.forEach((c, idx) => {
    lines.push(`${medalFor(idx)}${c.key} — ${c.reportCount} report${c.reportCount === 1 ? "" : "s"}`);
  });

  if (ranking.efficientCaptains.length) {
    lines.push("", `⛽ Most efficient captains (min. ${minReports} reports):`);
    ranking.efficientCaptains.forEach((c, idx) => {
      lines.push(`${medalFor(idx)}${c.key} — ${formatLiters(c.averageLitersPerReport)}/report`);
    });
  }

  return lines.join("\n");
}

export function renderReportLine(r: Report, idx: number): string {
  return [
    `${idx + 1}. ${formatDate(r.createdAt)} — ${r.boat}`,
    `   👨‍✈️ ${r.captain} | ⚓ ${r.pier}`,
    `   🏝 ${formatProgram(r)}`,
    `   ⛽ ${formatLiters(r.liters)}`,
  ].join("\n");
}
