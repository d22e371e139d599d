import type { AggregateRow, Dimension, Report } from "@fleetfuel/core";

export type PeriodSummary = {
  reportCount: number;
  totalLiters: number;
  averageLitersPerReport: number;
};

export type EfficiencyRanking = {
  boats: AggregateRow[];
  activeCaptains: AggregateRow[];
  efficientCaptains: AggregateRow[];
};

export type EfficiencyRankingOptions = {
  top?: number;
  // Captains with fewer reports are left out of the efficiency list.
  minReports?: number;
};

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function dimensionKey(report: Report, dimension: Dimension): string {
  switch (dimension) {
    case "boat":
      return report.boat;
    case "captain":
      return report.captain;
    case "program":
      return report.program;
  }
}

/**
 * Groups reports by one dimension. Rows come back ordered by total liters,
 * highest first, with ties broken by key.
 */
export function aggregateBy(reports: readonly Report[], dimension: Dimension): AggregateRow[] {
  const groups = new Map<string, { total: number; count: number }>();
  for (const r of reports) {
    const key = dimensionKey(r, dimension);
    const g = groups.get(key) ?? { total: 0, count: 0 };
    g.total += r.liters;
    g.count += 1;
    groups.set(key, g);
  }

  const rows: AggregateRow[] = [];
  for (const [key, g] of groups) {
    rows.push({
      key,
      totalLiters: g.total,
      reportCount: g.count,
      averageLitersPerReport: g.total / g.count,
    });
  }

  return rows.sort((a, b) => b.totalLiters - a.totalLiters || compareKeys(a.key, b.key));
}

/** Lowest average first; ties by key. Does not mutate its input. */
export function rankByEfficiency(rows: readonly AggregateRow[]): AggregateRow[] {
  return [...rows].sort(
    (a, b) => a.averageLitersPerReport - b.averageLitersPerReport || compareKeys(a.key, b.key),
  );
}

export function rankByActivity(rows: readonly AggregateRow[]): AggregateRow[] {
  return [...rows].sort((a, b) => b.reportCount - a.reportCount || compareKeys(a.key, b.key));
}

export function summarize(reports: readonly Report[]): PeriodSummary {
  const totalLiters = reports.reduce((sum, r) => sum + r.liters, 0);
  return {
    reportCount: reports.length,
    totalLiters,
    averageLitersPerReport: reports.length ? totalLiters / reports.length : 0,
  };
}

export function buildEfficiencyRanking(
  reports: readonly Report[],
  opts: EfficiencyRankingOptions = {},
): EfficiencyRanking {
  const top = opts.top ?? 3;
  const minReports = opts.minReports ?? 3;

  const boats = aggregateBy(reports, "boat");
  const captains = aggregateBy(reports, "captain");

  return {
    boats: rankByEfficiency(boats).slice(0, top),
    activeCaptains: rankByActivity(captains).slice(0, top),
    efficientCaptains: rankByEfficiency(captains.filter((c) => c.reportCount >= minReports)).slice(0, top),
  };
}
