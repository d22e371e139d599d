import type { AggregateRow, DateRange, Dimension, PeriodCode } from "@fleetfuel/core";
import {
  aggregateBy,
  aggregatesToCsv,
  buildEfficiencyRanking,
  buildPeriodReport,
  csvFileName,
  periodReportToCsv,
  rankByEfficiency,
  renderAggregateView,
  renderEfficiencyRanking,
  renderPeriodReport,
  renderSummary,
  reportsToCsv,
  resolvePeriod,
  summarize,
  type EfficiencyRanking,
  type PeriodSummary,
} from "@fleetfuel/analytics";

import type { ReportStore } from "../store/reportStore.js";

export const EFFICIENT_CAPTAIN_MIN_REPORTS = 3;

export type AnalyticsView = "boats" | "captains" | "programs" | "summary" | "ranking";

export type CsvExportKind = "reports" | "boats" | "captains";

export type CsvFile = { fileName: string; content: Buffer };

export type ManagementReportKind = "daily" | "yesterday" | "weekly" | "monthly";

export type ManagementReport = { text: string; file: CsvFile };

const MANAGEMENT_REPORTS: Record<ManagementReportKind, { code: PeriodCode; title: string }> = {
  daily: { code: "today", title: "📊 Daily Fuel Report" },
  yesterday: { code: "yesterday", title: "📊 Yesterday's Fuel Report" },
  weekly: { code: "week", title: "📈 Weekly Fuel Report" },
  monthly: { code: "this_month", title: "📅 Monthly Fuel Report" },
};

const VIEW_TITLES = {
  boats: "🚤 Boat Statistics",
  captains: "👨‍✈️ Captain Statistics",
  programs: "🏝 Program Statistics",
} as const;

export class AnalyticsService {
  constructor(
    private readonly store: ReportStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async aggregateBy(dimension: Dimension, range: DateRange = {}): Promise<AggregateRow[]> {
    return aggregateBy(await this.store.query(range), dimension);
  }

  async rankByEfficiency(dimension: Dimension, range: DateRange = {}): Promise<AggregateRow[]> {
    return rankByEfficiency(await this.aggregateBy(dimension, range));
  }

  async summary(range: DateRange = {}): Promise<PeriodSummary> {
    return summarize(await this.store.query(range));
  }

  async ranking(range: DateRange = {}): Promise<EfficiencyRanking> {
    return buildEfficiencyRanking(await this.store.query(range), { minReports: EFFICIENT_CAPTAIN_MIN_REPORTS });
  }

  async exportCsv(range: DateRange = {}): Promise<Buffer> {
    return reportsToCsv(await this.store.query(range));
  }

  /** Renders one analytics view for a period as chat text. */
  async renderView(view: AnalyticsView, code: PeriodCode): Promise<string> {
    const period = resolvePeriod(code, this.now());
    switch (view) {
      case "boats":
        // Lowest consumption first, like the efficiency ranking.
        return renderAggregateView(await this.rankByEfficiency("boat", period.range), {
          title: VIEW_TITLES.boats,
          period,
          medals: true,
        });
      case "captains":
        return renderAggregateView(await this.aggregateBy("captain", period.range), {
          title: VIEW_TITLES.captains,
          period,
          medals: true,
        });
      case "programs":
        return renderAggregateView(await this.aggregateBy("program", period.range), {
          title: VIEW_TITLES.programs,
          period,
        });
      case "summary":
        return renderSummary(await this.summary(period.range), period);
      case "ranking":
        return renderEfficiencyRanking(await this.ranking(period.range), period, EFFICIENT_CAPTAIN_MIN_REPORTS);
    }
  }

  async exportFile(kind: CsvExportKind, code: PeriodCode = "all"): Promise<CsvFile> {
    const now = this.now();
    const { range } = resolvePeriod(code, now);
    switch (kind) {
      case "reports":
        return { fileName: csvFileName("fuel_reports", now), content: await this.exportCsv(range) };
      case "boats":
        return {
          fileName: csvFileName("boat_statistics", now),
          content: aggregatesToCsv(await this.rankByEfficiency("boat", range), "boat"),
        };
      case "captains":
        return {
          fileName: csvFileName("captain_statistics", now),
          content: aggregatesToCsv(await this.aggregateBy("captain", range), "captain"),
        };
    }
  }

  /** Per-report table with boat and captain subtotals, as chat text and as a CSV file. */
  async managementReport(kind: ManagementReportKind): Promise<ManagementReport> {
    const now = this.now();
    const { code, title } = MANAGEMENT_REPORTS[kind];
    const period = resolvePeriod(code, now);
    const report = buildPeriodReport(await this.store.query(period.range), period, title);
    return {
      text: renderPeriodReport(report),
      file: { fileName: csvFileName(`${kind}_report`, now), content: periodReportToCsv(report) },
    };
  }
}
