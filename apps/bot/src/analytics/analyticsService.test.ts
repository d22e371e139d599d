import { beforeEach, describe, expect, it } from "vitest";

import { MemoryReportStore } from "../store/memoryReportStore.js";
import { newReport } from "../testing/fixtures.js";
import { AnalyticsService } from "./analyticsService.js";

const NOW = new Date("2026-03-12T00:00:00Z");

describe("analytics service", () => {
  let clock: Date;
  let store: MemoryReportStore;
  let analytics: AnalyticsService;

  beforeEach(async () => {
    clock = new Date("2026-03-10T09:00:00Z");
    store = new MemoryReportStore(() => clock);
    analytics = new AnalyticsService(store, () => NOW);

    await store.save(newReport({ boat: "Aurora", captain: "Ivan", liters: 10 }));
    clock = new Date("2026-03-10T10:00:00Z");
    await store.save(newReport({ boat: "Aurora", captain: "Petr", liters: 20 }));
    clock = new Date("2026-03-10T11:00:00Z");
    await store.save(newReport({ boat: "Breeze", captain: "Ivan", liters: 5 }));
  });

  it("aggregates by boat with totals, counts and averages", async () => {
    expect(await analytics.aggregateBy("boat")).toEqual([
      { key: "Aurora", totalLiters: 30, reportCount: 2, averageLitersPerReport: 15 },
      { key: "Breeze", totalLiters: 5, reportCount: 1, averageLitersPerReport: 5 },
    ]);
  });

  it("ranks by lowest average", async () => {
    expect((await analytics.rankByEfficiency("boat")).map((r) => r.key)).toEqual(["Breeze", "Aurora"]);
  });

  it("keeps aggregate sums equal to the in-range totals", async () => {
    const range = { from: new Date("2026-03-10T09:30:00Z") };
    const rows = await analytics.aggregateBy("captain", range);
    expect(rows.reduce((s, r) => s + r.totalLiters, 0)).toBe(25);
    expect(rows.reduce((s, r) => s + r.reportCount, 0)).toBe(2);
  });

  it("exports every report in creation order", async () => {
    const text = (await analytics.exportCsv()).toString("utf8");
    expect(text.split("\r\n")).toEqual([
      "\uFEFFTimestamp,Boat,Captain,Program,Pier,Liters,User ID",
      "2026-03-10T09:00:00.000Z,Aurora,Ivan,Sunset Cruise,North Pier,10,1001",
      "2026-03-10T10:00:00.000Z,Aurora,Petr,Sunset Cruise,North Pier,20,1001",
      "2026-03-10T11:00:00.000Z,Breeze,Ivan,Sunset Cruise,North Pier,5,1001",
      "",
    ]);
  });

  it("renders the program view for all time", async () => {
    expect(await analytics.renderView("programs", "all")).toBe(
      [
        "🏝 Program Statistics",
        "📅 Period: All time",
        "",
        "Sunset Cruise",
        "   📊 Reports: 3",
        "   ⛽ Avg. per report: 11.7 L",
        "   🔋 Total: 35 L",
      ].join("\n"),
    );
  });

  it("leaves reports outside the period out of the summary", async () => {
    clock = new Date("2026-01-01T00:00:00Z");
    await store.save(newReport({ liters: 100 }));

    expect(await analytics.summary()).toEqual({ reportCount: 4, totalLiters: 135, averageLitersPerReport: 33.75 });
    expect(await analytics.renderView("summary", "week")).toBe(
      ["📊 Period Summary", "📅 Period: 05.03 — 12.03.2026", "", "🚤 Reports: 3", "⛽ Total fuel: 35 L", "📊 Avg. per report: 11.7 L"].join(
        "\n",
      ),
    );
  });

  it("names stats exports by kind and date", async () => {
    const file = await analytics.exportFile("boats");
    expect(file.fileName).toBe("boat_statistics_20260312.csv");
    expect(file.content.toString("utf8")).toBe(
      "\uFEFFBoat,Reports,Total Liters,Avg Liters per Report\r\nBreeze,1,5,5\r\nAurora,2,30,15\r\n",
    );
    expect((await analytics.exportFile("reports")).fileName).toBe("fuel_reports_20260312.csv");
  });

  it("builds management reports for a calendar day with a CSV copy", async () => {
    clock = new Date("2026-03-11T15:20:00Z");
    await store.save(newReport({ boat: "Coral", captain: "Oleg", liters: 7.5 }));

    const report = await analytics.managementReport("yesterday");
    expect(report.text).toBe(
      [
        "📊 Yesterday's Fuel Report",
        "📅 Period: 11.03.2026",
        "",
        "1. 11.03 15:20 Coral | Oleg | Sunset Cruise | 7.5 L",
        "",
        "🚤 By boat:",
        "Coral — 1 report, 7.5 L",
        "",
        "👨‍✈️ By captain:",
        "Oleg — 1 report, 7.5 L",
        "",
        "TOTAL: 1 report, 7.5 L",
      ].join("\n"),
    );
    expect(report.file.fileName).toBe("yesterday_report_20260312.csv");

    expect((await analytics.managementReport("daily")).text.split("\n").slice(1)).toEqual([
      "📅 Period: 12.03.2026",
      "",
      "No reports for this period.",
    ]);
    const weekly = (await analytics.managementReport("weekly")).text.split("\n");
    expect(weekly[weekly.length - 1]).toBe("TOTAL: 4 reports, 42.5 L");
  });
});
