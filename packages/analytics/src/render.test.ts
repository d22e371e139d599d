import { describe, expect, it } from "vitest";

import { resolvePeriod } from "./period.js";
import { formatProgram, renderAggregateView, renderEfficiencyRanking, renderSummary } from "./render.js";

const allTime = resolvePeriod("all");

describe("renderAggregateView", () => {
  it("lists rows with medals", () => {
    const text = renderAggregateView(
      [
        { key: "BoatA", totalLiters: 30, reportCount: 2, averageLitersPerReport: 15 },
        { key: "BoatB", totalLiters: 5, reportCount: 1, averageLitersPerReport: 5 },
      ],
      { title: "🚤 Boat Analytics", period: allTime, medals: true },
    );
    expect(text).toBe(
      [
        "🚤 Boat Analytics",
        "📅 Period: All time",
        "",
        "🥇 BoatA",
        "   📊 Reports: 2",
        "   ⛽ Avg. per report: 15 L",
        "   🔋 Total: 30 L",
        "🥈 BoatB",
        "   📊 Reports: 1",
        "   ⛽ Avg. per report: 5 L",
        "   🔋 Total: 5 L",
      ].join("\n"),
    );
  });

  it("says so when there is no data", () => {
    expect(renderAggregateView([], { title: "🏝 Programs", period: allTime })).toBe(
      "🏝 Programs\n📅 Period: All time\n\nNo data for selected period.",
    );
  });
});

describe("renderSummary", () => {
  it("rounds liters to one decimal", () => {
    expect(renderSummary({ reportCount: 3, totalLiters: 35, averageLitersPerReport: 35 / 3 }, allTime)).toBe(
      "📊 Period Summary\n📅 Period: All time\n\n🚤 Reports: 3\n⛽ Total fuel: 35 L\n📊 Avg. per report: 11.7 L",
    );
  });
});

describe("renderEfficiencyRanking", () => {
  it("omits the efficient captains block when nobody qualifies", () => {
    const text = renderEfficiencyRanking(
      {
        boats: [{ key: "BoatB", totalLiters: 5, reportCount: 1, averageLitersPerReport: 5 }],
        activeCaptains: [{ key: "Petr", totalLiters: 5, reportCount: 1, averageLitersPerReport: 5 }],
        efficientCaptains: [],
      },
      allTime,
    );
    expect(text).toBe(
      [
        "🏆 Efficiency Ranking",
        "📅 Period: All time",
        "",
        "🚤 Most efficient boats:",
        "🥇 BoatB — 5 L/report",
        "",
        "👨‍✈️ Most active captains:",
        "🥇 Petr — 1 report",
      ].join("\n"),
    );
  });
});

describe("formatProgram", () => {
  it("appends the private route", () => {
    expect(formatProgram({ program: "N/A", privateRoute: "Sunset" })).toBe("N/A → Sunset");
    expect(formatProgram({ program: "Island Hopping", privateRoute: null })).toBe("Island Hopping");
  });
});
