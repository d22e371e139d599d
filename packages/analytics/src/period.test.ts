import { describe, expect, it } from "vitest";

import { inRange, isPeriodCode, resolvePeriod } from "./period.js";

const now = new Date("2026-10-18T12:00:00Z");

describe("resolvePeriod", () => {
  it("covers the last 7 days for week", () => {
    const p = resolvePeriod("week", now);
    expect(p.range.from?.toISOString()).toBe("2026-10-11T12:00:00.000Z");
    expect(p.range.to).toBeUndefined();
    expect(p.label).toBe("11.10 — 18.10.2026");
  });

  it("starts this_month at the first of the month (UTC)", () => {
    expect(resolvePeriod("this_month", now).range.from?.toISOString()).toBe("2026-10-01T00:00:00.000Z");
  });

  it("uses 30 and 90 day windows", () => {
    expect(resolvePeriod("month", now).range.from?.toISOString()).toBe("2026-09-18T12:00:00.000Z");
    expect(resolvePeriod("3months", now).range.from?.toISOString()).toBe("2026-07-20T12:00:00.000Z");
  });

  it("covers the current UTC day for today", () => {
    const p = resolvePeriod("today", now);
    expect(p.range.from?.toISOString()).toBe("2026-10-18T00:00:00.000Z");
    expect(p.range.to).toBeUndefined();
    expect(p.label).toBe("18.10.2026");
  });

  it("bounds yesterday by both midnights", () => {
    const p = resolvePeriod("yesterday", new Date("2026-11-01T00:30:00Z"));
    expect(p.range.from?.toISOString()).toBe("2026-10-31T00:00:00.000Z");
    expect(p.range.to?.toISOString()).toBe("2026-11-01T00:00:00.000Z");
    expect(p.label).toBe("31.10.2026");
  });

  it("leaves all unbounded", () => {
    expect(resolvePeriod("all", now)).toEqual({ code: "all", range: {}, label: "All time" });
  });
});

describe("inRange", () => {
  it("treats from as inclusive and to as exclusive", () => {
    const from = new Date("2026-10-01T00:00:00Z");
    const to = new Date("2026-10-02T00:00:00Z");
    expect(inRange(from, { from, to })).toBe(true);
    expect(inRange(to, { from, to })).toBe(false);
    expect(inRange(new Date("2026-09-30T23:59:59Z"), { from })).toBe(false);
    expect(inRange(new Date("2020-01-01T00:00:00Z"), {})).toBe(true);
  });
});

describe("isPeriodCode", () => {
  it("accepts known codes only", () => {
    expect(isPeriodCode("3months")).toBe(true);
    expect(isPeriodCode("yesterday")).toBe(true);
    expect(isPeriodCode("year")).toBe(false);
  });
});
