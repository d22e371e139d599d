import { randomUUID } from "node:crypto";

import type { NewReport, Report } from "@fleetfuel/core";
import { inRange } from "@fleetfuel/analytics";

import type { ReportFilter, ReportStore } from "./reportStore.js";

function matches(r: Report, f: ReportFilter): boolean {
  if (f.boat !== undefined && r.boat !== f.boat) return false;
  if (f.captain !== undefined && r.captain !== f.captain) return false;
  if (f.program !== undefined && r.program !== f.program) return false;
  if (f.userId !== undefined && r.userId !== f.userId) return false;
  return inRange(r.createdAt, f);
}

export class MemoryReportStore implements ReportStore {
  private readonly reports: Report[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async save(input: NewReport): Promise<Report> {
    const report: Report = { ...input, id: randomUUID(), createdAt: this.now() };
    this.reports.push(report);
    return { ...report };
  }

  async query(filter: ReportFilter = {}): Promise<Report[]> {
    return this.sorted()
      .filter((r) => matches(r, filter))
      .map((r) => ({ ...r }));
  }

  async recent(limit: number, filter: Pick<ReportFilter, "userId"> = {}): Promise<Report[]> {
    return this.sorted()
      .reverse()
      .filter((r) => matches(r, filter))
      .slice(0, Math.max(0, limit))
      .map((r) => ({ ...r }));
  }

  async close(): Promise<void> {}

  // Stable sort keeps insertion order for equal timestamps.
  private sorted(): Report[] {
    return [...this.reports].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
