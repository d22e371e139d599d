import type { DateRange, NewReport, Report } from "@fleetfuel/core";

export type ReportFilter = DateRange & {
  boat?: string;
  captain?: string;
  program?: string;
  userId?: string;
};

/** Append-only. Reports are never updated or deleted through this interface. */
export interface ReportStore {
  /** Assigns id and createdAt. Rejects with StorageError when the write fails. */
  save(report: NewReport): Promise<Report>;
  /** Oldest first. */
  query(filter?: ReportFilter): Promise<Report[]>;
  /** Newest first. */
  recent(limit: number, filter?: Pick<ReportFilter, "userId">): Promise<Report[]>;
  close(): Promise<void>;
}
