import type { Report } from "@fleetfuel/core";

import type { ReportStore } from "../store/reportStore.js";

export const DEFAULT_HISTORY_LIMIT = 10;

export class HistoryReader {
  constructor(
    private readonly store: ReportStore,
    private readonly defaultLimit = DEFAULT_HISTORY_LIMIT,
  ) {}

  /** Newest first. */
  recentReports(limit = this.defaultLimit): Promise<Report[]> {
    return this.store.recent(limit);
  }

  userReports(userId: string, limit = this.defaultLimit): Promise<Report[]> {
    return this.store.recent(limit, { userId });
  }
}
