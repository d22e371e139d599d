import type { NewReport, Report } from "@fleetfuel/core";

import type { Db } from "../db.js";
import { errorMessage, StorageError } from "../errors.js";
import type { ReportFilter, ReportStore } from "./reportStore.js";

type ReportRow = {
  id: string;
  boat: string;
  captain: string;
  program: string;
  private_route: string | null;
  pier: string;
  liters: number;
  odometer_photo_id: string | null;
  receipt_photo_id: string | null;
  user_id: string;
  created_at: Date;
};

function toReport(row: ReportRow): Report {
  return {
    id: row.id,
    boat: row.boat,
    captain: row.captain,
    program: row.program,
    privateRoute: row.private_route,
    pier: row.pier,
    liters: Number(row.liters),
    odometerPhotoId: row.odometer_photo_id,
    receiptPhotoId: row.receipt_photo_id,
    userId: row.user_id,
    createdAt: new Date(row.created_at),
  };
}

export class PostgresReportStore implements ReportStore {
  constructor(private readonly sql: Db) {}

  async save(r: NewReport): Promise<Report> {
    const rows = await this.run("save", () =>
      this.sql<ReportRow[]>`
        INSERT INTO fuel_reports (
          boat, captain, program, private_route, pier, liters,
          odometer_photo_id, receipt_photo_id, user_id
        ) VALUES (
          ${r.boat}, ${r.captain}, ${r.program}, ${r.privateRoute}, ${r.pier}, ${r.liters},
          ${r.odometerPhotoId}, ${r.receiptPhotoId}, ${r.userId}
        )
        RETURNING *
      `,
    );
    const row = rows[0];
    if (!row) throw new StorageError("Insert returned no row");
    return toReport(row);
  }

  async query(f: ReportFilter = {}): Promise<Report[]> {
    const sql = this.sql;
    const rows = await this.run("query", () =>
      sql<ReportRow[]>`
        SELECT * FROM fuel_reports
        WHERE TRUE
          ${f.boat !== undefined ? sql`AND boat = ${f.boat}` : sql``}
          ${f.captain !== undefined ? sql`AND captain = ${f.captain}` : sql``}
          ${f.program !== undefined ? sql`AND program = ${f.program}` : sql``}
          ${f.userId !== undefined ? sql`AND user_id = ${f.userId}` : sql``}
          ${f.from ? sql`AND created_at >= ${f.from}` : sql``}
          ${f.to ? sql`AND created_at < ${f.to}` : sql``}
        ORDER BY created_at ASC, id ASC
      `,
    );
    return rows.map(toReport);
  }

  async recent(limit: number, f: Pick<ReportFilter, "userId"> = {}): Promise<Report[]> {
    const sql = this.sql;
    const rows = await this.run("recent", () =>
      sql<ReportRow[]>`
        SELECT * FROM fuel_reports
        ${f.userId !== undefined ? sql`WHERE user_id = ${f.userId}` : sql``}
        ORDER BY created_at DESC, id DESC
        LIMIT ${Math.max(0, limit)}
      `,
    );
    return rows.map(toReport);
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }

  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new StorageError(`Report store ${op} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
