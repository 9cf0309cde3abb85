import { Injectable } from "@nestjs/common";
import { performance } from "perf_hooks";
import { InMemoryQueryLog, QueryLogPort } from "@logging";
import { Report, ReportStatus } from "../core/dtos";
import { ReportsOutPort } from "../core/ports/out";

const REPORTS: readonly Report[] = [
  { id: "r-1", title: "Weekly signups", status: "published", rows: 120 },
  { id: "r-2", title: "Churn by plan", status: "draft", rows: 48 },
  { id: "r-3", title: "Invoice backlog", status: "published", rows: 310 },
  { id: "r-4", title: "Legacy usage", status: "archived", rows: 12 },
];

/**
 * ReportsOutAdapter - in-memory report table.
 *
 * Each lookup is written to the query log as the statement a SQL-backed
 * store would have run, so request logs show the query summary.
 */
@Injectable()
export class ReportsOutAdapter extends ReportsOutPort {
  constructor(private readonly queryLog: QueryLogPort) {
    super();
  }

  async findAll(status?: ReportStatus): Promise<Report[]> {
    return this.traced(
      status === undefined
        ? "SELECT * FROM reports"
        : `SELECT * FROM reports WHERE status = '${status}'`,
      () => REPORTS.filter((report) => status === undefined || report.status === status),
    );
  }

  async findById(id: string): Promise<Report | undefined> {
    return this.traced(`SELECT * FROM reports WHERE id = '${id}'`, () =>
      REPORTS.find((report) => report.id === id),
    );
  }

  private traced<T>(statement: string, run: () => T): T {
    const start = performance.now();
    const result = run();
    if (this.queryLog instanceof InMemoryQueryLog) {
      this.queryLog.record({
        time: (performance.now() - start) / 1000,
        statement,
      });
    }
    return result;
  }
}
