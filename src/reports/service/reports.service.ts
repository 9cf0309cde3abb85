import { Injectable, Logger, NotFoundException } from "@nestjs/common";
import { TrackExecution } from "@logging";
import { Report, ReportStatus, ReportSummary } from "../core/dtos";
import { ReportsOutPort } from "../core/ports/out";

@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(private readonly reports: ReportsOutPort) {}

  async list(status?: ReportStatus, limit?: number): Promise<Report[]> {
    const reports = await this.reports.findAll(status);
    this.logger.log(
      `Listed reports status=${status ?? "any"} count=${reports.length}`,
    );
    return limit === undefined ? reports : reports.slice(0, limit);
  }

  async get(id: string): Promise<Report> {
    const report = await this.reports.findById(id);
    if (!report) {
      this.logger.warn(`Report not found report_id=${id}`);
      throw new NotFoundException(`Report ${id} not found`);
    }
    return report;
  }

  @TrackExecution({ logQueries: true, queryThreshold: 3, queryExceedWarning: true })
  async summarize(): Promise<ReportSummary> {
    const reports = await this.reports.findAll();
    const byStatus: Record<ReportStatus, number> = {
      draft: 0,
      published: 0,
      archived: 0,
    };
    let rows = 0;
    for (const report of reports) {
      byStatus[report.status] += 1;
      rows += report.rows;
    }
    return { total: reports.length, rows, byStatus };
  }

  /**
   * CSV export of one report, produced line by line.
   */
  async *exportCsv(id: string): AsyncGenerator<string> {
    const report = await this.get(id);
    this.logger.log(`Exporting report report_id=${report.id} format=csv`);

    yield "line,report_id,title\n";
    for (let line = 1; line <= report.rows; line++) {
      yield `${line},${report.id},${report.title}\n`;
    }
  }
}
