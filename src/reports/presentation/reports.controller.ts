import { Controller, Get, Param, Query, StreamableFile } from "@nestjs/common";
import { Readable } from "stream";
import { NoLog } from "@logging";
import { Report, ReportQuery, ReportSummary } from "../core/dtos";
import { ReportsService } from "../service/reports.service";

@Controller("reports")
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get()
  list(@Query() query: ReportQuery): Promise<Report[]> {
    return this.reportsService.list(query.status, query.limit);
  }

  @Get("summary")
  summary(): Promise<ReportSummary> {
    return this.reportsService.summarize();
  }

  @Get("health")
  @NoLog()
  health() {
    return { status: "ok" };
  }

  @Get(":id")
  get(@Param("id") id: string): Promise<Report> {
    return this.reportsService.get(id);
  }

  @Get(":id/export")
  async export(@Param("id") id: string): Promise<StreamableFile> {
    // Fail with 404 before any bytes are sent.
    await this.reportsService.get(id);
    return new StreamableFile(Readable.from(this.reportsService.exportCsv(id)), {
      type: "text/csv",
      disposition: `attachment; filename="${id}.csv"`,
    });
  }
}
