import { Test, TestingModule } from "@nestjs/testing";
import { Logger, NotFoundException } from "@nestjs/common";
import { InMemoryQueryLog, QueryLogPort } from "@logging";
import { ReportsOutPort } from "../core/ports/out";
import { ReportsOutAdapter } from "../infrastructure/reports.out.adapter";
import { ReportsService } from "./reports.service";

describe("ReportsService", () => {
  let service: ReportsService;
  let queryLog: InMemoryQueryLog;
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    queryLog = new InMemoryQueryLog();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportsService,
        { provide: ReportsOutPort, useClass: ReportsOutAdapter },
        { provide: QueryLogPort, useValue: queryLog },
      ],
    }).compile();

    service = module.get<ReportsService>(ReportsService);
    log = jest.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("list", () => {
    it("should filter by status and log the count", async () => {
      const reports = await service.list("published");

      expect(reports.map((report) => report.id)).toEqual(["r-1", "r-3"]);
      expect(log).toHaveBeenCalledWith("Listed reports status=published count=2");
    });

    it("should apply the limit after counting", async () => {
      const reports = await service.list(undefined, 1);

      expect(reports).toHaveLength(1);
      expect(log).toHaveBeenCalledWith("Listed reports status=any count=4");
    });

    it("should record the lookup in the query log", async () => {
      await service.list("draft");

      expect(queryLog.since(0).map((query) => query.statement)).toEqual([
        "SELECT * FROM reports WHERE status = 'draft'",
      ]);
    });
  });

  describe("get", () => {
    it("should return a known report", async () => {
      await expect(service.get("r-2")).resolves.toMatchObject({ title: "Churn by plan" });
    });

    it("should warn and throw NotFoundException for an unknown id", async () => {
      await expect(service.get("r-9")).rejects.toThrow(NotFoundException);
      expect(warn).toHaveBeenCalledWith("Report not found report_id=r-9");
    });
  });

  describe("summarize", () => {
    it("should total reports and rows by status", async () => {
      await expect(service.summarize()).resolves.toEqual({
        total: 4,
        rows: 490,
        byStatus: { draft: 1, published: 2, archived: 1 },
      });
    });
  });

  describe("exportCsv", () => {
    it("should yield a header and one line per row", async () => {
      const lines: string[] = [];
      for await (const line of service.exportCsv("r-4")) {
        lines.push(line);
      }

      expect(lines).toHaveLength(13);
      expect(lines[0]).toBe("line,report_id,title\n");
      expect(lines[1]).toBe("1,r-4,Legacy usage\n");
      expect(lines[12]).toBe("12,r-4,Legacy usage\n");
    });
  });
});
