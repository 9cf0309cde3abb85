import { Test, TestingModule } from "@nestjs/testing";
import { NotFoundException, StreamableFile } from "@nestjs/common";
import { ReportsService } from "../service/reports.service";
import { ReportsController } from "./reports.controller";

describe("ReportsController", () => {
  let controller: ReportsController;

  const mockReportsService = {
    list: jest.fn(),
    get: jest.fn(),
    summarize: jest.fn(),
    exportCsv: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ReportsController],
      providers: [{ provide: ReportsService, useValue: mockReportsService }],
    }).compile();

    controller = module.get<ReportsController>(ReportsController);
  });

  it("should be defined", () => {
    expect(controller).toBeDefined();
  });

  it("should pass the query filters to the service", async () => {
    mockReportsService.list.mockResolvedValue([]);

    await controller.list({ status: "draft", limit: 5 });

    expect(mockReportsService.list).toHaveBeenCalledWith("draft", 5);
  });

  it("should answer the health check without the service", () => {
    expect(controller.health()).toEqual({ status: "ok" });
  });

  describe("export", () => {
    it("should return the CSV as a downloadable stream", async () => {
      mockReportsService.get.mockResolvedValue({ id: "r-1" });
      mockReportsService.exportCsv.mockImplementation(async function* () {
        yield "line,report_id,title\n";
      });

      const file = await controller.export("r-1");

      expect(file).toBeInstanceOf(StreamableFile);
      expect(file.getHeaders()).toMatchObject({
        type: "text/csv",
        disposition: 'attachment; filename="r-1.csv"',
      });
      const chunks: unknown[] = [];
      for await (const chunk of file.getStream()) {
        chunks.push(chunk);
      }
      expect(chunks).toEqual(["line,report_id,title\n"]);
    });

    it("should fail before streaming when the report is unknown", async () => {
      mockReportsService.get.mockRejectedValue(new NotFoundException("Report r-9 not found"));

      await expect(controller.export("r-9")).rejects.toThrow(NotFoundException);
      expect(mockReportsService.exportCsv).not.toHaveBeenCalled();
    });
  });
});
