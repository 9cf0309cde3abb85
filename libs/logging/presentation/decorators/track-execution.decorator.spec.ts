import { Logger } from "@nestjs/common";
import { InMemoryQueryLog } from "@logging/infrastructure";
import { QueryLogRegistry, TrackExecution } from "./track-execution.decorator";

describe("TrackExecution", () => {
  let queryLog: InMemoryQueryLog;
  let log: jest.SpyInstance;
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  class ReportJobs {
    @TrackExecution()
    total(values: number[]): number {
      return values.reduce((sum, value) => sum + value, 0);
    }

    @TrackExecution({ logLevel: "debug" })
    async load(id: string): Promise<string> {
      return `report:${id}`;
    }

    @TrackExecution({ logQueries: true, queryThreshold: 1, queryExceedWarning: true })
    refresh(): void {
      queryLog.record({ time: 0.001, statement: "SELECT 1" });
      queryLog.record({ time: 0.001, statement: "SELECT 2" });
    }

    @TrackExecution()
    async fail(): Promise<void> {
      throw new Error("job failed");
    }
  }

  beforeEach(() => {
    queryLog = new InMemoryQueryLog();
    QueryLogRegistry.register(queryLog);
    log = jest.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
    debug = jest.spyOn(Logger.prototype, "debug").mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    QueryLogRegistry.clear();
    jest.restoreAllMocks();
  });

  it("should return the result of a sync method and log its metrics", () => {
    expect(new ReportJobs().total([1, 2, 3])).toBe(6);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^Performance Metrics for Function: 'ReportJobs\.total'\n {2}Execution Time: 0 minute\(s\) and \d+\.\d{4} second\(s\)$/,
    );
  });

  it("should log async methods at the configured level once they settle", async () => {
    await expect(new ReportJobs().load("r-1")).resolves.toBe("report:r-1");

    expect(log).not.toHaveBeenCalled();
    expect(debug.mock.calls[0][0]).toContain("'ReportJobs.load'");
  });

  it("should count queries and warn above the threshold", () => {
    new ReportJobs().refresh();

    expect(log.mock.calls[0][0]).toContain(
      "\n  Database Queries: 2 queries (exceeds threshold of (1))",
    );
    expect(warn).toHaveBeenCalledWith(
      "Number of database queries (2) exceeded threshold (1) for function 'ReportJobs.refresh'",
    );
  });

  it("should warn that queries are not tracked without a registered log", () => {
    QueryLogRegistry.clear();

    new ReportJobs().refresh();

    expect(log.mock.calls[0][0]).not.toContain("Database Queries");
    expect(warn.mock.calls[0][0]).toContain("Query counting is disabled");
  });

  it("should log and rethrow errors", async () => {
    await expect(new ReportJobs().fail()).rejects.toThrow("job failed");

    expect(error).toHaveBeenCalledWith(
      "Error executing function 'ReportJobs.fail': job failed",
      expect.stringContaining("Error: job failed"),
    );
    expect(log).not.toHaveBeenCalled();
  });

  it("should reject invalid options when the decorator is applied", () => {
    expect(() => TrackExecution({ queryThreshold: -1 })).toThrow(
      "TrackExecution: queryThreshold must be a non-negative integer, got -1",
    );
    expect(() => TrackExecution({ queryThreshold: 1.5 })).toThrow(/non-negative integer/);
  });
});
