import { InMemoryQueryLog } from "./in-memory.query-log";

describe("InMemoryQueryLog", () => {
  it("should return the statements recorded after a sampled count", () => {
    const queryLog = new InMemoryQueryLog();
    queryLog.record({ time: 0.1, statement: "SELECT 0" });
    const sample = queryLog.count();

    queryLog.record({ time: 0.2, statement: "SELECT 1" });
    queryLog.record({ time: 0.3, statement: "SELECT 2" });

    expect(sample).toBe(1);
    expect(queryLog.since(sample)).toEqual([
      { time: 0.2, statement: "SELECT 1" },
      { time: 0.3, statement: "SELECT 2" },
    ]);
    expect(queryLog.since(queryLog.count())).toEqual([]);
  });

  it("should keep counting past its capacity and skip evicted entries", () => {
    const queryLog = new InMemoryQueryLog(2);
    for (let i = 0; i < 4; i++) {
      queryLog.record({ time: 0, statement: `SELECT ${i}` });
    }

    expect(queryLog.count()).toBe(4);
    expect(queryLog.since(0).map((query) => query.statement)).toEqual(["SELECT 2", "SELECT 3"]);
    expect(queryLog.since(3).map((query) => query.statement)).toEqual(["SELECT 3"]);
  });
});
