import { summarizeQueries } from "./query-record";

describe("summarizeQueries", () => {
  it("should return undefined when no query ran", () => {
    expect(summarizeQueries([])).toBeUndefined();
  });

  it("should number each query with its time to the millisecond", () => {
    expect(
      summarizeQueries([
        { time: 0.0024, statement: "SELECT * FROM reports" },
        { time: 1.25, statement: "UPDATE reports SET status = 'done'" },
      ]),
    ).toBe(
      "2 QUERIES EXECUTED\n" +
        "\t\tQuery1={time: 0.002(s), statement: [SELECT * FROM reports]}\n" +
        "\t\tQuery2={time: 1.250(s), statement: [UPDATE reports SET status = 'done']}\n",
    );
  });
});
