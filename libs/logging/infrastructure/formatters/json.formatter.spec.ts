import { LogRecord } from "@logging/domain";
import { JsonFormatter, parseTokenValue } from "./json.formatter";

function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    level: "info",
    message: "hello",
    timestamp: "2024-01-01 10:00:00",
    logger: "ReportsService",
    context: { request_id: "req-1" },
    ...overrides,
  };
}

describe("JsonFormatter", () => {
  const formatter = new JsonFormatter("{level} | {context} | {message}");

  it("should promote key=value tokens with their parsed types", () => {
    const output = JSON.parse(
      formatter.render(makeRecord({ message: "user_id=123 action=login is_active=True" })),
    );

    expect(output).toEqual({
      level: "info",
      context: { request_id: "req-1" },
      user_id: 123,
      action: "login",
      is_active: true,
      message: "",
    });
  });

  it("should parse bracketed literals into objects and arrays", () => {
    const output = JSON.parse(
      formatter.render(
        makeRecord({
          message: "filters={'status': 'draft', 'limit': 5} ids=[1, 2] pair=(3, 4) flag=FALSE ratio=0.5",
        }),
      ),
    );

    expect(output.filters).toEqual({ status: "draft", limit: 5 });
    expect(output.ids).toEqual([1, 2]);
    expect(output.pair).toEqual([3, 4]);
    expect(output.flag).toBe(false);
    expect(output.ratio).toBe(0.5);
    expect(output.message).toBe("");
  });

  it("should flatten the remaining message onto one line", () => {
    const output = JSON.parse(
      formatter.render(makeRecord({ message: "Export done\n\tformat=csv rows=120" })),
    );

    expect(output.message).toBe("Export done");
    expect(output.format).toBe("csv");
    expect(output.rows).toBe(120);
  });

  it("should replace newlines and tabs inside the message with spaces", () => {
    const output = JSON.parse(formatter.render(makeRecord({ message: "first\nsecond\tthird" })));

    expect(output.message).toBe("first second third");
  });

  it("should put the exception last and only when present", () => {
    const withStack = JSON.parse(
      formatter.render(makeRecord({ stack: "Error: boom\n    at run (job.ts:1:1)" })),
    );
    const withoutStack = JSON.parse(formatter.render(makeRecord()));

    expect(Object.keys(withStack).pop()).toBe("exception");
    expect(withStack.exception).toBe("Error: boom\n    at run (job.ts:1:1)");
    expect(withoutStack).not.toHaveProperty("exception");
  });

  it("should drop fields the record does not carry", () => {
    const output = JSON.parse(
      new JsonFormatter("{level} | {filename} | {message}").render(makeRecord()),
    );

    expect(output).toEqual({ level: "info", message: "hello" });
  });

  it("should stringify values nested in declared fields", () => {
    const output = JSON.parse(
      formatter.render(makeRecord({ context: { request_id: "req-1", attempt: 2, tags: ["a", 1] } })),
    );

    expect(output.context).toEqual({ request_id: "req-1", attempt: "2", tags: ["a", "1"] });
  });

  it("should indent the output by two spaces", () => {
    expect(new JsonFormatter("{level} | {message}").render(makeRecord())).toBe(
      '{\n  "level": "info",\n  "message": "hello"\n}',
    );
  });

  it("should write the message after every other key with the default preset", () => {
    const output = JSON.parse(
      new JsonFormatter(1).render(makeRecord({ message: "exported user_id=7" })),
    );

    expect(Object.keys(output)).toEqual([
      "level",
      "timestamp",
      "logger",
      "context",
      "user_id",
      "message",
    ]);
    expect(output.user_id).toBe(7);
    expect(output.message).toBe("exported");
  });

  it("should accept a preset number instead of a template", () => {
    expect(new JsonFormatter(3).fields).toEqual(["level", "context", "message"]);
  });
});

describe("parseTokenValue", () => {
  it.each<[string, unknown]>([
    ["True", true],
    ["false", false],
    ["42", 42],
    ["-1.5e3", -1500],
    ["9007199254740991", 9007199254740991],
    ["12345678901234567890", "12345678901234567890"],
    ["[1, 2]", [1, 2]],
    ["(1,)", [1]],
    ["{'nested': {'ok': True}}", { nested: { ok: true } }],
    ["{broken", "{broken"],
    ["login", "login"],
  ])("should parse %s", (raw, expected) => {
    expect(parseTokenValue(raw)).toEqual(expected);
  });
});
