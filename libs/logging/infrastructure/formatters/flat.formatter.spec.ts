import { LogRecord } from "@logging/domain";
import { FlatFormatter } from "./flat.formatter";

function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    level: "info",
    message: "hello",
    logger: "ReportsService",
    context: { request_id: "req-1" },
    ...overrides,
  };
}

describe("FlatFormatter", () => {
  it("should render field='value' tokens in template order with the message last", () => {
    const formatter = new FlatFormatter("{level} | {logger} | {message} | {context}");

    expect(formatter.render(makeRecord())).toBe(
      `level='info' logger='ReportsService' context='{"request_id":"req-1"}' message='hello'`,
    );
  });

  it("should put the message last with the default preset", () => {
    const record = makeRecord({ message: "exported user_id=7", timestamp: "2024-01-01 10:00:00" });

    expect(new FlatFormatter(1).render(record)).toBe(
      "level='info' timestamp='2024-01-01 10:00:00' logger='ReportsService' " +
        `context='{"request_id":"req-1"}' message='exported user_id=7'`,
    );
  });

  it("should leave the message out when the template does not name it", () => {
    expect(new FlatFormatter("{level} | {logger}").render(makeRecord())).toBe(
      "level='info' logger='ReportsService'",
    );
  });

  it("should render an empty context as an empty value", () => {
    const formatter = new FlatFormatter("{level} | {context}");

    expect(formatter.render(makeRecord({ context: {} }))).toBe("level='info' context=''");
  });

  it("should leave out fields the record does not carry", () => {
    expect(new FlatFormatter("{level} | {filename}").render(makeRecord())).toBe("level='info'");
  });

  it("should append the exception when present", () => {
    expect(new FlatFormatter("{level}").render(makeRecord({ stack: "Error: boom" }))).toBe(
      "level='info' exception='Error: boom'",
    );
  });
});
