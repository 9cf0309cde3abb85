import {
  LOG_FORMAT_OPTIONS,
  isValidFieldTemplate,
  parseFieldTemplate,
  renderFieldTemplate,
  resolveFieldTemplate,
} from "./field-template";

describe("field templates", () => {
  it("should list the placeholders in order", () => {
    expect(parseFieldTemplate("{level} | {timestamp} | {context} | {message}")).toEqual([
      "level",
      "timestamp",
      "context",
      "message",
    ]);
  });

  it("should resolve preset numbers given as numbers or digit strings", () => {
    expect(resolveFieldTemplate(3)).toBe("{level} | {context} | {message}");
    expect(resolveFieldTemplate(" 3 ")).toBe(LOG_FORMAT_OPTIONS[3]);
    expect(resolveFieldTemplate(42)).toBe("");
  });

  it("should keep a custom template as written", () => {
    expect(resolveFieldTemplate("[{level}] {message}")).toBe("[{level}] {message}");
  });

  it("should accept only templates naming at least one field", () => {
    expect(isValidFieldTemplate("{message}")).toBe(true);
    expect(isValidFieldTemplate(10)).toBe(true);
    expect(isValidFieldTemplate("plain text")).toBe(false);
    expect(isValidFieldTemplate(0)).toBe(false);
  });

  it("should substitute every placeholder", () => {
    expect(renderFieldTemplate("{level}: {message} ({level})", (field) => field.toUpperCase())).toBe(
      "LEVEL: MESSAGE (LEVEL)",
    );
  });
});
