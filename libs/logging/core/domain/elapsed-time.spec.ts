import { formatElapsedTime } from "./elapsed-time";

describe("formatElapsedTime", () => {
  it("should show seconds only under a minute", () => {
    expect(formatElapsedTime(1.234)).toBe("1.23 second(s)");
  });

  it("should split out whole minutes", () => {
    expect(formatElapsedTime(125.5)).toBe("2 minute(s) and 5.50 second(s)");
  });

  it("should honour the requested precision", () => {
    expect(formatElapsedTime(0.5, 4)).toBe("0.5000 second(s)");
  });
});
