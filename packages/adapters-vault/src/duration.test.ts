import { parseDurationSeconds } from "./duration";

describe("parseDurationSeconds", () => {
  it("passes numbers through", () => {
    expect(parseDurationSeconds(61)).toBe(61);
  });

  it("parses plain and suffixed seconds", () => {
    expect(parseDurationSeconds("61")).toBe(61);
    expect(parseDurationSeconds("61s")).toBe(61);
  });

  it("parses compound durations", () => {
    expect(parseDurationSeconds("1m1s")).toBe(61);
    expect(parseDurationSeconds("1h30m")).toBe(5400);
  });

  it("rejects unknown formats", () => {
    expect(() => parseDurationSeconds("1d")).toThrow('Invalid duration: "1d"');
    expect(() => parseDurationSeconds("61sx")).toThrow('Invalid duration: "61sx"');
  });
});
