import { maskAccessKeyId, redactSecret } from "./redact";

describe("maskAccessKeyId", () => {
  it("keeps the first and last four characters", () => {
    expect(maskAccessKeyId("AKIAEXAMPLE1234WXYZ")).toBe("AKIA****WXYZ");
  });

  it("fully masks short ids", () => {
    expect(maskAccessKeyId("AKIA1234")).toBe("****");
  });
});

describe("redactSecret", () => {
  it("replaces a value with the placeholder", () => {
    expect(redactSecret("test-secret")).toBe("<sensitive>");
  });

  it("returns an empty string for missing values", () => {
    expect(redactSecret(undefined)).toBe("");
    expect(redactSecret("")).toBe("");
  });
});
