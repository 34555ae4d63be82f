import { loadConfig } from "@keyturn/core";
import type { Services } from "../context";
import { runVerify } from "./verify";

const mockSpinner = {
  text: "",
  start: jest.fn(),
  succeed: jest.fn(),
  fail: jest.fn(),
  clear: jest.fn(),
  render: jest.fn(),
};
mockSpinner.start.mockReturnValue(mockSpinner);

jest.mock("ora", () => jest.fn(() => mockSpinner));

describe("runVerify", () => {
  const config = loadConfig({ env: {} });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("stops the spinner when the check aborts unexpectedly", async () => {
    const services = {
      secrets: { readStaticCredentials: jest.fn().mockResolvedValue(undefined) },
      compute: { listInstances: jest.fn() },
    } as unknown as Services;

    await expect(runVerify(config, services)).rejects.toThrow(TypeError);

    expect(mockSpinner.fail).toHaveBeenCalledWith("Rotation check aborted");
    expect(mockSpinner.succeed).not.toHaveBeenCalled();
  });
});
