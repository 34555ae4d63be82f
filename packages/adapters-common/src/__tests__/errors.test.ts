import {
  KeyturnError,
  KeyturnErrorCode,
  EndpointUnreachableError,
  AuthenticationError,
  ConfigError,
} from "../errors";

describe("KeyturnError", () => {
  it("extends Error", () => {
    const error = new KeyturnError("test error", KeyturnErrorCode.REQUEST_FAILED);
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(KeyturnError);
  });

  it("has correct name", () => {
    const error = new KeyturnError("test", KeyturnErrorCode.NOT_FOUND);
    expect(error.name).toBe("KeyturnError");
  });

  it("stores message, code and cause", () => {
    const cause = new Error("root cause");
    const error = new KeyturnError("something failed", KeyturnErrorCode.INVALID_RESPONSE, { cause });
    expect(error.message).toBe("something failed");
    expect(error.code).toBe(KeyturnErrorCode.INVALID_RESPONSE);
    expect(error.cause).toBe(cause);
  });
});

describe("EndpointUnreachableError", () => {
  it("extends KeyturnError", () => {
    const error = new EndpointUnreachableError("http://127.0.0.1:8200");
    expect(error).toBeInstanceOf(KeyturnError);
    expect(error.name).toBe("EndpointUnreachableError");
  });

  it("uses ENDPOINT_UNREACHABLE code and keeps the endpoint", () => {
    const error = new EndpointUnreachableError("http://localhost:4566");
    expect(error.code).toBe(KeyturnErrorCode.ENDPOINT_UNREACHABLE);
    expect(error.endpoint).toBe("http://localhost:4566");
    expect(error.message).toBe("Endpoint http://localhost:4566 is unreachable");
  });

  it("appends the cause message", () => {
    const error = new EndpointUnreachableError("http://localhost:4566", {
      cause: new Error("connect ECONNREFUSED"),
    });
    expect(error.message).toBe("Endpoint http://localhost:4566 is unreachable: connect ECONNREFUSED");
  });
});

describe("AuthenticationError", () => {
  it("defaults to AUTH_FAILED code", () => {
    const error = new AuthenticationError("The security token included in the request is invalid");
    expect(error).toBeInstanceOf(KeyturnError);
    expect(error.name).toBe("AuthenticationError");
    expect(error.code).toBe(KeyturnErrorCode.AUTH_FAILED);
  });
});

describe("ConfigError", () => {
  it("joins every issue into the message", () => {
    const error = new ConfigError(["safetyMarginSeconds: must be positive", "region: required"]);
    expect(error.code).toBe(KeyturnErrorCode.INVALID_CONFIG);
    expect(error.issues).toHaveLength(2);
    expect(error.message).toBe(
      "Invalid configuration: safetyMarginSeconds: must be positive; region: required",
    );
  });
});
