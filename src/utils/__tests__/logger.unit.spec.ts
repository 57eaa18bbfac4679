import { formatErrorResponse, SchemaError } from "../error";
import { createLogger, setLogLevel } from "../logger";

describe("createLogger", () => {
  let spy: jest.SpyInstance;

  beforeEach(() => {
    spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    spy.mockRestore();
    setLogLevel("info");
  });

  it("writes scoped lines to stderr with JSON meta", () => {
    createLogger("scoring").warn("Batch flagged", { failed: 2 });
    expect(spy).toHaveBeenCalledWith("[scoring] WARN Batch flagged", '{"failed":2}');
  });

  it("drops lines below the active level", () => {
    const logger = createLogger("scoring");
    logger.debug("hidden");
    setLogLevel("debug");
    logger.debug("shown");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[scoring] DEBUG shown");
  });

  it("is quiet when silenced", () => {
    setLogLevel("silent");
    createLogger("scoring").error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("formatErrorResponse", () => {
  it("keeps the code and details of domain errors", () => {
    const error = new SchemaError("bad", [{ column: "total_spend", reason: "missing value" }]);
    expect(formatErrorResponse(error)).toEqual({
      code: "SCHEMA_ERROR",
      message: "bad",
      details: { issues: [{ column: "total_spend", reason: "missing value" }] }
    });
  });

  it("maps anything else to an internal error", () => {
    expect(formatErrorResponse("plain")).toEqual({
      code: "INTERNAL_ERROR",
      message: "plain"
    });
  });
});
