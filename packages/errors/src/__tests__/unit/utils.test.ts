import { describe, expect, it } from "vitest";
import {
  ExportTimeoutError,
  getErrorMessage,
  InternalError,
  toError,
  wrapError,
} from "../../index.js";

describe("wrapError", () => {
  it("should return TelexErrors unchanged", () => {
    const error = new ExportTimeoutError("t", 10);
    expect(wrapError(error)).toBe(error);
  });

  it("should wrap plain errors in InternalError", () => {
    const original = new TypeError("bad value");
    const wrapped = wrapError(original, "trace-1");

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("bad value");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-1");
    expect(wrapped.cause).toBe(original);
  });

  it("should wrap strings and unknown values", () => {
    expect(wrapError("boom").message).toBe("boom");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("should extract messages", () => {
    expect(getErrorMessage(new Error("x"))).toBe("x");
    expect(getErrorMessage("y")).toBe("y");
    expect(getErrorMessage({})).toBe("An unknown error occurred");
  });
});

describe("toError", () => {
  it("should keep errors and convert the rest", () => {
    const error = new Error("z");
    expect(toError(error)).toBe(error);
    expect(toError("z").message).toBe("z");
  });
});
