import { describe, it, expect } from "vitest";
import { formatError, UNKNOWN_ERROR_MESSAGE } from "./formatError";

describe("formatError", () => {
  it("should return strings as-is", () => {
    expect(formatError("boom")).toBe("boom");
    expect(formatError("")).toBe("");
  });

  it("should use the message of Error instances", () => {
    expect(formatError(new Error("Failed to load posts"))).toBe(
      "Failed to load posts"
    );
    expect(formatError(new TypeError("bad type"))).toBe("bad type");
  });

  it("should fall back to the error name when the message is blank", () => {
    expect(formatError(new RangeError())).toBe("RangeError");
  });

  it("should stringify other values", () => {
    expect(formatError(404)).toBe("404");
    expect(formatError({ toString: () => "custom" })).toBe("custom");
  });

  it("should handle absent values", () => {
    expect(formatError(null)).toBe(UNKNOWN_ERROR_MESSAGE);
    expect(formatError(undefined)).toBe(UNKNOWN_ERROR_MESSAGE);
  });

  it("should survive values that cannot be stringified", () => {
    expect(formatError(Object.create(null))).toBe(UNKNOWN_ERROR_MESSAGE);
  });
});
