import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  DELEGATION_FAILURES,
  RelayError,
  isRelayError,
  toFailureReason,
  toRelayError
} from "../src/relay/errors.js";

describe("RelayError", () => {
  it("creates error with code and message", () => {
    const err = new RelayError("CONNECT_FAILED", "Test message");
    expect(err.code).toBe("CONNECT_FAILED");
    expect(err.message).toBe("Test message");
    expect(err.name).toBe("RelayError");
  });

  it("toJSON returns serializable object", () => {
    const err = new RelayError("BAD_REQUEST", "Invalid input", { field: "query" });
    expect(err.toJSON()).toEqual({ code: "BAD_REQUEST", message: "Invalid input", details: { field: "query" } });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new RelayError("INTERNAL", "Something went wrong").toJSON();
    expect("details" in json).toBe(false);
  });
});

describe("isRelayError", () => {
  it("matches by class and optionally by code", () => {
    const err = new RelayError("TIMEOUT", "slow");
    expect(isRelayError(err)).toBe(true);
    expect(isRelayError(err, "TIMEOUT")).toBe(true);
    expect(isRelayError(err, "PROTOCOL_ERROR")).toBe(false);
    expect(isRelayError(new Error("plain"))).toBe(false);
  });
});

describe("toRelayError", () => {
  it("returns RelayError unchanged", () => {
    const original = new RelayError("BACKEND_ABORT", "backend gave up");
    expect(toRelayError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toRelayError(new Error("Something failed"));
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
  });

  it("converts ZodError to BAD_REQUEST with issues", () => {
    const parsed = z.object({ query: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const result = toRelayError(parsed.error);
    expect(result.code).toBe("BAD_REQUEST");
    expect(result.message).toBe("Validation error");
    expect(result.details).toHaveProperty("issues");
  });

  it("handles non-Error values", () => {
    const result = toRelayError("string error");
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Unknown error");
  });
});

describe("toFailureReason", () => {
  it("keeps only kind and message", () => {
    expect(toFailureReason(new RelayError("TIMEOUT", "silent for 5ms", { backendId: "a" }))).toEqual({
      kind: "TIMEOUT",
      message: "silent for 5ms"
    });
  });

  it("lists the delegation failure kinds", () => {
    expect([...DELEGATION_FAILURES].sort()).toEqual(["BACKEND_ABORT", "CONNECT_FAILED", "PROTOCOL_ERROR", "TIMEOUT"]);
  });
});
