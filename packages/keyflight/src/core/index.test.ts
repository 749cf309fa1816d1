/**
 * Tests for core - Result primitives
 */
import { describe, it, expect } from "vitest";
import { err, isErr, isOk, ok, type Result } from ".";

describe("Result Core", () => {
  describe("ok()", () => {
    it("creates an ok result with value", () => {
      expect(ok(42)).toEqual({ ok: true, value: 42 });
    });
  });

  describe("err()", () => {
    it("creates an error result", () => {
      const result = err("something went wrong");
      expect(result).toEqual({ ok: false, error: "something went wrong" });
      expect("cause" in result).toBe(false);
    });

    it("preserves cause when provided", () => {
      const cause = new Error("original");
      expect(err("wrapped", { cause })).toEqual({
        ok: false,
        error: "wrapped",
        cause,
      });
    });
  });

  describe("isOk() / isErr() type guards", () => {
    it("narrows type correctly for ok", () => {
      const result: Result<number, string> = ok(42);

      expect(isErr(result)).toBe(false);
      if (isOk(result)) {
        const num: number = result.value;
        expect(num).toBe(42);
      }
    });

    it("narrows type correctly for err", () => {
      const result: Result<number, string> = err("failed");

      expect(isOk(result)).toBe(false);
      if (isErr(result)) {
        const msg: string = result.error;
        expect(msg).toBe("failed");
      }
    });
  });
});
