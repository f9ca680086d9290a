import { describe, it, expect } from "vitest";
import {
  Ok,
  Err,
  map,
  mapErr,
  unwrapOr,
  toError,
  tryCatch,
  tryCatchAsync,
  type Result,
} from "../src/result.js";

describe("Result", () => {
  describe("Ok / Err", () => {
    it("creates a successful result", () => {
      const result = Ok([1, 2]);
      expect(result).toEqual({ ok: true, value: [1, 2] });
    });

    it("creates a failed result", () => {
      const error = new Error("parse failed");
      const result = Err(error);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(error);
      }
    });
  });

  describe("map", () => {
    it("transforms the value of an Ok", () => {
      const result: Result<number, string> = Ok(2);
      expect(map(result, (n) => n * 10)).toEqual({ ok: true, value: 20 });
    });

    it("passes an Err through untouched", () => {
      const result: Result<number, string> = Err("boom");
      expect(map(result, (n) => n * 10)).toEqual({ ok: false, error: "boom" });
    });
  });

  describe("mapErr", () => {
    it("wraps the error of an Err", () => {
      const result: Result<number, Error> = Err(new Error("bad token"));
      const mapped = mapErr(result, (e) => new Error(`new side: ${e.message}`));
      expect(mapped.ok).toBe(false);
      if (!mapped.ok) {
        expect(mapped.error.message).toBe("new side: bad token");
      }
    });

    it("leaves an Ok alone", () => {
      const result: Result<number, Error> = Ok(7);
      expect(mapErr(result, () => "unused")).toEqual({ ok: true, value: 7 });
    });
  });

  describe("unwrapOr", () => {
    it("returns the value of an Ok", () => {
      expect(unwrapOr(Ok(["a"]), [])).toEqual(["a"]);
    });

    it("returns the default for an Err", () => {
      const result: Result<string[], Error> = Err(new Error("x"));
      expect(unwrapOr(result, [])).toEqual([]);
    });
  });

  describe("toError", () => {
    it("keeps Error instances", () => {
      const error = new TypeError("nope");
      expect(toError(error)).toBe(error);
    });

    it("wraps other thrown values", () => {
      expect(toError("plain string").message).toBe("plain string");
      expect(toError(42).message).toBe("42");
    });
  });

  describe("tryCatch", () => {
    it("captures the return value", () => {
      expect(tryCatch(() => "fine")).toEqual({ ok: true, value: "fine" });
    });

    it("captures a thrown error", () => {
      const result = tryCatch(() => {
        throw new Error("grammar missing");
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("grammar missing");
      }
    });
  });

  describe("tryCatchAsync", () => {
    it("captures a resolved value", async () => {
      const result = await tryCatchAsync(async () => 3);
      expect(result).toEqual({ ok: true, value: 3 });
    });

    it("captures a rejection with a non-Error value", async () => {
      const result = await tryCatchAsync(() => Promise.reject("offline"));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(Error);
        expect(result.error.message).toBe("offline");
      }
    });
  });
});
