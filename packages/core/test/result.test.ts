import { describe, it, expect } from "vitest";
import {
  Ok,
  Err,
  isOk,
  isErr,
  map,
  andThen,
  unwrapOr,
  unwrap,
  errorMessage,
  tryCatch,
  type Result,
} from "../src/result.js";

describe("Result", () => {
  describe("Ok / Err", () => {
    it("creates a successful result", () => {
      const result = Ok(42);
      expect(result.ok).toBe(true);
      expect(result.value).toBe(42);
    });

    it("creates an error result", () => {
      const result = Err("failed");
      expect(result.ok).toBe(false);
      expect(result.error).toBe("failed");
    });
  });

  describe("guards", () => {
    it("isOk narrows to the value", () => {
      const result: Result<number, string> = Ok(7);
      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value).toBe(7);
      }
    });

    it("isErr narrows to the error", () => {
      const result: Result<number, string> = Err("nope");
      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBe("nope");
      }
    });
  });

  describe("map", () => {
    it("transforms Ok values", () => {
      expect(map(Ok(2), (n) => n * 3)).toEqual(Ok(6));
    });

    it("passes Err through untouched", () => {
      const result: Result<number, string> = Err("bad");
      expect(map(result, (n) => n * 3)).toEqual(Err("bad"));
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    it("chains successful steps", () => {
      expect(andThen(andThen(Ok(8), half), half)).toEqual(Ok(2));
    });

    it("stops at the first error", () => {
      expect(andThen(andThen(Ok(6), half), half)).toEqual(Err("3 is odd"));
    });
  });

  describe("unwrap helpers", () => {
    it("unwrapOr returns the default for Err", () => {
      const result: Result<number, string> = Err("x");
      expect(unwrapOr(result, 5)).toBe(5);
      expect(unwrapOr(Ok(1), 5)).toBe(1);
    });

    it("unwrap throws string errors wrapped in Error", () => {
      expect(() => unwrap(Err("broken"))).toThrow("broken");
    });

    it("unwrap rethrows Error instances as-is", () => {
      const error = new RangeError("out of range");
      expect(() => unwrap(Err(error))).toThrow(error);
    });
  });

  describe("errorMessage", () => {
    it("reads Error messages", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    it("stringifies everything else", () => {
      expect(errorMessage(404)).toBe("404");
    });
  });

  describe("tryCatch", () => {
    it("captures return values", () => {
      expect(tryCatch(() => "fine")).toEqual(Ok("fine"));
    });

    it("captures thrown errors as messages", () => {
      expect(
        tryCatch(() => {
          throw new Error("exploded");
        })
      ).toEqual(Err("exploded"));
    });

    it("applies a custom error mapper", () => {
      const result = tryCatch(
        () => {
          throw new TypeError("wrong type");
        },
        (e) => (e instanceof TypeError ? "type" : "other")
      );
      expect(result).toEqual(Err("type"));
    });
  });
});
