// backend/services/shared/test/params.spec.ts
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { param, withDefault } from "@shared/http/params";
import { toFieldErrors } from "@shared/http/errors";

function codesOf(result: z.SafeParseReturnType<unknown, unknown>): string[] {
  return result.success ? [] : toFieldErrors("query", result.error.issues).map((e) => e.code);
}

describe("param.int", () => {
  it.each([
    ["42", 42],
    ["+5", 5],
    ["-12", -12],
    ["9007199254740991", Number.MAX_SAFE_INTEGER],
  ])("parses %s", (raw, expected) => {
    expect(param.int().parse(raw)).toBe(expected);
  });

  it.each(["", "abc", "1.5", "1e3", " 4", "0x10"])("rejects %j", (raw) => {
    expect(codesOf(param.int().safeParse(raw))).toEqual(["int_parsing"]);
  });

  it("rejects integers past the safe range", () => {
    expect(codesOf(param.int().safeParse("9007199254740992"))).toEqual(["int_range"]);
  });
});

describe("param.bool", () => {
  it.each([
    ["true", true],
    ["YES", true],
    ["1", true],
    ["on", true],
    ["false", false],
    ["No", false],
    ["0", false],
    ["off", false],
  ])("parses %s", (raw, expected) => {
    expect(param.bool().parse(raw)).toBe(expected);
  });

  it("rejects other words", () => {
    expect(codesOf(param.bool().safeParse("maybe"))).toEqual(["bool_parsing"]);
  });
});

describe("param.str / enumOf / withDefault", () => {
  it("enforces a minimum length", () => {
    expect(param.str({ minLength: 3 }).safeParse("ab").success).toBe(false);
    expect(param.str({ minLength: 3 }).parse("abc")).toBe("abc");
  });

  it("matches enum literals exactly", () => {
    const kind = param.enumOf(["red", "green"]);
    expect(kind.parse("red")).toBe("red");
    expect(codesOf(kind.safeParse("Red"))).toEqual(["invalid_enum_value"]);
  });

  it("fills in the default only when absent", () => {
    const page = withDefault(param.int(), 1);
    expect(page.parse(undefined)).toBe(1);
    expect(page.parse("7")).toBe(7);
    expect(page.safeParse("x").success).toBe(false);
  });
});
