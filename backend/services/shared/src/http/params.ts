// backend/services/shared/src/http/params.ts

/**
 * Parameter kinds for path/query/header/cookie descriptor tables.
 *
 * Raw values off the wire are always strings; each kind coerces (or rejects)
 * a string. Body fields use plain zod types instead, since JSON is typed.
 */

import { z } from "zod";

const INTEGER_RE = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

function int() {
  return z.string().transform((raw, ctx) => {
    if (!INTEGER_RE.test(raw)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Input should be a valid integer",
        params: { code: "int_parsing" },
      });
      return z.NEVER;
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Integer is outside the safe range",
        params: { code: "int_range" },
      });
      return z.NEVER;
    }
    return value;
  });
}

function bool() {
  return z.string().transform((raw, ctx) => {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Input should be a valid boolean",
      params: { code: "bool_parsing" },
    });
    return z.NEVER;
  });
}

function str(opts: { minLength?: number } = {}) {
  const base = z.string();
  return opts.minLength === undefined ? base : base.min(opts.minLength);
}

/** Closed literal set; matched by exact, case-sensitive value. */
const enumOf = z.enum;

export const param = { int, bool, str, enumOf };

/** Optional parameter that falls back to `fallback` when absent. */
export function withDefault<T extends z.ZodTypeAny>(
  schema: T,
  fallback: z.output<T>
) {
  return schema
    .optional()
    .transform((v: z.output<T> | undefined): z.output<T> => v ?? fallback);
}
