import { z } from "zod";

import { parseSource, type Source } from "./candle.js";
import { MAX_PERIOD } from "./errors.js";
import { parseMethodKind, type MethodKind } from "./methods/types.js";

/** Parses one configuration field from its text form. */
export type FieldParser<T> = z.ZodType<T, z.ZodTypeDef, string>;

export type FieldParsers<P> = {
  readonly [K in keyof P]: FieldParser<P[K]>;
};

export type FieldSetCode = "unknown_field" | "invalid_value";

export interface FieldSetSuccess {
  readonly ok: true;
  readonly field: string;
}

export interface FieldSetFailure {
  readonly ok: false;
  readonly code: FieldSetCode;
  readonly indicator: string;
  readonly field: string;
  readonly value: string;
  readonly message: string;
}

export type FieldSetResult = FieldSetSuccess | FieldSetFailure;

/** Validation schema shared by every period, span and smoothing length. */
export const periodSchema = z.number().int().min(1).max(MAX_PERIOD);

/**
 * Non-negative integer up to `MAX_PERIOD`. Zero still parses; the lower
 * bound belongs to validation.
 */
export const periodField: FieldParser<number> = z
  .string()
  .trim()
  .regex(/^\d+$/u, "expected a non-negative integer")
  .transform(Number)
  .pipe(z.number().max(MAX_PERIOD, `expected at most ${MAX_PERIOD}`));

export const numberField: FieldParser<number> = z
  .string()
  .trim()
  .min(1, "expected a number")
  .pipe(z.coerce.number().finite());

export const methodField: FieldParser<MethodKind> = z.string().transform((value, ctx) => {
  const kind = parseMethodKind(value);
  if (kind === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown method "${value}"` });
    return z.NEVER;
  }
  return kind;
});

export const sourceField: FieldParser<Source> = z.string().transform((value, ctx) => {
  const source = parseSource(value);
  if (source === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown source "${value}"` });
    return z.NEVER;
  }
  return source;
});

export const formatIssues = (error: z.ZodError): string[] => {
  return error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });
};
