import { z } from "zod";

export const METHOD_KINDS = ["sma", "wma", "hma", "ema", "rma", "dema", "tema", "tma"] as const;

/** Closed set of smoothing strategies, chosen once at configuration time. */
export type MethodKind = (typeof METHOD_KINDS)[number];

export const methodKindSchema = z.enum(METHOD_KINDS);

/**
 * A streaming smoothing recurrence: one scalar in, one smoothed scalar out.
 */
export interface Method {
  readonly kind: MethodKind;
  readonly period: number;
  next(input: number): number;
}

const METHOD_ALIASES: Readonly<Record<string, MethodKind>> = {
  wilder: "rma",
  wsma: "rma",
  smma: "rma",
  trima: "tma",
};

/**
 * Resolves a method tag, case-insensitively. Returns null for unknown tags.
 */
export const parseMethodKind = (text: string): MethodKind | null => {
  const normalised = text.trim().toLowerCase();
  const parsed = methodKindSchema.safeParse(normalised);
  if (parsed.success) {
    return parsed.data;
  }
  return METHOD_ALIASES[normalised] ?? null;
};
