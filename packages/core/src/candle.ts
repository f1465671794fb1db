import { z } from "zod";

/**
 * One OHLCV observation. Bars are consumed as-is and never mutated.
 */
export interface Candle {
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export const SOURCES = ["open", "high", "low", "close", "volume", "hl2", "tp", "ohlc4"] as const;

/** Scalar series an indicator can read from a candle. */
export type Source = (typeof SOURCES)[number];

export const sourceSchema = z.enum(SOURCES);

const SOURCE_ALIASES: Readonly<Record<string, Source>> = {
  hlc3: "tp",
  typical: "tp",
  median: "hl2",
};

/**
 * Resolves a source name, case-insensitively. Returns null for unknown names.
 */
export const parseSource = (text: string): Source | null => {
  const normalised = text.trim().toLowerCase();
  const parsed = sourceSchema.safeParse(normalised);
  if (parsed.success) {
    return parsed.data;
  }
  return SOURCE_ALIASES[normalised] ?? null;
};

/**
 * Greatest of the bar's own range and its gaps from the previous close.
 */
export const trueRange = (candle: Candle, previous: Candle): number => {
  return Math.max(
    candle.high - candle.low,
    Math.abs(candle.high - previous.close),
    Math.abs(candle.low - previous.close),
  );
};

export const sourceOf = (candle: Candle, source: Source): number => {
  switch (source) {
    case "open":
      return candle.open;
    case "high":
      return candle.high;
    case "low":
      return candle.low;
    case "close":
      return candle.close;
    case "volume":
      return candle.volume;
    case "hl2":
      return (candle.high + candle.low) / 2;
    case "tp":
      return (candle.high + candle.low + candle.close) / 3;
    case "ohlc4":
      return (candle.open + candle.high + candle.low + candle.close) / 4;
    default: {
      const unreachable: never = source;
      throw new Error(`Unknown source: ${String(unreachable)}`);
    }
  }
};
