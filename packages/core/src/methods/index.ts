import { Dema, Hma, Tema, Tma } from "./composite.js";
import { Ema, Rma } from "./exponential.js";
import { Sma } from "./sma.js";
import type { Method, MethodKind } from "./types.js";
import { Wma } from "./wma.js";

type MethodFactory = (period: number, seed: number) => Method;

const METHOD_FACTORIES: { readonly [K in MethodKind]: MethodFactory } = {
  sma: (period, seed) => new Sma(period, seed),
  wma: (period, seed) => new Wma(period, seed),
  hma: (period, seed) => new Hma(period, seed),
  ema: (period, seed) => new Ema(period, seed),
  rma: (period, seed) => new Rma(period, seed),
  dema: (period, seed) => new Dema(period, seed),
  tema: (period, seed) => new Tema(period, seed),
  tma: (period, seed) => new Tma(period, seed),
};

/**
 * Builds a seeded smoothing method. The seed is the output the method would
 * hold had it seen nothing but the seed for its whole history.
 *
 * @throws InvalidPeriodError when `period` is not an integer in `[1, MAX_PERIOD]`.
 */
export const createMethod = (kind: MethodKind, period: number, seed: number): Method => {
  return METHOD_FACTORIES[kind](period, seed);
};

export * from "./types.js";
export { Sma } from "./sma.js";
export { Wma } from "./wma.js";
export { Ema, Rma, emaAlpha, rmaAlpha } from "./exponential.js";
export { Dema, Hma, Tema, Tma } from "./composite.js";
