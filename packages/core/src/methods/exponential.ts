import { assertPeriod } from "../errors.js";
import type { Method } from "./types.js";

/** Standard exponential smoothing factor. */
export const emaAlpha = (period: number): number => 2 / (period + 1);

/** Wilder's smoothing factor. */
export const rmaAlpha = (period: number): number => 1 / period;

/**
 * `previous * (1 - alpha) + input * alpha`, written in the form whose fixed
 * point is exact: an input equal to the previous output returns it unchanged.
 */
abstract class ExponentialMethod implements Method {
  public abstract readonly kind: "ema" | "rma";
  public readonly period: number;
  public readonly alpha: number;

  private value: number;

  protected constructor(label: string, period: number, seed: number, alpha: (period: number) => number) {
    this.period = assertPeriod(label, period);
    this.alpha = alpha(period);
    this.value = seed;
  }

  public next(input: number): number {
    this.value += this.alpha * (input - this.value);
    return this.value;
  }
}

export class Ema extends ExponentialMethod {
  public readonly kind = "ema";

  public constructor(period: number, seed: number) {
    super("EMA period", period, seed, emaAlpha);
  }
}

/** Wilder's running moving average. */
export class Rma extends ExponentialMethod {
  public readonly kind = "rma";

  public constructor(period: number, seed: number) {
    super("RMA period", period, seed, rmaAlpha);
  }
}
