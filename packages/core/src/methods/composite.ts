import { assertPeriod } from "../errors.js";
import { Ema } from "./exponential.js";
import { Sma } from "./sma.js";
import type { Method } from "./types.js";
import { Wma } from "./wma.js";

/** Double exponential moving average: `2 * e1 - e2`. */
export class Dema implements Method {
  public readonly kind = "dema";
  public readonly period: number;

  private readonly ema1: Ema;
  private readonly ema2: Ema;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("DEMA period", period);
    this.ema1 = new Ema(period, seed);
    this.ema2 = new Ema(period, seed);
  }

  public next(input: number): number {
    const e1 = this.ema1.next(input);
    const e2 = this.ema2.next(e1);
    return 2 * e1 - e2;
  }
}

/** Triple exponential moving average: `3 * e1 - 3 * e2 + e3`. */
export class Tema implements Method {
  public readonly kind = "tema";
  public readonly period: number;

  private readonly ema1: Ema;
  private readonly ema2: Ema;
  private readonly ema3: Ema;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("TEMA period", period);
    this.ema1 = new Ema(period, seed);
    this.ema2 = new Ema(period, seed);
    this.ema3 = new Ema(period, seed);
  }

  public next(input: number): number {
    const e1 = this.ema1.next(input);
    const e2 = this.ema2.next(e1);
    const e3 = this.ema3.next(e2);
    return 3 * e1 - 3 * e2 + e3;
  }
}

/**
 * Hull moving average: a `sqrt(period)` WMA over `2 * WMA(period / 2) - WMA(period)`.
 */
export class Hma implements Method {
  public readonly kind = "hma";
  public readonly period: number;

  private readonly half: Wma;
  private readonly full: Wma;
  private readonly root: Wma;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("HMA period", period);
    this.half = new Wma(Math.max(1, Math.floor(period / 2)), seed);
    this.full = new Wma(period, seed);
    this.root = new Wma(Math.max(1, Math.floor(Math.sqrt(period))), seed);
  }

  public next(input: number): number {
    const spread = 2 * this.half.next(input) - this.full.next(input);
    return this.root.next(spread);
  }
}

/** Triangular moving average: an SMA of an SMA over the same period. */
export class Tma implements Method {
  public readonly kind = "tma";
  public readonly period: number;

  private readonly inner: Sma;
  private readonly outer: Sma;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("TMA period", period);
    this.inner = new Sma(period, seed);
    this.outer = new Sma(period, seed);
  }

  public next(input: number): number {
    return this.outer.next(this.inner.next(input));
  }
}
