import { assertPeriod } from "../errors.js";
import { Window } from "../window.js";
import type { Method } from "./types.js";

/**
 * Linearly weighted moving average; the newest input weighs `period`, the
 * oldest weighs 1. Recomputed from the window on every call so the output
 * equals the direct weighted-sum definition exactly.
 */
export class Wma implements Method {
  public readonly kind = "wma";
  public readonly period: number;

  private readonly window: Window<number>;
  private readonly divisor: number;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("WMA period", period);
    this.window = new Window(period, seed);
    this.divisor = (period * (period + 1)) / 2;
  }

  public next(input: number): number {
    this.window.push(input);
    let weighted = 0;
    let weight = 1;
    for (const value of this.window) {
      weighted += value * weight;
      weight += 1;
    }
    return weighted / this.divisor;
  }
}
