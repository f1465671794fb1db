import { assertPeriod } from "../errors.js";
import { Window } from "../window.js";
import type { Method } from "./types.js";

/**
 * Simple moving average kept as a running sum over a seeded window.
 */
export class Sma implements Method {
  public readonly kind = "sma";
  public readonly period: number;

  private readonly window: Window<number>;
  private sum: number;

  public constructor(period: number, seed: number) {
    this.period = assertPeriod("SMA period", period);
    this.window = new Window(period, seed);
    this.sum = seed * period;
  }

  public next(input: number): number {
    const evicted = this.window.push(input);
    this.sum += input - evicted;
    return this.sum / this.period;
  }
}
