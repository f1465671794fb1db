import { assertPeriod } from "../errors.js";
import { Window } from "../window.js";

/**
 * `ratio` yields the fractional change `(x - past) / past`, `delta` the plain
 * difference `x - past`.
 */
export type RateOfChangeMode = "ratio" | "delta";

/**
 * Change of the input against its value `period` steps back. Until `period`
 * inputs have been seen the seed stands in for the missing history.
 */
export class RateOfChange {
  public readonly period: number;
  public readonly mode: RateOfChangeMode;

  private readonly window: Window<number>;

  public constructor(period: number, seed: number, mode: RateOfChangeMode = "ratio") {
    this.period = assertPeriod("RateOfChange period", period);
    this.mode = mode;
    this.window = new Window(period, seed);
  }

  public next(input: number): number {
    const past = this.window.push(input);
    if (this.mode === "delta") {
      return input - past;
    }
    // zero base: no defined ratio, report no change
    if (past === 0) {
      return 0;
    }
    return (input - past) / past;
  }
}
