import type { DiscreteSignal } from "./action.js";

/** Direction of a crossing of `a` over `b`: 1 above, -1 below, 0 none. */
export type CrossDirection = DiscreteSignal;

export type CrossPair = readonly [a: number, b: number];

const crossDirection = (previous: number | null, delta: number): CrossDirection => {
  if (previous === null) {
    return 0;
  }
  if (previous < 0 && delta >= 0) {
    return 1;
  }
  if (previous > 0 && delta <= 0) {
    return -1;
  }
  return 0;
};

/**
 * Detects `a` crossing `b` in either direction by watching the sign of `a - b`.
 * The first pair has nothing to compare against and never crosses.
 */
export class Cross {
  private previousDelta: number | null = null;

  public next([a, b]: CrossPair): CrossDirection {
    const delta = a - b;
    const direction = crossDirection(this.previousDelta, delta);
    this.previousDelta = delta;
    return direction;
  }
}

export class CrossAbove {
  private previousDelta: number | null = null;

  public next([a, b]: CrossPair): boolean {
    const delta = a - b;
    const crossed = crossDirection(this.previousDelta, delta) === 1;
    this.previousDelta = delta;
    return crossed;
  }
}

export class CrossUnder {
  private previousDelta: number | null = null;

  public next([a, b]: CrossPair): boolean {
    const delta = a - b;
    const crossed = crossDirection(this.previousDelta, delta) === -1;
    this.previousDelta = delta;
    return crossed;
  }
}
