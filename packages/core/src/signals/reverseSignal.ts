import { assertPeriod } from "../errors.js";
import { Window } from "../window.js";
import type { DiscreteSignal } from "./action.js";

// The candidate sits at offset `left`: `left` older values before it and
// `right` newer ones after it. Ties with newer values still count, ties with
// older ones do not, so a plateau yields one pivot at its first bar.
const isPivotHigh = (window: Window<number>, left: number): boolean => {
  const candidate = window.at(left);
  if (Number.isNaN(candidate)) {
    return false;
  }
  for (let offset = 0; offset < window.capacity; offset += 1) {
    if (offset === left) {
      continue;
    }
    const value = window.at(offset);
    if (offset < left ? value >= candidate : value > candidate) {
      return false;
    }
  }
  return true;
};

const isPivotLow = (window: Window<number>, left: number): boolean => {
  const candidate = window.at(left);
  if (Number.isNaN(candidate)) {
    return false;
  }
  for (let offset = 0; offset < window.capacity; offset += 1) {
    if (offset === left) {
      continue;
    }
    const value = window.at(offset);
    if (offset < left ? value <= candidate : value < candidate) {
      return false;
    }
  }
  return true;
};

const spanWindow = (left: number, right: number, seed: number): Window<number> => {
  assertPeriod("Reverse left span", left);
  assertPeriod("Reverse right span", right);
  return new Window(left + right + 1, seed);
};

/**
 * Confirms local extrema `right` inputs after they happen. A signal emitted
 * now describes the value fed `right` calls ago: -1 when it was a peak
 * (reversal down), 1 when it was a trough (reversal up).
 */
export class ReverseSignal {
  public readonly left: number;
  public readonly right: number;

  private readonly window: Window<number>;

  public constructor(left: number, right: number, seed: number) {
    this.window = spanWindow(left, right, seed);
    this.left = left;
    this.right = right;
  }

  public next(input: number): DiscreteSignal {
    this.window.push(input);
    if (isPivotHigh(this.window, this.left)) {
      return -1;
    }
    if (isPivotLow(this.window, this.left)) {
      return 1;
    }
    return 0;
  }
}

/** Peak-only counterpart of {@link ReverseSignal}. */
export class ReverseHighSignal {
  public readonly left: number;
  public readonly right: number;

  private readonly window: Window<number>;

  public constructor(left: number, right: number, seed: number) {
    this.window = spanWindow(left, right, seed);
    this.left = left;
    this.right = right;
  }

  public next(input: number): boolean {
    this.window.push(input);
    return isPivotHigh(this.window, this.left);
  }
}

/** Trough-only counterpart of {@link ReverseSignal}. */
export class ReverseLowSignal {
  public readonly left: number;
  public readonly right: number;

  private readonly window: Window<number>;

  public constructor(left: number, right: number, seed: number) {
    this.window = spanWindow(left, right, seed);
    this.left = left;
    this.right = right;
  }

  public next(input: number): boolean {
    this.window.push(input);
    return isPivotLow(this.window, this.left);
  }
}
