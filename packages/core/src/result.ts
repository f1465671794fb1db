import { clampSignal } from "./signals/action.js";

/** Fixed arity of an indicator's output, declared up front. */
export interface ResultShape {
  readonly values: number;
  readonly signals: number;
}

/**
 * One bar's output: positional numeric values plus signals in [-1, 1].
 */
export class IndicatorResult {
  public readonly values: readonly number[];
  public readonly signals: readonly number[];

  public constructor(values: readonly number[], signals: readonly number[]) {
    this.values = Object.freeze([...values]);
    this.signals = Object.freeze(signals.map(clampSignal));
  }

  public get shape(): ResultShape {
    return { values: this.values.length, signals: this.signals.length };
  }

  public value(index: number): number {
    return pick(this.values, index, "value");
  }

  public signal(index: number): number {
    return pick(this.signals, index, "signal");
  }
}

const pick = (items: readonly number[], index: number, label: string): number => {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new RangeError(`No ${label} at index ${index}; result holds ${items.length}`);
  }
  return items[index];
};

export const sameShape = (a: ResultShape, b: ResultShape): boolean => {
  return a.values === b.values && a.signals === b.signals;
};
