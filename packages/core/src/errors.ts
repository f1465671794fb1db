import type { FieldSetFailure } from "./fields.js";
import type { ResultShape } from "./result.js";

/** Largest window capacity, smoothing period or span accepted anywhere. */
export const MAX_PERIOD = 65_535;

/**
 * Raised when a window capacity, smoothing period or span is not an integer
 * in `[1, MAX_PERIOD]`.
 */
export class InvalidPeriodError extends RangeError {
  public readonly label: string;
  public readonly value: number;

  public constructor(label: string, value: number) {
    super(`${label} must be an integer in [1, ${MAX_PERIOD}], got ${value}`);
    this.name = "InvalidPeriodError";
    this.label = label;
    this.value = value;
  }
}

/**
 * Raised by `IndicatorConfig.init` when the configuration does not validate.
 */
export class InvalidConfigError extends Error {
  public readonly indicator: string;
  public readonly issues: readonly string[];

  public constructor(indicator: string, issues: readonly string[]) {
    super(`Invalid ${indicator} config: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.indicator = indicator;
    this.issues = issues;
  }
}

/** Strict-mode counterpart of a rejected field update. */
export class FieldSetError extends Error {
  public readonly failure: FieldSetFailure;

  public constructor(failure: FieldSetFailure) {
    super(failure.message);
    this.name = "FieldSetError";
    this.failure = failure;
  }
}

export class ResultShapeError extends Error {
  public readonly expected: ResultShape;
  public readonly actual: ResultShape;

  public constructor(indicator: string, expected: ResultShape, actual: ResultShape) {
    super(
      `${indicator} emitted ${actual.values} values/${actual.signals} signals, ` +
        `declared ${expected.values}/${expected.signals}`,
    );
    this.name = "ResultShapeError";
    this.expected = expected;
    this.actual = actual;
  }
}

export const assertPeriod = (label: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1 || value > MAX_PERIOD) {
    throw new InvalidPeriodError(label, value);
  }
  return value;
};
