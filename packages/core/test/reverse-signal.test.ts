import { strict as assert } from "node:assert";
import test from "node:test";

import {
  InvalidPeriodError,
  ReverseHighSignal,
  ReverseLowSignal,
  ReverseSignal,
} from "../src/index.js";

test("a peak is confirmed right-span inputs after it was fed", () => {
  const pivot = new ReverseSignal(2, 2, 0);
  assert.deepEqual(
    [1, 2, 5, 2, 1].map((value) => pivot.next(value)),
    [0, 0, 0, 0, -1],
  );
});

test("a trough reports an upward reversal", () => {
  const pivot = new ReverseSignal(1, 1, 10);
  assert.deepEqual(
    [9, 5, 8].map((value) => pivot.next(value)),
    [0, 0, 1],
  );
});

test("confirmation lags by exactly the right span", () => {
  const pivot = new ReverseSignal(1, 3, 10);
  assert.deepEqual(
    [5, 6, 7, 8].map((value) => pivot.next(value)),
    [0, 0, 0, 1],
  );
});

test("a plateau yields a single pivot at its first bar", () => {
  const pivot = new ReverseSignal(1, 1, 0);
  assert.deepEqual(
    [1, 5, 5, 1].map((value) => pivot.next(value)),
    [0, 0, -1, 0],
  );
});

test("seed-filled history produces no pivots", () => {
  const pivot = new ReverseSignal(2, 2, 3);
  assert.deepEqual(
    [3, 3, 3, 3].map((value) => pivot.next(value)),
    [0, 0, 0, 0],
  );
});

test("one-sided detectors split peaks and troughs", () => {
  const high = new ReverseHighSignal(2, 2, 0);
  const low = new ReverseLowSignal(2, 2, 0);
  const series = [1, 2, 5, 2, 1];

  assert.deepEqual(
    series.map((value) => high.next(value)),
    [false, false, false, false, true],
  );
  assert.deepEqual(
    series.map((value) => low.next(value)),
    [false, false, false, false, false],
  );
});

test("spans must be positive integers", () => {
  assert.throws(() => new ReverseSignal(0, 2, 0), InvalidPeriodError);
  assert.throws(() => new ReverseSignal(2, 0, 0), InvalidPeriodError);
  assert.throws(() => new ReverseHighSignal(1, -1, 0), InvalidPeriodError);
  assert.throws(() => new ReverseLowSignal(1.5, 1, 0), InvalidPeriodError);
});
