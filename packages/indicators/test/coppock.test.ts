import { strict as assert } from "node:assert";
import test from "node:test";

import type { Candle } from "@incta/core";
import { createLogger } from "@incta/logger";

import { coppock } from "../src/index.js";

const quiet = createLogger("coppock-test", { level: "error" });

const candleAt = (close: number): Candle => ({
  open: close,
  high: close + 2,
  low: close - 2,
  close,
  volume: 500,
});

// Every smoothing and horizon set to one bar, so each output is traceable by hand.
const unitParams: Partial<coppock.CoppockCurveParams> = {
  period1: 1,
  period2: 1,
  period3: 1,
  s2Left: 1,
  s2Right: 1,
  s3Period: 1,
  method2: "sma",
};

test("defaults validate and declare two values and three signals", () => {
  const config = coppock.createConfig({}, { logger: quiet });
  assert.ok(config.validate());
  assert.deepEqual(config.size(), { values: 2, signals: 3 });
  assert.equal(config.params.method1, "wma");
  assert.equal(config.params.method2, "ema");
  assert.equal(config.params.source, "close");
});

test("every period must be positive", () => {
  const config = coppock.createConfig({ s2Left: 0 }, { logger: quiet });
  assert.equal(config.validate(), false);
  const issues = config.issues();
  assert.equal(issues.length, 1);
  assert.ok(issues[0]?.startsWith("s2Left: "));
});

test("periods above the supported maximum are refused", () => {
  const config = coppock.createConfig({}, { logger: quiet });

  const result = config.set("period2", "70000");
  assert.ok(!result.ok);
  assert.equal(result.code, "invalid_value");
  assert.equal(result.message, "(root): expected at most 65535");
  assert.equal(config.set("period2", "99999999999999999999").ok, false);
  assert.equal(config.params.period2, 14);

  assert.ok(config.set("period2", "65535").ok);
  assert.ok(config.validate());

  const oversized = coppock.createConfig({ period2: 70000 }, { logger: quiet });
  assert.equal(oversized.validate(), false);
  assert.equal(oversized.issues().length, 1);
  assert.ok(oversized.issues()[0]?.startsWith("period2: "));
});

test("the exported defaults cannot be changed", () => {
  assert.ok(Object.isFrozen(coppock.defaults));
  assert.equal(coppock.createConfig({}, { logger: quiet }).params.period2, 14);
});

test("a constant price keeps the curve and every signal at zero", () => {
  const instance = coppock.createConfig({}, { logger: quiet }).init(candleAt(40));

  for (let i = 0; i < 25; i += 1) {
    const result = instance.next(candleAt(40));
    assert.deepEqual(result.values, [0, 0]);
    assert.deepEqual(result.signals, [0, 0, 0]);
  }
});

test("unit periods expose the zero cross and the delayed reversal", () => {
  const instance = coppock.createConfig(unitParams, { logger: quiet }).init(candleAt(10));
  const results = [10, 5, 10, 20].map((close) => instance.next(candleAt(close)));

  assert.deepEqual(
    results.map((result) => result.values),
    [
      [0, 0],
      [-1, -1],
      [2, 2],
      [2, 2],
    ],
  );
  assert.deepEqual(
    results.map((result) => result.signals),
    [
      [0, 0, 0],
      [0, 0, 0],
      [1, 1, 0],
      [0, -1, 0],
    ],
  );
});

test("the signal line lags the curve and the curve crosses it", () => {
  const params = { ...unitParams, s3Period: 3, method2: "ema" as const };
  const instance = coppock.createConfig(params, { logger: quiet }).init(candleAt(10));
  const results = [10, 20, 20, 10].map((close) => instance.next(candleAt(close)));

  // curve: 0, 2, 0, -1; ema(3) signal line: 0, 1, 0.5, -0.25
  assert.deepEqual(
    results.map((result) => result.values),
    [
      [0, 0],
      [2, 1],
      [0, 0.5],
      [-1, -0.25],
    ],
  );
  assert.deepEqual(
    results.map((result) => result.signal(2)),
    [0, 0, -1, 0],
  );
});

test("the source field selects the price series", () => {
  const config = coppock.createConfig(unitParams, { logger: quiet });
  assert.ok(config.set("source", "high").ok);

  const instance = config.init(candleAt(10));
  instance.next(candleAt(10));
  const result = instance.next(candleAt(22));

  // high: 12 -> 24, both rates of change are 1
  assert.equal(result.value(0), 2);
});

test("signals stay within [-1, 1] over a choppy series", () => {
  const instance = coppock.createConfig({}, { logger: quiet }).init(candleAt(100));
  const closes = Array.from({ length: 80 }, (_, i) => 100 + 10 * Math.sin(i / 4) + (i % 3));

  for (const close of closes) {
    const result = instance.next(candleAt(close));
    assert.equal(result.signals.length, 3);
    for (const signal of result.signals) {
      assert.ok([-1, 0, 1].includes(signal), `unexpected signal ${signal}`);
    }
  }
});
