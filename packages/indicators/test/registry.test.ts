import { strict as assert } from "node:assert";
import test from "node:test";

import type { Candle } from "@incta/core";
import { createLogger } from "@incta/logger";

import {
  UnknownIndicatorError,
  createIndicatorConfig,
  indicatorList,
  indicators,
  isIndicatorName,
} from "../src/index.js";

const quiet = createLogger("registry-test", { level: "error" });

const candle: Candle = { open: 10, high: 11, low: 9, close: 10.5, volume: 100 };

test("registry lists every indicator once", () => {
  assert.deepEqual(
    indicatorList.map((entry) => entry.name),
    ["adx", "coppock"],
  );
  assert.equal(indicators.adx.title, "Average Directional Index");
  assert.deepEqual(indicators.coppock.shape, { values: 2, signals: 3 });
});

test("every default configuration validates", () => {
  for (const entry of indicatorList) {
    const config = entry.createConfig({ logger: quiet });
    assert.ok(config.validate(), `defaults for ${entry.name} should be valid`);
  }
});

test("the first result of every indicator matches its declared size", () => {
  for (const entry of indicatorList) {
    const config = entry.createConfig({ logger: quiet });
    const instance = config.init(candle);
    const result = instance.next(candle);
    assert.deepEqual(result.shape, config.size(), entry.name);
    assert.deepEqual(result.shape, entry.shape, entry.name);
  }
});

test("createIndicatorConfig applies text fields over the defaults", () => {
  const config = createIndicatorConfig("adx", { diLength: "10", zone: "0.3" }, { logger: quiet });

  assert.equal(config.name, "adx");
  assert.deepEqual(config.params, {
    method1: "rma",
    diLength: 10,
    method2: "rma",
    adxSmoothing: 14,
    period1: 1,
    zone: 0.3,
  });
});

test("createIndicatorConfig leaves rejected fields at their defaults", () => {
  const config = createIndicatorConfig("coppock", { period1: "x", typo: "3" }, { logger: quiet });
  assert.equal(config.params.period1, 10);
  assert.ok(config.validate());
});

test("unknown indicators are rejected", () => {
  assert.throws(
    () => createIndicatorConfig("macd"),
    (error: unknown) => {
      assert.ok(error instanceof UnknownIndicatorError);
      assert.equal(error.indicator, "macd");
      assert.equal(error.message, "Unknown indicator: macd");
      return true;
    },
  );
});

test("isIndicatorName ignores inherited keys", () => {
  assert.ok(isIndicatorName("adx"));
  assert.equal(isIndicatorName("toString"), false);
});
