import { z } from "zod";

import {
  Cross,
  IndicatorConfig,
  IndicatorResult,
  RateOfChange,
  ReverseSignal,
  createMethod,
  methodField,
  methodKindSchema,
  periodField,
  periodSchema,
  sourceField,
  sourceOf,
  sourceSchema,
  type Candle,
  type FieldParsers,
  type IndicatorConfigOptions,
  type IndicatorDefinition,
  type IndicatorState,
} from "@incta/core";

export const name = "coppock" as const;

export const schema = z.object({
  /** Smoothing period applied to the summed rates of change. */
  period1: periodSchema,
  /** Long rate-of-change horizon. */
  period2: periodSchema,
  /** Short rate-of-change horizon. */
  period3: periodSchema,
  /** Pivot detection spans over the curve. */
  s2Left: periodSchema,
  s2Right: periodSchema,
  /** Signal line period. */
  s3Period: periodSchema,
  source: sourceSchema,
  method1: methodKindSchema,
  method2: methodKindSchema,
});

export type CoppockCurveParams = z.infer<typeof schema>;

export const defaults: Readonly<CoppockCurveParams> = Object.freeze({
  period1: 10,
  period2: 14,
  period3: 11,
  s2Left: 4,
  s2Right: 2,
  s3Period: 5,
  source: "close",
  method1: "wma",
  method2: "ema",
});

export const fields: FieldParsers<CoppockCurveParams> = {
  period1: periodField,
  period2: periodField,
  period3: periodField,
  s2Left: periodField,
  s2Right: periodField,
  s3Period: periodField,
  source: sourceField,
  method1: methodField,
  method2: methodField,
};

const create = (params: Readonly<CoppockCurveParams>, first: Candle): IndicatorState => {
  const seed = sourceOf(first, params.source);
  const rocLong = new RateOfChange(params.period2, seed);
  const rocShort = new RateOfChange(params.period3, seed);
  const curveMa = createMethod(params.method1, params.period1, 0);
  const signalMa = createMethod(params.method2, params.s3Period, 0);
  const zeroCross = new Cross();
  const pivot = new ReverseSignal(params.s2Left, params.s2Right, 0);
  const signalCross = new Cross();

  return {
    next(candle) {
      const src = sourceOf(candle, params.source);
      const curve = curveMa.next(rocLong.next(src) + rocShort.next(src));
      const signalLine = signalMa.next(curve);

      return new IndicatorResult(
        [curve, signalLine],
        [zeroCross.next([curve, 0]), pivot.next(curve), signalCross.next([curve, signalLine])],
      );
    },
  };
};

/**
 * Coppock Curve: a smoothed sum of two rates of change.
 *
 * Values: the curve and its signal line.
 * Signals: curve crossing zero, curve reversal points (confirmed `s2Right`
 * bars late), curve crossing its signal line.
 */
export const definition: IndicatorDefinition<CoppockCurveParams> = {
  name,
  title: "Coppock Curve",
  description: "Weighted sum of long and short rates of change with reversal detection.",
  defaults,
  fields,
  schema,
  shape: { values: 2, signals: 3 },
  create,
};

export const createConfig = (
  overrides: Partial<CoppockCurveParams> = {},
  options: IndicatorConfigOptions = {},
): IndicatorConfig<CoppockCurveParams> => {
  return new IndicatorConfig(definition, overrides, options);
};
