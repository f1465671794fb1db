import { z } from "zod";

import {
  IndicatorConfig,
  IndicatorResult,
  Window,
  createMethod,
  methodField,
  methodKindSchema,
  numberField,
  periodField,
  periodSchema,
  signOf,
  trueRange,
  type Candle,
  type FieldParsers,
  type IndicatorConfigOptions,
  type IndicatorDefinition,
  type IndicatorState,
} from "@incta/core";

export const name = "adx" as const;

export const schema = z
  .object({
    /** Smoothing for true range and directional movement. */
    method1: methodKindSchema,
    diLength: periodSchema,
    /** Smoothing for the directional index itself. */
    method2: methodKindSchema,
    adxSmoothing: periodSchema,
    /** Bars back to the candle directional movement is measured against. */
    period1: periodSchema,
    /** ADX level above which the trend signal fires. */
    zone: z.number().min(0).max(1),
  })
  .superRefine((value, ctx) => {
    if (value.period1 >= value.diLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "period1 must be less than diLength",
        path: ["period1"],
      });
    }
    if (value.period1 >= value.adxSmoothing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "period1 must be less than adxSmoothing",
        path: ["period1"],
      });
    }
  });

export type AverageDirectionalIndexParams = z.infer<typeof schema>;

export const defaults: Readonly<AverageDirectionalIndexParams> = Object.freeze({
  method1: "rma",
  diLength: 14,
  method2: "rma",
  adxSmoothing: 14,
  period1: 1,
  zone: 0.2,
});

export const fields: FieldParsers<AverageDirectionalIndexParams> = {
  method1: methodField,
  diLength: periodField,
  method2: methodField,
  adxSmoothing: periodField,
  period1: periodField,
  zone: numberField,
};

const create = (params: Readonly<AverageDirectionalIndexParams>, first: Candle): IndicatorState => {
  const window = new Window<Candle>(params.period1, first);
  const trMa = createMethod(params.method1, params.diLength, trueRange(first, first));
  const plusDm = createMethod(params.method1, params.diLength, 0);
  const minusDm = createMethod(params.method1, params.diLength, 0);
  const adxMa = createMethod(params.method2, params.adxSmoothing, 0);

  const directionalIndexes = (candle: Candle): [plus: number, minus: number] => {
    const previous = window.push(candle);
    const range = trMa.next(trueRange(candle, previous));

    const up = candle.high - previous.high;
    const down = previous.low - candle.low;
    const plus = plusDm.next(up > down && up > 0 ? up : 0);
    const minus = minusDm.next(down > up && down > 0 ? down : 0);

    if (range === 0) {
      return [0, 0];
    }
    return [plus / range, minus / range];
  };

  const averageIndex = (plus: number, minus: number): number => {
    const total = plus + minus;
    if (total === 0) {
      return adxMa.next(0);
    }
    return adxMa.next(Math.abs(plus - minus) / total);
  };

  return {
    next(candle) {
      const [plus, minus] = directionalIndexes(candle);
      const adx = averageIndex(plus, minus);

      const trend = adx > params.zone ? signOf(plus - minus) : 0;
      return new IndicatorResult([adx, plus, minus], [trend, plus - minus]);
    },
  };
};

/**
 * Average Directional Index.
 *
 * Values: ADX, +DI, -DI.
 * Signals: trend direction once ADX is above `zone` (buy when +DI leads,
 * sell when -DI leads); analog +DI minus -DI.
 */
export const definition: IndicatorDefinition<AverageDirectionalIndexParams> = {
  name,
  title: "Average Directional Index",
  description: "Trend strength from smoothed directional movement over true range.",
  defaults,
  fields,
  schema,
  shape: { values: 3, signals: 2 },
  create,
};

export const createConfig = (
  overrides: Partial<AverageDirectionalIndexParams> = {},
  options: IndicatorConfigOptions = {},
): IndicatorConfig<AverageDirectionalIndexParams> => {
  return new IndicatorConfig(definition, overrides, options);
};
