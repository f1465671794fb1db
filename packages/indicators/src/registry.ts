import type { IndicatorConfig, IndicatorConfigOptions, ResultShape } from "@incta/core";

import * as adx from "./adx.js";
import * as coppock from "./coppock.js";

export type IndicatorName = typeof adx.name | typeof coppock.name;

export type AnyIndicatorConfig =
  | IndicatorConfig<adx.AverageDirectionalIndexParams>
  | IndicatorConfig<coppock.CoppockCurveParams>;

export interface IndicatorEntry {
  readonly name: IndicatorName;
  readonly title: string;
  readonly description: string;
  readonly shape: ResultShape;
  readonly createConfig: (options?: IndicatorConfigOptions) => AnyIndicatorConfig;
}

export class UnknownIndicatorError extends Error {
  public readonly indicator: string;

  public constructor(indicator: string) {
    super(`Unknown indicator: ${indicator}`);
    this.name = "UnknownIndicatorError";
    this.indicator = indicator;
  }
}

export const indicators: Record<IndicatorName, IndicatorEntry> = {
  [adx.name]: {
    name: adx.name,
    title: adx.definition.title,
    description: adx.definition.description,
    shape: adx.definition.shape,
    createConfig: (options) => adx.createConfig({}, options),
  },
  [coppock.name]: {
    name: coppock.name,
    title: coppock.definition.title,
    description: coppock.definition.description,
    shape: coppock.definition.shape,
    createConfig: (options) => coppock.createConfig({}, options),
  },
};

export const indicatorList = Object.values(indicators);

export const isIndicatorName = (value: string): value is IndicatorName => {
  return Object.prototype.hasOwnProperty.call(indicators, value);
};

/**
 * Builds a default configuration for `name` and applies text fields over it.
 * Rejected fields are logged by the configuration and otherwise ignored.
 *
 * @throws UnknownIndicatorError when no indicator is registered under `name`.
 */
export const createIndicatorConfig = (
  name: string,
  values: Readonly<Record<string, string>> = {},
  options: IndicatorConfigOptions = {},
): AnyIndicatorConfig => {
  if (!isIndicatorName(name)) {
    throw new UnknownIndicatorError(name);
  }
  const config = indicators[name].createConfig(options);
  config.setMany(values);
  return config;
};
