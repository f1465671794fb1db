import { parse } from "dotenv";

import type { FieldSetFailure, IndicatorConfigOptions } from "@incta/core";

import { UnknownIndicatorError, indicators, isIndicatorName, type AnyIndicatorConfig } from "./registry.js";

export interface LoadedIndicatorConfig {
  readonly config: AnyIndicatorConfig;
  readonly failures: readonly FieldSetFailure[];
}

/**
 * Reads `field=value` lines (dotenv syntax: comments, quoting and `export`
 * prefixes allowed) into a field record.
 */
export const parseFieldFile = (text: string): Record<string, string> => {
  return parse(text);
};

/**
 * Builds the named indicator's configuration from field-file text. The
 * result is not validated; call `config.validate()` before streaming.
 */
export const loadIndicatorConfig = (
  name: string,
  text: string,
  options: IndicatorConfigOptions = {},
): LoadedIndicatorConfig => {
  if (!isIndicatorName(name)) {
    throw new UnknownIndicatorError(name);
  }
  const config = indicators[name].createConfig(options);
  const failures = config.setMany(parseFieldFile(text));
  return { config, failures };
};
