/**
 * Indicators assembled from the core streaming primitives.
 * @packageDocumentation
 */

export * as adx from "./adx.js";
export * as coppock from "./coppock.js";
export type { AverageDirectionalIndexParams } from "./adx.js";
export type { CoppockCurveParams } from "./coppock.js";
export * from "./registry.js";
export * from "./loader.js";
