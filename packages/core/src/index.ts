/**
 * Streaming building blocks shared by every indicator: the candle contract,
 * the lookback window, smoothing methods, signal primitives and the
 * configuration/instance protocol.
 * @packageDocumentation
 */

export * from "./candle.js";
export * from "./errors.js";
export * from "./fields.js";
export * from "./methods/index.js";
export * from "./protocol.js";
export * from "./result.js";
export * from "./signals/index.js";
export * from "./window.js";
