export * from "./action.js";
export * from "./cross.js";
export * from "./rateOfChange.js";
export * from "./reverseSignal.js";
