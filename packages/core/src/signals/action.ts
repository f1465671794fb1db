/** Discrete signal: 1 buy, -1 sell, 0 nothing. */
export type DiscreteSignal = -1 | 0 | 1;

export const BUY_ALL = 1;
export const SELL_ALL = -1;
export const NO_SIGNAL = 0;

/**
 * Forces an analog signal into [-1, 1]; NaN becomes no signal.
 */
export const clampSignal = (value: number): number => {
  if (Number.isNaN(value)) {
    return NO_SIGNAL;
  }
  return Math.min(BUY_ALL, Math.max(SELL_ALL, value));
};

export const signOf = (value: number): DiscreteSignal => {
  if (value > 0) {
    return 1;
  }
  if (value < 0) {
    return -1;
  }
  return 0;
};
