export const sum = (values: readonly number[]): number =>
  values.reduce((acc, value) => acc + value, 0);

export const clamp = (value: number, low: number, high: number): number => {
  return Math.max(low, Math.min(high, value));
};

/** Non-finite and negative quantities collapse to zero. */
export const nonNegative = (value: number): number =>
  Number.isFinite(value) && value > 0 ? value : 0;

export const percentChange = (previous: number, current: number): number => {
  if (previous <= 0) return 0;
  return ((current - previous) / previous) * 100;
};

export const round = (value: number, decimals = 2): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};
