export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1). Exactly 0 when every value is equal,
 * so callers can test for a flat window without an epsilon.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  if (values.every((v) => v === values[0])) return 0;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return Math.sqrt(ss / (values.length - 1));
}
