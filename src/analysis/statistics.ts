/**
 * Descriptive statistics shared by the aggregators
 *
 * Quantiles use linear interpolation between order statistics:
 * index = q * (n - 1), value = x[floor] + (x[ceil] - x[floor]) * frac.
 * Standard deviations are sample (ddof = 1) unless named otherwise.
 */

/**
 * Sum with a plain loop (no spreading over large arrays)
 */
export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Arithmetic mean; 0 for an empty list
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Sample standard deviation (Bessel's correction). Null when fewer than two values.
 */
export function sampleStd(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = mean(values);
  let squared = 0;
  for (const value of values) {
    squared += (value - avg) * (value - avg);
  }
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * Population standard deviation. Null for an empty list.
 */
export function populationStd(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const avg = mean(values);
  let squared = 0;
  for (const value of values) {
    squared += (value - avg) * (value - avg);
  }
  return Math.sqrt(squared / values.length);
}

/**
 * Quantile of an ascending-sorted list, q in [0, 1]
 */
export function quantileSorted(sortedValues: readonly number[], q: number): number {
  if (sortedValues.length === 0) return 0;
  const index = q * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lowerValue = sortedValues[lower] ?? 0;
  if (lower === upper) {
    return lowerValue;
  }
  const upperValue = sortedValues[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (index - lower);
}

/**
 * Quantile of an unsorted list (sorts a copy)
 */
export function quantile(values: readonly number[], q: number): number {
  return quantileSorted(sortAscending(values), q);
}

/**
 * Median (linear interpolation of the two middle values for even n)
 */
export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

/**
 * Ascending numeric sort of a copy
 */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Column key for a quantile: 0.9 -> "p90", 0.975 -> "p97.5"
 */
export function quantileKey(q: number): string {
  return `p${parseFloat((q * 100).toFixed(4))}`;
}

/**
 * Coefficient of variation (sample std / mean).
 * Null when the mean is not positive or fewer than two values exist.
 */
export function coefficientOfVariation(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = mean(values);
  if (!(avg > 0)) return null;
  const std = sampleStd(values);
  return std === null ? null : std / avg;
}

/**
 * Pearson correlation coefficient. Null when undefined
 * (length mismatch, fewer than two points, or zero variance on either side).
 */
export function pearsonCorrelation(
  valuesA: readonly number[],
  valuesB: readonly number[]
): number | null {
  if (valuesA.length !== valuesB.length || valuesA.length < 2) {
    return null;
  }

  const meanA = mean(valuesA);
  const meanB = mean(valuesB);

  let numerator = 0;
  let sumSqA = 0;
  let sumSqB = 0;

  for (let i = 0; i < valuesA.length; i++) {
    const diffA = (valuesA[i] ?? meanA) - meanA;
    const diffB = (valuesB[i] ?? meanB) - meanB;
    numerator += diffA * diffB;
    sumSqA += diffA * diffA;
    sumSqB += diffB * diffB;
  }

  const denominator = Math.sqrt(sumSqA * sumSqB);
  if (denominator === 0) return null;

  return numerator / denominator;
}

/**
 * Least-squares slope of y over x. Null when x has no spread.
 */
export function linearSlope(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  for (let i = 0; i < n; i++) {
    const x = xs[i] ?? 0;
    const y = ys[i] ?? 0;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
  }

  const denominator = n * sumX2 - sumX * sumX;
  if (denominator === 0) return null;
  return (n * sumXY - sumX * sumY) / denominator;
}

/**
 * Fraction of values >= threshold; 0 for an empty list
 */
export function fractionAtLeast(values: readonly number[], threshold: number): number {
  if (values.length === 0) return 0;
  let hits = 0;
  for (const value of values) {
    if (value >= threshold) hits++;
  }
  return hits / values.length;
}

/**
 * Non-negative modulo (JavaScript % keeps the dividend's sign)
 */
export function positiveModulo(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
