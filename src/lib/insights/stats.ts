/**
 * Statistics shared by the analyzers
 */

import type { CustomerRecord, TimeSeriesPoint } from "./types";

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation (denominator n)
 */
export function standardDeviation(values: number[]): number {
  if (values.length === 0) return 0;

  const avg = mean(values);
  const squaredDiffs = values.map((v) => Math.pow(v - avg, 2));
  return Math.sqrt(squaredDiffs.reduce((a, b) => a + b, 0) / values.length);
}

/**
 * Ordinary least squares fit of value against position (0..n-1)
 */
export function linearRegression(values: number[]): {
  slope: number;
  intercept: number;
} {
  const n = values.length;
  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;

  values.forEach((y, x) => {
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
  });

  const denominator = n * sumX2 - sumX * sumX;
  const slope = denominator === 0 ? 0 : (n * sumXY - sumX * sumY) / denominator;
  const intercept = n === 0 ? 0 : (sumY - slope * sumX) / n;

  return { slope, intercept };
}

/**
 * Pearson correlation coefficient. Returns 0 when either vector is constant
 * or the sums overflow.
 */
export function pearsonCorrelation(x: number[], y: number[]): number {
  const n = x.length;
  if (n === 0) return 0;

  const sumX = x.reduce((sum, v) => sum + v, 0);
  const sumY = y.reduce((sum, v) => sum + v, 0);
  const sumXY = x.reduce((sum, v, i) => sum + v * y[i], 0);
  const sumX2 = x.reduce((sum, v) => sum + v * v, 0);
  const sumY2 = y.reduce((sum, v) => sum + v * v, 0);

  const numerator = n * sumXY - sumX * sumY;
  const denominator = Math.sqrt(
    (n * sumX2 - sumX * sumX) * (n * sumY2 - sumY * sumY),
  );

  if (!Number.isFinite(denominator) || denominator === 0) return 0;
  return numerator / denominator;
}

export function describeTimeSeries(series: TimeSeriesPoint[]): {
  mean: number;
  stdDev: number;
  max: number;
  min: number;
} {
  if (series.length === 0) return { mean: 0, stdDev: 0, max: 0, min: 0 };

  const values = series.map((p) => p.value);
  return {
    mean: mean(values),
    stdDev: standardDeviation(values),
    max: values.reduce((a, b) => Math.max(a, b), -Infinity),
    min: values.reduce((a, b) => Math.min(a, b), Infinity),
  };
}

export function describeCustomers(customers: CustomerRecord[]): {
  avgMonetary: number;
  avgFrequency: number;
} {
  return {
    avgMonetary: mean(customers.map((c) => c.monetary)),
    avgFrequency: mean(customers.map((c) => c.frequency)),
  };
}
