/**
 * Trend Analysis
 *
 * Fits a straight line through the series (value against period index) and
 * reports the overall growth from the first to the last observation.
 */

import { calculatePercentageChange } from "@/lib/utils";
import { linearRegression } from "./stats";
import type { InsightPriority, TimeSeriesPoint, TrendInsight } from "./types";

export const MIN_TREND_POINTS = 10;

function growthPriority(growthRate: number | null): InsightPriority {
  if (growthRate === null) return "low";

  const magnitude = Math.abs(growthRate);
  if (magnitude > 20) return "high";
  if (magnitude > 10) return "medium";
  return "low";
}

export function analyzeTrend(series: TimeSeriesPoint[]): TrendInsight[] {
  if (series.length < MIN_TREND_POINTS) return [];

  const sorted = [...series].sort(
    (a, b) => a.date.getTime() - b.date.getTime(),
  );
  const values = sorted.map((p) => p.value);

  const { slope, intercept } = linearRegression(values);
  const growthRate = calculatePercentageChange(
    values[values.length - 1],
    values[0],
  );

  const direction = slope > 0 ? "growth" : "decline";
  const growthText =
    growthRate === null
      ? "Overall growth rate is not computable (first value is zero or too close to zero)."
      : `Overall growth rate: ${growthRate.toFixed(1)}%.`;

  return [
    {
      type: "trend",
      insight: `Series shows a ${direction} trend (slope ${slope.toFixed(2)} per period). ${growthText}`,
      confidence: 82,
      actionable:
        slope > 0
          ? "Keep the current strategy and look for ways to accelerate growth."
          : "Review the current strategy and plan corrective measures.",
      priority: growthPriority(growthRate),
      data: { slope, intercept, growthRate },
    },
  ];
}
