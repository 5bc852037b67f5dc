/**
 * Seasonality Analysis
 *
 * Groups a series by calendar month (year ignored) and reports the peak and
 * trough months along with the spread between them.
 */

import { formatNumber } from "@/lib/utils";
import { mean } from "./stats";
import type { SeasonalityInsight, TimeSeriesPoint } from "./types";

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

// Above this variation (%) the cycle is worth planning around
const HIGH_VARIATION = 30;

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? `Month ${month}`;
}

/**
 * Detect the monthly cycle of a time series
 */
export function analyzeSeasonality(
  series: TimeSeriesPoint[],
): SeasonalityInsight[] {
  if (series.length === 0) return [];

  // Months are keyed in UTC so results do not depend on the host timezone
  const byMonth = new Map<number, number[]>();
  for (const point of series) {
    const month = point.date.getUTCMonth() + 1;
    if (!byMonth.has(month)) {
      byMonth.set(month, []);
    }
    byMonth.get(month)?.push(point.value);
  }

  // Map iteration follows first appearance, which decides ties below
  const monthly = Array.from(byMonth.entries()).map(([month, values]) => ({
    month,
    average: mean(values),
  }));

  const peak = monthly.reduce((best, m) => (m.average > best.average ? m : best));
  const trough = monthly.reduce((best, m) =>
    m.average < best.average ? m : best,
  );
  const overall = mean(monthly.map((m) => m.average));

  const variation =
    overall === 0 ? 0 : ((peak.average - trough.average) / overall) * 100;

  const peakName = monthName(peak.month);
  const troughName = monthName(trough.month);

  return [
    {
      type: "seasonality",
      insight: `Values peak in ${peakName} (avg ${formatNumber(peak.average)}) and bottom out in ${troughName} (avg ${formatNumber(trough.average)}). Seasonal variation is ${variation.toFixed(1)}%.`,
      confidence: 85,
      actionable: `Build up inventory ahead of ${peakName} and schedule promotions for ${troughName}.`,
      priority: variation > HIGH_VARIATION ? "high" : "medium",
      data: {
        peakMonth: peak.month,
        troughMonth: trough.month,
        peakAverage: peak.average,
        troughAverage: trough.average,
        variation,
      },
    },
  ];
}
