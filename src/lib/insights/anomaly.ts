/**
 * Anomaly Detection
 *
 * Flags points whose z-score against the whole series exceeds a threshold and
 * reports the most extreme one.
 */

import { formatDay, formatNumber } from "@/lib/utils";
import { mean, standardDeviation } from "./stats";
import type { AnomalyInsight, AnomalyPoint, TimeSeriesPoint } from "./types";

export const DEFAULT_ANOMALY_THRESHOLD = 2.5;

export function findAnomalies(
  series: TimeSeriesPoint[],
  threshold: number = DEFAULT_ANOMALY_THRESHOLD,
): AnomalyPoint[] {
  const values = series.map((p) => p.value);
  const avg = mean(values);
  const stdDev = standardDeviation(values);

  if (stdDev === 0) return [];

  const anomalies: AnomalyPoint[] = [];

  series.forEach((point, index) => {
    const zScore = Math.abs(point.value - avg) / stdDev;
    if (zScore > threshold) {
      anomalies.push({ index, value: point.value, date: point.date, zScore });
    }
  });

  return anomalies;
}

export function detectAnomalies(
  series: TimeSeriesPoint[],
  threshold: number = DEFAULT_ANOMALY_THRESHOLD,
): AnomalyInsight[] {
  const anomalies = findAnomalies(series, threshold);
  if (anomalies.length === 0) return [];

  // Strict comparison keeps the earliest point on ties
  const mostExtreme = anomalies.reduce((max, current) =>
    current.zScore > max.zScore ? current : max,
  );

  return [
    {
      type: "anomaly",
      insight: `Detected ${anomalies.length} anomalous point${anomalies.length === 1 ? "" : "s"}. Largest deviation: ${mostExtreme.zScore.toFixed(1)}σ on ${formatDay(mostExtreme.date)} (value ${formatNumber(mostExtreme.value)}).`,
      confidence: 88,
      actionable:
        "Investigate the root cause (campaign effects, system outages, external factors).",
      priority: anomalies.length > series.length * 0.05 ? "high" : "medium",
      data: { anomalyCount: anomalies.length, mostExtreme },
    },
  ];
}
