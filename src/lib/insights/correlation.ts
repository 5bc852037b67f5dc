/**
 * Correlation Analysis
 *
 * Finds notable pairwise linear relationships among the numeric fields of a
 * tabular sample.
 */

import { pearsonCorrelation } from "./stats";
import type { CorrelationInsight, DataPoint } from "./types";

export const MIN_CORRELATION = 0.5;

/**
 * Fields that hold a non-NaN number in every record of the sample
 */
export function getNumericFields(sample: DataPoint[]): string[] {
  if (sample.length === 0) return [];

  return Object.keys(sample[0]).filter((field) =>
    sample.every((row) => {
      const value = row[field];
      return typeof value === "number" && !isNaN(value);
    }),
  );
}

function numericValues(sample: DataPoint[], field: string): number[] {
  return sample.flatMap((row) => {
    const value = row[field];
    return typeof value === "number" && !isNaN(value) ? [value] : [];
  });
}

function strengthLabel(magnitude: number): string {
  if (magnitude > 0.8) return "very strong";
  if (magnitude > 0.6) return "strong";
  return "moderate";
}

export function analyzeCorrelations(sample: DataPoint[]): CorrelationInsight[] {
  const fields = getNumericFields(sample);
  if (fields.length < 2) return [];

  const insights: CorrelationInsight[] = [];

  for (let i = 0; i < fields.length; i++) {
    for (let j = i + 1; j < fields.length; j++) {
      const field1 = fields[i];
      const field2 = fields[j];

      const values1 = numericValues(sample, field1);
      const values2 = numericValues(sample, field2);
      if (values1.length !== values2.length) continue;

      const correlation = pearsonCorrelation(values1, values2);
      const magnitude = Math.abs(correlation);
      if (!(magnitude > MIN_CORRELATION)) continue;

      const direction = correlation > 0 ? "positive" : "negative";

      insights.push({
        type: "correlation",
        insight: `${field1} and ${field2} show a ${strengthLabel(magnitude)} ${direction} correlation (r=${correlation.toFixed(3)}).`,
        confidence: Math.min(95, magnitude * 100),
        actionable: `Optimizing ${field1} is likely to ${correlation > 0 ? "lift" : "shift"} ${field2}.`,
        priority: magnitude > 0.7 ? "high" : "medium",
        data: { field1, field2, correlation },
      });
    }
  }

  return insights;
}
