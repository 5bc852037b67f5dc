/**
 * Insight orchestration
 *
 * Runs the analyzers that apply to the supplied inputs and ranks what they
 * find. Results are returned, never retained, so one engine can serve any
 * number of concurrent callers.
 */

import { DEFAULT_ANOMALY_THRESHOLD, detectAnomalies } from "./anomaly";
import { analyzeCorrelations } from "./correlation";
import { generateInsightReport, type ReportOptions } from "./report";
import { parseAnalysisInput } from "./schema";
import { analyzeSeasonality } from "./seasonality";
import { analyzeCustomerSegments } from "./segments";
import { analyzeTrend } from "./trend";
import type { AnalysisInput, Insight, InsightPriority } from "./types";

export interface InsightEngineOptions {
  anomalyThreshold?: number; // Standard deviations (default 2.5)
  currency?: string; // ISO 4217 code for monetary figures (default USD)
}

export const PRIORITY_WEIGHT: Record<InsightPriority, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

/**
 * Order by priority, then confidence. Array#sort is stable, so equal insights
 * keep the order the analyzers produced them in.
 */
export function rankInsights<T extends Insight>(insights: T[]): T[] {
  return [...insights].sort((a, b) => {
    const priorityDiff = PRIORITY_WEIGHT[b.priority] - PRIORITY_WEIGHT[a.priority];
    if (priorityDiff !== 0) return priorityDiff;
    return b.confidence - a.confidence;
  });
}

export function runInsightAnalysis(
  input: AnalysisInput = {},
  options: InsightEngineOptions = {},
): Insight[] {
  const {
    anomalyThreshold = DEFAULT_ANOMALY_THRESHOLD,
    currency = "USD",
  } = options;

  const insights: Insight[] = [];

  if (input.timeSeries) {
    insights.push(...analyzeSeasonality(input.timeSeries));
    insights.push(...analyzeTrend(input.timeSeries));
    insights.push(...detectAnomalies(input.timeSeries, anomalyThreshold));
  }

  if (input.customers) {
    insights.push(...analyzeCustomerSegments(input.customers, { currency }));
  }

  if (input.tabularSample) {
    insights.push(...analyzeCorrelations(input.tabularSample));
  }

  return rankInsights(insights);
}

/**
 * Validate an untyped payload (e.g. decoded JSON from a host) and analyze it
 *
 * @throws Error if the payload does not match the analysis input shape
 */
export function analyzeRawInput(
  raw: unknown,
  options: InsightEngineOptions = {},
): Insight[] {
  return runInsightAnalysis(parseAnalysisInput(raw), options);
}

/**
 * Object wrapper for hosts that hold on to a configured engine
 */
export class InsightEngine {
  constructor(private readonly options: InsightEngineOptions = {}) {}

  analyze(input: AnalysisInput = {}): Insight[] {
    return runInsightAnalysis(input, this.options);
  }

  analyzeRaw(raw: unknown): Insight[] {
    return analyzeRawInput(raw, this.options);
  }

  report(insights: Insight[], options?: ReportOptions): string {
    return generateInsightReport(insights, options);
  }
}
