/**
 * Insight Discovery Module
 *
 * Turns business data into ranked, actionable insights:
 * - Seasonality: Monthly peak and trough of a time series
 * - Trend: Linear trend and overall growth
 * - Customer Segments: RFM segmentation against population averages
 * - Correlations: Notable pairwise relationships in tabular samples
 * - Anomalies: Points beyond a z-score threshold
 */

// Analyzers
export { analyzeSeasonality, monthName } from "./seasonality";
export { analyzeTrend, MIN_TREND_POINTS } from "./trend";
export { analyzeCustomerSegments, SEGMENT_DEFINITIONS } from "./segments";
export {
  analyzeCorrelations,
  getNumericFields,
  MIN_CORRELATION,
} from "./correlation";
export {
  detectAnomalies,
  findAnomalies,
  DEFAULT_ANOMALY_THRESHOLD,
} from "./anomaly";

export type { SegmentDefinition, SegmentOptions } from "./segments";

// Orchestration
export {
  runInsightAnalysis,
  analyzeRawInput,
  rankInsights,
  InsightEngine,
  PRIORITY_WEIGHT,
} from "./engine";

export type { InsightEngineOptions } from "./engine";

// Reporting
export {
  generateInsightReport,
  getPriorityActions,
  INSIGHT_TYPE_LABELS,
} from "./report";
export { buildInsightSnapshot } from "./snapshot";

export type { ReportOptions } from "./report";
export type {
  InsightSnapshot,
  InsightSnapshotContent,
  SnapshotOptions,
} from "./snapshot";

// Input, configuration and sample data
export { analysisInputSchema, parseAnalysisInput } from "./schema";
export { getInsightConfig } from "./config";
export { generateSampleData } from "./sample-data";
export { describeTimeSeries, describeCustomers } from "./stats";

export type { InsightConfig } from "./config";
export type { SampleDataOptions } from "./sample-data";

// Data model
export type {
  AnalysisInput,
  AnomalyData,
  AnomalyInsight,
  AnomalyPoint,
  CorrelationData,
  CorrelationInsight,
  CustomerRecord,
  DataPoint,
  DataValue,
  Insight,
  InsightPriority,
  InsightType,
  SeasonalityData,
  SeasonalityInsight,
  SegmentData,
  SegmentInsight,
  SegmentKey,
  TimeSeriesPoint,
  TrendData,
  TrendInsight,
} from "./types";
