/**
 * Shared record shapes consumed and produced by the insight analyzers.
 *
 * The `Insight` field names (`type`, `insight`, `confidence`, `actionable`,
 * `priority`, `data`) and the priority strings are what downstream consumers
 * read, so they must not be renamed.
 */

export type DataValue = number | string | Date;

/** One row of a tabular sample. Keys are the same across a sample. */
export type DataPoint = Record<string, DataValue>;

export interface TimeSeriesPoint {
  date: Date;
  value: number;
}

export interface CustomerRecord {
  customerId: string;
  recency: number; // Days since last activity
  frequency: number; // Purchase count
  monetary: number; // Total value
}

export interface AnalysisInput {
  timeSeries?: TimeSeriesPoint[];
  customers?: CustomerRecord[];
  tabularSample?: DataPoint[];
}

export type InsightPriority = "high" | "medium" | "low";

export type InsightType =
  | "seasonality"
  | "trend"
  | "customer-segment"
  | "correlation"
  | "anomaly";

export type SegmentKey =
  | "champions"
  | "loyal"
  | "potentialLoyalist"
  | "atRisk"
  | "cannotLoseThem"
  | "hibernating";

export interface SeasonalityData {
  peakMonth: number; // 1-12
  troughMonth: number; // 1-12
  peakAverage: number;
  troughAverage: number;
  variation: number; // Percent of the mean of monthly means
}

export interface TrendData {
  slope: number; // Value change per period
  intercept: number;
  growthRate: number | null; // Null when the first value is 0
}

export interface SegmentData {
  segment: SegmentKey;
  count: number;
  percentage: number;
  avgFrequency: number;
  avgMonetary: number;
}

export interface CorrelationData {
  field1: string;
  field2: string;
  correlation: number;
}

export interface AnomalyPoint {
  index: number; // Position in the input series
  value: number;
  date: Date;
  zScore: number;
}

export interface AnomalyData {
  anomalyCount: number;
  mostExtreme: AnomalyPoint;
}

interface InsightOf<T extends InsightType, D> {
  type: T;
  insight: string;
  confidence: number; // 0-100
  actionable: string;
  priority: InsightPriority;
  data: D;
}

export type SeasonalityInsight = InsightOf<"seasonality", SeasonalityData>;
export type TrendInsight = InsightOf<"trend", TrendData>;
export type SegmentInsight = InsightOf<"customer-segment", SegmentData>;
export type CorrelationInsight = InsightOf<"correlation", CorrelationData>;
export type AnomalyInsight = InsightOf<"anomaly", AnomalyData>;

export type Insight =
  | SeasonalityInsight
  | TrendInsight
  | SegmentInsight
  | CorrelationInsight
  | AnomalyInsight;
