import type { Insight, InsightPriority, InsightType } from "./types";

export interface ReportOptions {
  title?: string;
}

export const INSIGHT_TYPE_LABELS: Record<InsightType, string> = {
  seasonality: "Seasonality",
  trend: "Trend",
  "customer-segment": "Customer Segment",
  correlation: "Correlation",
  anomaly: "Anomaly",
};

const PRIORITY_MARKERS: Record<InsightPriority, string> = {
  high: "[HIGH]",
  medium: "[MEDIUM]",
  low: "[LOW]",
};

function countByPriority(insights: Insight[], priority: InsightPriority) {
  return insights.filter((i) => i.priority === priority).length;
}

/**
 * Render a ranked insight list as plain text
 */
export function generateInsightReport(
  insights: Insight[],
  options: ReportOptions = {},
): string {
  const { title = "Insight Analysis Report" } = options;

  const report = [
    "=".repeat(60),
    title,
    "=".repeat(60),
    "",
    `Total insights: ${insights.length}`,
    `High priority: ${countByPriority(insights, "high")}`,
    `Medium priority: ${countByPriority(insights, "medium")}`,
    `Low priority: ${countByPriority(insights, "low")}`,
    "",
    "-".repeat(50),
    "Insights by priority",
    "-".repeat(50),
  ];

  if (insights.length === 0) {
    report.push("", "No insights found.");
  }

  insights.forEach((insight, index) => {
    report.push(
      "",
      `${index + 1}. ${INSIGHT_TYPE_LABELS[insight.type]} ${PRIORITY_MARKERS[insight.priority]}`,
      `   ${insight.insight}`,
      `   Confidence: ${Math.round(insight.confidence)}%`,
      `   Recommended: ${insight.actionable}`,
    );
  });

  return report.join("\n");
}

/**
 * Actions of the top high-priority insights, labelled by insight type
 */
export function getPriorityActions(insights: Insight[], limit = 5): string[] {
  return insights
    .filter((i) => i.priority === "high")
    .slice(0, limit)
    .map((i) => `${INSIGHT_TYPE_LABELS[i.type]}: ${i.actionable}`);
}
