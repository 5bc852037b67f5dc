/**
 * Serializable summary of an analysis run, shaped for a project memory store.
 * Building the snapshot does not persist it.
 */

import type { Insight, InsightPriority } from "./types";

export interface SnapshotOptions {
  project?: string;
  generatedAt: Date;
}

export interface InsightSnapshotContent {
  timestamp: string;
  project: string;
  totalInsights: number;
  highPriorityCount: number;
  insights: {
    type: string;
    insight: string;
    confidence: number;
    priority: InsightPriority;
    actionable: string;
  }[];
  summary: {
    keyFindings: string[];
    nextActions: string[];
  };
}

export interface InsightSnapshot {
  memoryName: string;
  content: string; // JSON of InsightSnapshotContent
}

export function buildInsightSnapshot(
  insights: Insight[],
  options: SnapshotOptions,
): InsightSnapshot {
  const { project = "insight-analysis", generatedAt } = options;
  const highPriority = insights.filter((i) => i.priority === "high");

  const content: InsightSnapshotContent = {
    timestamp: generatedAt.toISOString(),
    project,
    totalInsights: insights.length,
    highPriorityCount: highPriority.length,
    insights: insights.map((i) => ({
      type: i.type,
      insight: i.insight,
      confidence: i.confidence,
      priority: i.priority,
      actionable: i.actionable,
    })),
    summary: {
      keyFindings: insights.slice(0, 3).map((i) => i.insight),
      nextActions: highPriority.map((i) => i.actionable),
    },
  };

  return {
    memoryName: `insights-${generatedAt.getTime()}`,
    content: JSON.stringify(content, null, 2),
  };
}
