import { describe, it, expect } from "vitest";
import {
  buildInsightSnapshot,
  type InsightSnapshotContent,
} from "@/lib/insights/snapshot";
import type { Insight, InsightPriority } from "@/lib/insights/types";

function insight(label: string, priority: InsightPriority): Insight {
  return {
    type: "anomaly",
    insight: `finding ${label}`,
    confidence: 88,
    actionable: `action ${label}`,
    priority,
    data: {
      anomalyCount: 1,
      mostExtreme: {
        index: 0,
        value: 1,
        date: new Date(Date.UTC(2024, 0, 1)),
        zScore: 3,
      },
    },
  };
}

const generatedAt = new Date(Date.UTC(2024, 0, 1));

describe("buildInsightSnapshot", () => {
  it("names the snapshot after the generation time", () => {
    expect(buildInsightSnapshot([], { generatedAt }).memoryName).toBe(
      "insights-1704067200000",
    );
  });

  it("summarizes findings and next actions", () => {
    const insights = [
      insight("a", "high"),
      insight("b", "medium"),
      insight("c", "high"),
      insight("d", "low"),
    ];

    const snapshot = buildInsightSnapshot(insights, {
      project: "q1-review",
      generatedAt,
    });
    const content: InsightSnapshotContent = JSON.parse(snapshot.content);

    expect(content.timestamp).toBe("2024-01-01T00:00:00.000Z");
    expect(content.project).toBe("q1-review");
    expect(content.totalInsights).toBe(4);
    expect(content.highPriorityCount).toBe(2);
    expect(content.insights[1]).toEqual({
      type: "anomaly",
      insight: "finding b",
      confidence: 88,
      priority: "medium",
      actionable: "action b",
    });
    expect(content.summary).toEqual({
      keyFindings: ["finding a", "finding b", "finding c"],
      nextActions: ["action a", "action c"],
    });
  });

  it("uses a default project name", () => {
    const content: InsightSnapshotContent = JSON.parse(
      buildInsightSnapshot([], { generatedAt }).content,
    );

    expect(content.project).toBe("insight-analysis");
  });
});
