import { describe, it, expect } from "vitest";
import { generateInsightReport, getPriorityActions } from "@/lib/insights/report";
import type { Insight } from "@/lib/insights/types";

const insights: Insight[] = [
  {
    type: "correlation",
    insight: "x and y show a very strong positive correlation (r=1.000).",
    confidence: 95,
    actionable: "Optimizing x is likely to lift y.",
    priority: "high",
    data: { field1: "x", field2: "y", correlation: 1 },
  },
  {
    type: "customer-segment",
    insight: "Loyal Customers: 2 customers (50.0%).",
    confidence: 78,
    actionable: "Present upsell and cross-sell opportunities.",
    priority: "medium",
    data: {
      segment: "loyal",
      count: 2,
      percentage: 50,
      avgFrequency: 10,
      avgMonetary: 1000,
    },
  },
  {
    type: "trend",
    insight: "Series shows a growth trend.",
    confidence: 82,
    actionable: "Keep the current strategy.",
    priority: "low",
    data: { slope: 1, intercept: 0, growthRate: 5 },
  },
];

describe("generateInsightReport", () => {
  it("lists counts and every insight in the given order", () => {
    expect(generateInsightReport(insights)).toBe(
      [
        "=".repeat(60),
        "Insight Analysis Report",
        "=".repeat(60),
        "",
        "Total insights: 3",
        "High priority: 1",
        "Medium priority: 1",
        "Low priority: 1",
        "",
        "-".repeat(50),
        "Insights by priority",
        "-".repeat(50),
        "",
        "1. Correlation [HIGH]",
        "   x and y show a very strong positive correlation (r=1.000).",
        "   Confidence: 95%",
        "   Recommended: Optimizing x is likely to lift y.",
        "",
        "2. Customer Segment [MEDIUM]",
        "   Loyal Customers: 2 customers (50.0%).",
        "   Confidence: 78%",
        "   Recommended: Present upsell and cross-sell opportunities.",
        "",
        "3. Trend [LOW]",
        "   Series shows a growth trend.",
        "   Confidence: 82%",
        "   Recommended: Keep the current strategy.",
      ].join("\n"),
    );
  });

  it("says so when there is nothing to report", () => {
    const lines = generateInsightReport([], { title: "Weekly Review" }).split(
      "\n",
    );

    expect(lines[1]).toBe("Weekly Review");
    expect(lines[4]).toBe("Total insights: 0");
    expect(lines[lines.length - 1]).toBe("No insights found.");
  });

  it("rounds fractional confidence", () => {
    const report = generateInsightReport([
      { ...insights[0], confidence: 67.6 },
    ]);

    expect(report.split("\n")).toContain("   Confidence: 68%");
  });
});

describe("getPriorityActions", () => {
  it("labels the actions of high-priority insights", () => {
    expect(getPriorityActions(insights)).toEqual([
      "Correlation: Optimizing x is likely to lift y.",
    ]);
  });

  it("stops at the limit", () => {
    const highs: Insight[] = [insights[0], insights[0], insights[0]];

    expect(getPriorityActions(highs, 2)).toHaveLength(2);
  });
});
