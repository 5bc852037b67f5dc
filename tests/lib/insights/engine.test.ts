import { describe, it, expect } from "vitest";
import {
  analyzeRawInput,
  InsightEngine,
  rankInsights,
  runInsightAnalysis,
} from "@/lib/insights/engine";
import type {
  AnalysisInput,
  CustomerRecord,
  Insight,
  InsightPriority,
} from "@/lib/insights/types";

// Monthly values 100, 110, ..., 210 across 2023
const timeSeries = Array.from({ length: 12 }, (_, i) => ({
  date: new Date(Date.UTC(2023, i, 15)),
  value: 100 + 10 * i,
}));

const customers: CustomerRecord[] = [
  { customerId: "a", recency: 10, frequency: 10, monetary: 1000 },
  { customerId: "b", recency: 10, frequency: 10, monetary: 1000 },
  { customerId: "c", recency: 60, frequency: 1, monetary: 100 },
  { customerId: "d", recency: 20, frequency: 3, monetary: 100 },
];

const tabularSample = [1, 2, 3, 4, 5].map((x) => ({ x, y: 2 * x + 5 }));

const fullInput: AnalysisInput = { timeSeries, customers, tabularSample };

function stub(
  label: string,
  priority: InsightPriority,
  confidence: number,
): Insight {
  return {
    type: "trend",
    insight: label,
    confidence,
    actionable: "",
    priority,
    data: { slope: 0, intercept: 0, growthRate: 0 },
  };
}

describe("rankInsights", () => {
  it("orders by priority, then confidence", () => {
    const ranked = rankInsights([
      stub("low", "low", 99),
      stub("medium-60", "medium", 60),
      stub("high-70", "high", 70),
      stub("medium-90", "medium", 90),
      stub("high-80", "high", 80),
    ]);

    expect(ranked.map((i) => i.insight)).toEqual([
      "high-80",
      "high-70",
      "medium-90",
      "medium-60",
      "low",
    ]);
  });

  it("keeps input order for equal priority and confidence", () => {
    const ranked = rankInsights([
      stub("first", "medium", 78),
      stub("high", "high", 50),
      stub("second", "medium", 78),
      stub("third", "medium", 78),
    ]);

    expect(ranked.map((i) => i.insight)).toEqual([
      "high",
      "first",
      "second",
      "third",
    ]);
  });

  it("does not mutate the input list", () => {
    const insights = [stub("low", "low", 1), stub("high", "high", 1)];

    rankInsights(insights);

    expect(insights[0].insight).toBe("low");
  });
});

describe("runInsightAnalysis", () => {
  it("returns an empty list without inputs", () => {
    expect(runInsightAnalysis()).toEqual([]);
    expect(runInsightAnalysis({})).toEqual([]);
  });

  it("runs only the analyzers whose inputs are present", () => {
    const insights = runInsightAnalysis({ customers });

    expect(new Set(insights.map((i) => i.type))).toEqual(
      new Set(["customer-segment"]),
    );
  });

  it("merges and ranks insights from every analyzer", () => {
    const insights = runInsightAnalysis(fullInput);

    expect(
      insights.map((i) =>
        i.type === "customer-segment" ? `segment:${i.data.segment}` : i.type,
      ),
    ).toEqual([
      "correlation",
      "seasonality",
      "trend",
      "segment:champions",
      "segment:atRisk",
      "segment:loyal",
      "segment:potentialLoyalist",
      "segment:hibernating",
    ]);
  });

  it("is deterministic for identical input", () => {
    expect(runInsightAnalysis(fullInput)).toEqual(runInsightAnalysis(fullInput));
  });

  it("passes the anomaly threshold to the detector", () => {
    const withDefault = runInsightAnalysis({ timeSeries });
    const sensitive = runInsightAnalysis({ timeSeries }, { anomalyThreshold: 1 });

    expect(withDefault.some((i) => i.type === "anomaly")).toBe(false);
    expect(sensitive.some((i) => i.type === "anomaly")).toBe(true);
  });

  it("formats monetary figures in the configured currency", () => {
    const [champions] = runInsightAnalysis({ customers }, { currency: "GBP" });

    expect(champions.insight).toBe(
      "Champions: 2 customers (50.0%), averaging 10.0 purchases and £1,000 in spend.",
    );
  });
});

describe("analyzeRawInput", () => {
  it("analyzes JSON-shaped input with string timestamps", () => {
    const raw = JSON.parse(JSON.stringify(fullInput));

    expect(analyzeRawInput(raw)).toEqual(runInsightAnalysis(fullInput));
  });

  it("rejects malformed input", () => {
    expect(() => analyzeRawInput({ customers: [{ customerId: "a" }] })).toThrow(
      "Invalid analysis input at customers.0.recency: Required",
    );
  });
});

describe("InsightEngine", () => {
  it("applies its options to every analysis", () => {
    const engine = new InsightEngine({ currency: "EUR" });

    const [champions] = engine.analyze({ customers });

    expect(champions.insight).toBe(
      "Champions: 2 customers (50.0%), averaging 10.0 purchases and €1,000 in spend.",
    );
  });

  it("keeps no state between runs", () => {
    const engine = new InsightEngine();

    engine.analyze(fullInput);

    expect(engine.analyze()).toEqual([]);
  });

  it("validates raw input and renders reports", () => {
    const engine = new InsightEngine();
    const insights = engine.analyzeRaw(JSON.parse(JSON.stringify({ customers })));

    const report = engine.report(insights);

    expect(report.split("\n")).toContain(`Total insights: ${insights.length}`);
  });
});
