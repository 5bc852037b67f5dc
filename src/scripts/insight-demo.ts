import {
  InsightEngine,
  buildInsightSnapshot,
  describeCustomers,
  describeTimeSeries,
  generateSampleData,
  getInsightConfig,
  getPriorityActions,
} from "@/lib/insights";
import { formatCurrency, formatNumber } from "@/lib/utils";

function runDemo() {
  try {
    const config = getInsightConfig();
    const engine = new InsightEngine(config);

    console.log("[Insights] Generating sample data...");
    const sample = generateSampleData();

    console.log(
      `[Insights] Time series: ${sample.timeSeries.length} days, customers: ${sample.customers.length}, tabular rows: ${sample.tabularSample.length}`,
    );
    console.log(
      `[Insights] Running analysis (anomaly threshold ${config.anomalyThreshold}σ)...\n`,
    );

    const insights = engine.analyze(sample);
    console.log(engine.report(insights));

    const seriesStats = describeTimeSeries(sample.timeSeries);
    const customerStats = describeCustomers(sample.customers);

    console.log("\nDataset statistics:");
    console.log(`- Sales mean: ${formatNumber(seriesStats.mean)}`);
    console.log(`- Sales standard deviation: ${formatNumber(seriesStats.stdDev)}`);
    console.log(`- Sales max: ${formatNumber(seriesStats.max)}`);
    console.log(`- Sales min: ${formatNumber(seriesStats.min)}`);
    console.log(
      `- Average customer value: ${formatCurrency(customerStats.avgMonetary, config.currency)}`,
    );
    console.log(
      `- Average purchase frequency: ${formatNumber(customerStats.avgFrequency, 1)}`,
    );

    console.log("\nRecommended next steps:");
    getPriorityActions(insights).forEach((action, index) => {
      console.log(`${index + 1}. ${action}`);
    });

    const snapshot = buildInsightSnapshot(insights, { generatedAt: new Date() });
    console.log(`\n[Insights] Snapshot ready: ${snapshot.memoryName}`);
  } catch (error) {
    console.error("[Insights] Demo failed:", error);
    process.exit(1);
  }
}

runDemo();
