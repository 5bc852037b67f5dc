/**
 * Customer Segmentation (RFM)
 *
 * Classifies customers against population averages of recency, frequency and
 * monetary value. Segments are NOT mutually exclusive: a customer matching
 * several rules is counted in each of them, so segment percentages can add up
 * to more than 100%.
 */

import { formatCurrency } from "@/lib/utils";
import { mean } from "./stats";
import type {
  CustomerRecord,
  InsightPriority,
  SegmentInsight,
  SegmentKey,
} from "./types";

export interface PopulationAverages {
  recency: number;
  frequency: number;
  monetary: number;
}

export interface SegmentDefinition {
  name: string;
  action: string;
  matches: (customer: CustomerRecord, avg: PopulationAverages) => boolean;
}

export interface SegmentOptions {
  currency?: string;
}

export const SEGMENT_DEFINITIONS: Record<SegmentKey, SegmentDefinition> = {
  champions: {
    name: "Champions",
    action: "Offer exclusive experiences and a rewards program.",
    matches: (c, avg) =>
      c.recency < avg.recency &&
      c.frequency > avg.frequency &&
      c.monetary > avg.monetary,
  },
  loyal: {
    name: "Loyal Customers",
    action: "Present upsell and cross-sell opportunities.",
    matches: (c, avg) =>
      c.recency < avg.recency * 1.5 && c.frequency > avg.frequency,
  },
  potentialLoyalist: {
    name: "Potential Loyalists",
    action: "Invite them into the loyalty program.",
    matches: (c, avg) =>
      c.recency < avg.recency && c.frequency <= avg.frequency,
  },
  atRisk: {
    name: "At Risk",
    action: "Win them back with rewards and personalized outreach.",
    matches: (c, avg) =>
      c.recency > avg.recency * 1.5 && c.frequency <= avg.frequency,
  },
  cannotLoseThem: {
    name: "Cannot Lose Them",
    action: "Give personal attention and dedicated support.",
    matches: (c, avg) =>
      c.recency > avg.recency && c.monetary > avg.monetary * 1.5,
  },
  hibernating: {
    name: "Hibernating",
    action: "Run a reactivation campaign.",
    matches: (c, avg) =>
      c.recency > avg.recency * 2 && c.frequency <= avg.frequency * 0.5,
  },
};

// Order in which segment insights are emitted
const SEGMENT_KEYS: SegmentKey[] = [
  "champions",
  "loyal",
  "potentialLoyalist",
  "atRisk",
  "cannotLoseThem",
  "hibernating",
];

const HIGH_PRIORITY_SEGMENTS = new Set<SegmentKey>([
  "champions",
  "atRisk",
  "cannotLoseThem",
]);

function segmentPriority(
  segment: SegmentKey,
  percentage: number,
): InsightPriority {
  if (HIGH_PRIORITY_SEGMENTS.has(segment)) return "high";
  if (percentage > 20) return "medium";
  return "low";
}

export function analyzeCustomerSegments(
  customers: CustomerRecord[],
  options: SegmentOptions = {},
): SegmentInsight[] {
  if (customers.length === 0) return [];

  const { currency = "USD" } = options;
  const avg: PopulationAverages = {
    recency: mean(customers.map((c) => c.recency)),
    frequency: mean(customers.map((c) => c.frequency)),
    monetary: mean(customers.map((c) => c.monetary)),
  };

  const insights: SegmentInsight[] = [];

  for (const segment of SEGMENT_KEYS) {
    const definition = SEGMENT_DEFINITIONS[segment];
    const members = customers.filter((c) => definition.matches(c, avg));
    if (members.length === 0) continue;

    const count = members.length;
    const percentage = (count / customers.length) * 100;
    const avgFrequency = mean(members.map((c) => c.frequency));
    const avgMonetary = mean(members.map((c) => c.monetary));

    insights.push({
      type: "customer-segment",
      insight: `${definition.name}: ${count} customers (${percentage.toFixed(1)}%), averaging ${avgFrequency.toFixed(1)} purchases and ${formatCurrency(avgMonetary, currency)} in spend.`,
      confidence: 78,
      actionable: definition.action,
      priority: segmentPriority(segment, percentage),
      data: { segment, count, percentage, avgFrequency, avgMonetary },
    });
  }

  return insights;
}
