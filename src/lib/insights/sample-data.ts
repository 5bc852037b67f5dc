/**
 * Synthetic business data for demos
 *
 * - Daily sales with yearly and half-yearly cycles, linear growth and noise,
 *   plus a campaign spike on day 180 and an outage dip on day 300
 * - Four customer cohorts (champions, loyal, at risk, potential)
 * - Tabular rows where sales depend on ad spend, temperature and events
 */

import type {
  AnalysisInput,
  CustomerRecord,
  DataPoint,
  TimeSeriesPoint,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SampleDataOptions {
  startDate?: Date;
  days?: number;
  tabularRows?: number;
  random?: () => number; // Uniform in [0, 1)
}

type RequiredSample = Required<AnalysisInput>;

interface CohortSpec {
  prefix: string;
  size: number;
  recency: [number, number]; // [min, span]
  frequency: [number, number];
  monetary: [number, number];
}

const COHORTS: CohortSpec[] = [
  {
    prefix: "champion",
    size: 50,
    recency: [1, 15],
    frequency: [10, 5],
    monetary: [100000, 50000],
  },
  {
    prefix: "loyal",
    size: 80,
    recency: [5, 30],
    frequency: [6, 4],
    monetary: [50000, 40000],
  },
  {
    prefix: "atrisk",
    size: 60,
    recency: [60, 60],
    frequency: [2, 3],
    monetary: [20000, 30000],
  },
  {
    prefix: "potential",
    size: 120,
    recency: [1, 20],
    frequency: [1, 3],
    monetary: [10000, 25000],
  },
];

function generateTimeSeries(
  startDate: Date,
  days: number,
  random: () => number,
): TimeSeriesPoint[] {
  const series: TimeSeriesPoint[] = [];

  for (let i = 0; i < days; i++) {
    const seasonal =
      1000 +
      300 * Math.sin((2 * Math.PI * i) / 365) +
      150 * Math.sin((4 * Math.PI * i) / 365);
    const trend = i * 0.8;
    const noise = (random() - 0.5) * 200;

    let event = 0;
    if (i === 180) event = 1200;
    if (i === 300) event = -500;

    series.push({
      date: new Date(startDate.getTime() + i * DAY_MS),
      value: Math.max(0, seasonal + trend + noise + event),
    });
  }

  return series;
}

function generateCustomers(random: () => number): CustomerRecord[] {
  const pick = ([min, span]: [number, number]) =>
    Math.floor(random() * span) + min;

  return COHORTS.flatMap((cohort) =>
    Array.from({ length: cohort.size }, (_, i) => ({
      customerId: `${cohort.prefix}_${i}`,
      recency: pick(cohort.recency),
      frequency: pick(cohort.frequency),
      monetary: pick(cohort.monetary),
    })),
  );
}

function generateTabularSample(
  rows: number,
  random: () => number,
): DataPoint[] {
  return Array.from({ length: rows }, (_, i) => {
    const adSpend = random() * 100 + 50;
    const temperature = random() * 25 + 10;
    const eventCount = Math.floor(random() * 6);

    const sales =
      adSpend * 3.2 +
      Math.max(0, temperature - 15) * 15 +
      eventCount * 120 +
      random() * 500;

    return {
      id: i + 1,
      adSpend: Math.round(adSpend),
      temperature: Math.round(temperature * 10) / 10,
      eventCount,
      sales: Math.round(sales),
    };
  });
}

export function generateSampleData(
  options: SampleDataOptions = {},
): RequiredSample {
  const {
    startDate = new Date(Date.UTC(2023, 0, 1)),
    days = 365,
    tabularRows = 100,
    random = Math.random,
  } = options;

  return {
    timeSeries: generateTimeSeries(startDate, days, random),
    customers: generateCustomers(random),
    tabularSample: generateTabularSample(tabularRows, random),
  };
}
