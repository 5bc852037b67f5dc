/**
 * Engine configuration from environment variables
 *
 * - INSIGHT_ANOMALY_THRESHOLD: z-score above which a point is anomalous (default 2.5)
 * - INSIGHT_CURRENCY: ISO 4217 code used in monetary narratives (default USD)
 */

import { z } from "zod";
import { DEFAULT_ANOMALY_THRESHOLD } from "./anomaly";
import type { InsightEngineOptions } from "./engine";

export type InsightConfig = Required<InsightEngineOptions>;

const thresholdSchema = z.coerce.number().finite().positive();
const currencySchema = z.string().regex(/^[A-Z]{3}$/);

function readEnv(
  env: Record<string, string | undefined>,
  name: string,
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function getInsightConfig(
  env: Record<string, string | undefined> = process.env,
): InsightConfig {
  const rawThreshold = readEnv(env, "INSIGHT_ANOMALY_THRESHOLD");
  const rawCurrency = readEnv(env, "INSIGHT_CURRENCY");

  let anomalyThreshold = DEFAULT_ANOMALY_THRESHOLD;
  if (rawThreshold !== undefined) {
    const parsed = thresholdSchema.safeParse(rawThreshold);
    if (!parsed.success) {
      throw new Error(
        `INSIGHT_ANOMALY_THRESHOLD must be a positive number. Got "${rawThreshold}".`,
      );
    }
    anomalyThreshold = parsed.data;
  }

  let currency = "USD";
  if (rawCurrency !== undefined) {
    const parsed = currencySchema.safeParse(rawCurrency.toUpperCase());
    if (!parsed.success) {
      throw new Error(
        `INSIGHT_CURRENCY must be a three-letter ISO 4217 code. Got "${rawCurrency}".`,
      );
    }
    currency = parsed.data;
  }

  return { anomalyThreshold, currency };
}
