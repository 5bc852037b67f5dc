/**
 * Validation for analysis input arriving from a host as untyped data (decoded
 * JSON, spreadsheet rows). Timestamps may be Date objects, ISO strings or unix
 * seconds/milliseconds and are normalized to Date.
 */

import { z } from "zod";
import { parseTimestamp } from "@/lib/utils";
import type { AnalysisInput } from "./types";

const timestampSchema = z
  .union([z.date(), z.string(), z.number()])
  .transform((value, ctx) => {
    const ms = parseTimestamp(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Invalid timestamp",
      });
      return z.NEVER;
    }
    return new Date(ms);
  });

const finiteNumber = z.number().finite();

export const timeSeriesPointSchema = z.object({
  date: timestampSchema,
  value: finiteNumber,
});

export const customerRecordSchema = z.object({
  customerId: z.string().min(1, "customerId is required"),
  recency: finiteNumber,
  frequency: finiteNumber,
  monetary: finiteNumber,
});

export const dataPointSchema = z.record(
  z.string(),
  z.union([z.number(), z.string(), z.date()]),
);

export const analysisInputSchema = z.object({
  timeSeries: z.array(timeSeriesPointSchema).optional(),
  customers: z
    .array(customerRecordSchema)
    .superRefine((customers, ctx) => {
      const seen = new Set<string>();
      customers.forEach((customer, index) => {
        if (seen.has(customer.customerId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate customerId "${customer.customerId}"`,
            path: [index, "customerId"],
          });
        }
        seen.add(customer.customerId);
      });
    })
    .optional(),
  tabularSample: z.array(dataPointSchema).optional(),
});

/**
 * @throws Error naming the first invalid field
 */
export function parseAnalysisInput(raw: unknown): AnalysisInput {
  const parsed = analysisInputSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const path = issue.path.length > 0 ? issue.path.join(".") : "input";
    throw new Error(`Invalid analysis input at ${path}: ${issue.message}`);
  }

  return parsed.data;
}
