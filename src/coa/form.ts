/**
 * COA form input: the values a user enters for one certificate.
 *
 * Only the shape is checked here; lab values are passed through as text
 * exactly as entered.
 */

import { z } from "zod";

export const COA_TYPES = ["MOD", "FAR"] as const;
export type CoaType = (typeof COA_TYPES)[number];

export const MAX_BATCHES = 4;

const fieldValue = z.union([z.string(), z.number()]).transform(String).default("");

export const BatchValuesSchema = z.object({
  label: fieldValue,
  moisture: fieldValue,
  viscosity1: fieldValue,
  viscosity2: fieldValue,
  ph: fieldValue,
  // FAR only
  mesh: fieldValue,
  bulkDensity: fieldValue,
  fann3: fieldValue,
  fann30: fieldValue,
});

export type BatchValues = z.infer<typeof BatchValuesSchema>;
export type BatchField = keyof BatchValues;

export const CoaFormSchema = z.object({
  coaType: z.enum(COA_TYPES),
  /** DD/MM/YYYY; defaults to today in the configured time zone. */
  date: z.string().optional(),
  /** Batch 1 first. Missing batches fill with empty values. */
  batches: z.array(BatchValuesSchema).max(MAX_BATCHES).default([]),
});

export type CoaForm = z.infer<typeof CoaFormSchema>;

/** Flat key → value mapping for templates supplied by the caller. */
export const ReplacementValuesSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export function isCoaType(value: string): value is CoaType {
  return (COA_TYPES as readonly string[]).includes(value);
}
