/**
 * Ordered field accessor rules.
 *
 * Merged feature files written by different tool versions name the same
 * value differently (TOTAL_CRASHES vs TOTAL_CRASHES_5YR, TYC_AADT vs AADT).
 * A rule list is evaluated in order and the first field that yields an
 * accepted value wins.
 */

import { parseNumber } from "./milepost.js";

export interface FieldRule<T> {
  field: string;
  parse: (value: unknown) => T | null;
}

/**
 * Evaluate rules in order against a property bag.
 * @returns The first accepted value, or null when no rule produced one
 */
export function firstMatchingField<T>(
  properties: Record<string, unknown>,
  rules: readonly FieldRule<T>[]
): T | null {
  for (const rule of rules) {
    const raw = properties[rule.field];
    if (raw === null || raw === undefined) continue;
    const value = rule.parse(raw);
    if (value !== null) return value;
  }
  return null;
}

/** Whole count: any numeric value, truncated toward zero */
export function parseCount(value: unknown): number | null {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

/** Positive number only; zero and negatives fall through to the next rule */
export function parsePositive(value: unknown): number | null {
  const parsed = parseNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

export const CRASH_COUNT_RULES: readonly FieldRule<number>[] = [
  "TOTAL_CRASHES",
  "TOTAL",
  "TOTAL_CRASHES_5YR",
  "TOTAL_CRASH",
].map((field) => ({ field, parse: parseCount }));

export const AADT_RULES: readonly FieldRule<number>[] = [
  "TYC_AADT",
  "AADT",
  "AVG_AADT",
  "TYC_AADT_EST",
  "EST_AADT",
].map((field) => ({ field, parse: parsePositive }));
