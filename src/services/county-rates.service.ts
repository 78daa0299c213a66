/**
 * County Rates Service
 * Crashes per 100k residents for each county
 *
 * County names are matched case-insensitively after trimming. Counties in
 * the census with no crashes are listed with zero; counties without a
 * population get no rate and sort to the bottom.
 */

import Papa from "papaparse";
import type { CrashRecord } from "../types/crash.types.js";
import type { CountyRate } from "../types/rates.types.js";
import { COUNTY_RATES } from "../config/constants.js";

function normalizeCounty(value: unknown): string {
  return value == null ? "" : String(value).trim().toLowerCase();
}

/** "lewis and clark" -> "Lewis And Clark" */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/[a-z]+/g, (word) => word[0].toUpperCase() + word.slice(1));
}

/**
 * Population per county from census rows (COUNTY, TOT_POP).
 * Non-integer populations count as 0.
 */
export function loadCensusPopulations(rows: Iterable<Record<string, unknown>>): Map<string, number> {
  const populations = new Map<string, number>();

  for (const row of rows) {
    const county = normalizeCounty(row.COUNTY);
    if (!county) continue;
    const raw = row.TOT_POP == null ? "" : String(row.TOT_POP).trim();
    const population = /^[+-]?\d+$/.test(raw) ? Number(raw) : 0;
    populations.set(county, population);
  }

  return populations;
}

/**
 * Crash count per county, in order of first appearance.
 */
export function countCrashesByCounty(crashes: Iterable<CrashRecord>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const crash of crashes) {
    const county = normalizeCounty(crash.COUNTY);
    if (!county) continue;
    counts.set(county, (counts.get(county) ?? 0) + 1);
  }
  return counts;
}

/**
 * Rank counties by crashes per 100k residents, highest first.
 */
export function computeCountyRates(
  counts: ReadonlyMap<string, number>,
  populations: ReadonlyMap<string, number>
): CountyRate[] {
  const totals = new Map(counts);
  for (const county of populations.keys()) {
    if (!totals.has(county)) totals.set(county, 0);
  }

  const rates: CountyRate[] = [];
  for (const [county, total] of totals) {
    const population = populations.get(county) ?? 0;
    rates.push({
      county: titleCase(county),
      totalAccidents: total,
      accidentsPer100kResidents: population > 0 ? (total / population) * COUNTY_RATES.PER_RESIDENTS : null,
    });
  }

  const sortValue = (rate: CountyRate) => rate.accidentsPer100kResidents ?? -1;
  return rates.sort((a, b) => sortValue(b) - sortValue(a));
}

export function toCountyCsv(rates: CountyRate[]): string {
  return Papa.unparse({
    fields: ["county", "totalAccidents", "accidentsPer100kResidents"],
    data: rates.map((r) => [
      r.county,
      r.totalAccidents,
      r.accidentsPer100kResidents === null ? "" : r.accidentsPer100kResidents.toFixed(2),
    ]),
  });
}
