/**
 * Category Rates Service
 * Length-weighted crash rates by road category
 *
 * Every merged segment lands in one of six buckets:
 * (interstate | non-interstate) x (inside | outside municipality limits),
 * plus the "all_inside" / "all_outside" rollups. Municipality membership is
 * a line/polygon intersection test delegated to Turf.
 */

import * as turf from "@turf/turf";
import type {
  Feature as GeoJsonFeature,
  LineString,
  MultiLineString,
  MultiPolygon,
  Polygon,
} from "geojson";
import type { Feature, Geometry } from "../types/geo.types.js";
import type {
  CategoryName,
  CategorySegment,
  CategorySummary,
  WeightedAverage,
} from "../types/rates.types.js";
import { AADT_RULES, CRASH_COUNT_RULES, firstMatchingField } from "../utils/field-rules.js";
import { parseNumber } from "../utils/milepost.js";
import { isLine } from "../utils/geojson.js";
import { lineLengthMiles } from "./geo.service.js";
import { CATEGORY_RATES, CRASH_RATES } from "../config/constants.js";

export type MunicipalityPolygon = GeoJsonFeature<Polygon | MultiPolygon>;

export const CATEGORY_NAMES: readonly CategoryName[] = [
  "all_outside",
  "non_interstate_outside",
  "interstate_outside",
  "all_inside",
  "non_interstate_inside",
  "interstate_inside",
];

// ============================================
// Municipalities
// ============================================

function isRings(value: unknown): value is number[][][] {
  return Array.isArray(value) && value.every(isLine);
}

function isPolygonList(value: unknown): value is number[][][][] {
  return Array.isArray(value) && value.every(isRings);
}

/**
 * Turn municipality features into Turf polygons.
 * Excluded names and unusable geometries are skipped with a warning.
 */
export function prepareMunicipalities(
  features: Feature[],
  excludedNames: readonly string[] = CATEGORY_RATES.EXCLUDED_MUNICIPALITIES
): MunicipalityPolygon[] {
  const polygons: MunicipalityPolygon[] = [];

  for (const feature of features) {
    const name = typeof feature.properties.NAME === "string" ? feature.properties.NAME : "";
    if (excludedNames.includes(name)) continue;

    const geometry = feature.geometry;
    try {
      if (geometry?.type === "Polygon" && isRings(geometry.coordinates)) {
        polygons.push(turf.polygon(geometry.coordinates, { NAME: name }));
      } else if (geometry?.type === "MultiPolygon" && isPolygonList(geometry.coordinates)) {
        polygons.push(turf.multiPolygon(geometry.coordinates, { NAME: name }));
      } else {
        console.warn(`[categories] Skipping municipality without polygon geometry: ${name}`);
      }
    } catch (error) {
      // turf rejects unclosed or too-short rings
      console.warn(`[categories] Skipping invalid municipality geometry: ${name}`, error);
    }
  }

  console.log(
    `[categories] Loaded ${polygons.length} municipalities (excluding ${excludedNames.join(" and ")})`
  );
  return polygons;
}

function toTurfLine(geometry: Geometry | null): GeoJsonFeature<LineString | MultiLineString> | null {
  if (geometry?.type === "LineString" && geometry.coordinates.length >= 2) {
    return turf.lineString(geometry.coordinates);
  }
  if (geometry?.type === "MultiLineString") {
    const parts = geometry.coordinates.filter((part) => part.length >= 2);
    return parts.length > 0 ? turf.multiLineString(parts) : null;
  }
  return null;
}

/**
 * True when the line touches or crosses any municipality polygon.
 */
export function isInsideMunicipality(geometry: Geometry | null, municipalities: MunicipalityPolygon[]): boolean {
  const line = toTurfLine(geometry);
  if (!line) return false;
  return municipalities.some((polygon) => turf.booleanIntersects(line, polygon));
}

// ============================================
// Classification
// ============================================

export function isInterstate(properties: Record<string, unknown>): boolean {
  const prefix = CATEGORY_RATES.INTERSTATE_PREFIX;
  const signed = typeof properties.SIGNED_ROUTE === "string" ? properties.SIGNED_ROUTE : "";
  if (signed.startsWith(prefix)) return true;
  const dept = typeof properties.DEPT_ID === "string" ? properties.DEPT_ID : "";
  return dept.trim().toUpperCase().startsWith(prefix);
}

/**
 * Extract the rate inputs from one merged feature.
 * @returns null when the feature has no positive rate or no usable length
 */
export function toCategorySegment(feature: Feature): CategorySegment | null {
  const p = feature.properties;

  const crashRate = parseNumber(p.PER_100M_VMT);
  if (crashRate === null || crashRate <= 0) return null;

  // Official section length first, geometry length as the fallback
  const officialLength = parseNumber(p.SEC_LNT_MI);
  let lengthMiles = officialLength;
  if (lengthMiles === null) {
    if (feature.geometry?.type !== "LineString") return null;
    lengthMiles = lineLengthMiles(feature.geometry.coordinates);
  }

  const totalCrashes = firstMatchingField(p, CRASH_COUNT_RULES) ?? 0;
  const aadt = firstMatchingField(p, AADT_RULES) ?? 0;
  const dailyVmt = aadt > 0 ? lengthMiles * aadt : 0;

  return {
    segmentKey: typeof p.SEGMENT_KEY === "string" ? p.SEGMENT_KEY : "",
    lengthMiles,
    crashRate,
    totalCrashes,
    dailyVmt,
  };
}

/**
 * Sort merged features into the six categories.
 */
export function categorizeSegments(
  features: Feature[],
  municipalities: MunicipalityPolygon[]
): Record<CategoryName, CategorySegment[]> {
  const categories: Record<CategoryName, CategorySegment[]> = {
    all_outside: [],
    non_interstate_outside: [],
    interstate_outside: [],
    all_inside: [],
    non_interstate_inside: [],
    interstate_inside: [],
  };

  features.forEach((feature, idx) => {
    if (idx % 1000 === 0) {
      console.log(`[categories] Processed ${idx}/${features.length} segments...`);
    }

    const segment = toCategorySegment(feature);
    if (!segment) return;

    const interstate = isInterstate(feature.properties);
    const inside = isInsideMunicipality(feature.geometry, municipalities);

    if (inside) {
      categories.all_inside.push(segment);
      categories[interstate ? "interstate_inside" : "non_interstate_inside"].push(segment);
    } else {
      categories.all_outside.push(segment);
      categories[interstate ? "interstate_outside" : "non_interstate_outside"].push(segment);
    }
  });

  return categories;
}

// ============================================
// Aggregation
// ============================================

/**
 * Length-weighted average crash rate.
 *
 * @example
 * weightedAverage([
 *   { lengthMiles: 1, crashRate: 100, ... },
 *   { lengthMiles: 3, crashRate: 20, ... },
 * ]);
 * // Returns: { weightedRate: 40, totalMiles: 4, milesPerCrash: 2500000 }
 */
export function weightedAverage(segments: CategorySegment[]): WeightedAverage {
  let weighted = 0;
  let totalMiles = 0;
  for (const segment of segments) {
    weighted += segment.crashRate * segment.lengthMiles;
    totalMiles += segment.lengthMiles;
  }

  if (totalMiles === 0) {
    return { weightedRate: 0, totalMiles: 0, milesPerCrash: null };
  }

  const weightedRate = weighted / totalMiles;
  return {
    weightedRate,
    totalMiles,
    milesPerCrash: weightedRate > 0 ? CRASH_RATES.VMT_UNIT / weightedRate : null,
  };
}

export function summarize(category: CategorySummary["category"], segments: CategorySegment[]): CategorySummary {
  return {
    category,
    segmentCount: segments.length,
    totalCrashes: segments.reduce((sum, s) => sum + s.totalCrashes, 0),
    totalDailyMiles: segments.reduce((sum, s) => sum + s.dailyVmt, 0),
    ...weightedAverage(segments),
  };
}

/**
 * One summary per category, followed by the all-roads rollup.
 */
export function summarizeCategories(categories: Record<CategoryName, CategorySegment[]>): CategorySummary[] {
  const summaries = CATEGORY_NAMES.map((name) => summarize(name, categories[name]));
  summaries.push(summarize("all", [...categories.all_outside, ...categories.all_inside]));
  return summaries;
}
