/**
 * Merge Pipeline Service
 * Joins traffic tables, crash records and segment geometry into the merged
 * traffic lines dataset
 *
 * PIPELINE:
 * ---------
 * 1. Build segments from the base-year TYC table
 * 2. Average AADT across the other years
 * 3. Index segments per corridor and match crashes (linear referencing)
 * 4. Compute per-segment crash rates
 * 5. Filter low-volume and excluded department routes
 * 6. Attach geometry and signed route, emit GeoJSON features
 *
 * All inputs arrive parsed; the caller owns file access.
 */

import type { CrashMatchSummary, CrashRecord } from "../types/crash.types.js";
import type { Feature, FeatureCollection } from "../types/geo.types.js";
import type { OnSystemRouteRecord, SegmentFilter, SegmentRecord } from "../types/segment.types.js";
import type { MergedSegmentProperties } from "../types/rates.types.js";
import { CorridorIntervalIndex } from "./corridor-index.service.js";
import { CrashMatcher } from "./crash-matching.service.js";
import {
  DEFAULT_SEGMENT_FILTER,
  averageTraffic,
  buildGeometryMap,
  buildSegments,
  buildSignedRouteMap,
  filterSegments,
} from "./traffic.service.js";
import {
  DEFAULT_CRASH_RATE_CONFIG,
  buildMergedFeatures,
  computeSegmentRates,
  type CrashRateConfig,
} from "./crash-rate.service.js";
import { SegmentKeyMap } from "../utils/segment-key.js";

export interface MergeInputs {
  baseYear: Iterable<SegmentRecord>;
  otherYears: Iterable<Iterable<SegmentRecord>>;
  crashes: Iterable<CrashRecord>;
  /** Yearly TYC GeoJSON exports, base year first */
  geometries: Iterable<FeatureCollection>;
  onSystemRoutes: Iterable<OnSystemRouteRecord>;
}

export interface MergeOptions {
  rates: CrashRateConfig;
  filter: SegmentFilter;
}

export interface MergeResult {
  features: Feature<MergedSegmentProperties>[];
  crashSummary: CrashMatchSummary;
  segmentCount: number;
  filteredCount: number;
}

export function runMergePipeline(inputs: MergeInputs, options: Partial<MergeOptions> = {}): MergeResult {
  const rateConfig = options.rates ?? DEFAULT_CRASH_RATE_CONFIG;
  const filter = options.filter ?? DEFAULT_SEGMENT_FILTER;

  const segments = averageTraffic(buildSegments(inputs.baseYear), inputs.otherYears);
  console.log(`[merge] ${segments.length} segments from base year`);

  const index = CorridorIntervalIndex.build(segments);
  const crashSummary = new CrashMatcher(index).matchAll(inputs.crashes);

  const filtered = filterSegments(segments, filter);
  const rates = computeSegmentRates(filtered, crashSummary.counts, rateConfig);

  const needed = new SegmentKeyMap<true>();
  for (const segment of filtered) needed.set(segment.key, true);
  const geometries = buildGeometryMap(inputs.geometries, needed);
  const signedRoutes = buildSignedRouteMap(inputs.onSystemRoutes);

  const features = buildMergedFeatures(rates, geometries, signedRoutes);
  console.log(`[merge] ${features.length} merged lines (${filtered.length - features.length} without geometry)`);

  return {
    features,
    crashSummary,
    segmentCount: segments.length,
    filteredCount: filtered.length,
  };
}
