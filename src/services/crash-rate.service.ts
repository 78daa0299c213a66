/**
 * Crash Rate Service
 * Turns per-segment crash counts into crashes per 100M vehicle miles
 *
 *   avgCrashes  = totalCrashes / years
 *   dailyVmt    = section length (mi) x AADT
 *   annualVmt   = dailyVmt x days per year
 *   per100mVmt  = avgCrashes / annualVmt x 100,000,000
 *
 * Segments without a length or AADT get null VMT and a null rate.
 */

import type { Feature } from "../types/geo.types.js";
import type { Segment } from "../types/segment.types.js";
import type { MergedSegmentProperties, SegmentRate } from "../types/rates.types.js";
import { SegmentKeyMap, formatSegmentKey } from "../utils/segment-key.js";
import { lookupSignedRoute } from "./traffic.service.js";
import { CRASH_RATES } from "../config/constants.js";

export interface CrashRateConfig {
  /** Number of years the crash counts span */
  years: number;
  daysPerYear: number;
}

export const DEFAULT_CRASH_RATE_CONFIG: CrashRateConfig = {
  years: CRASH_RATES.YEARS.length,
  daysPerYear: CRASH_RATES.DAYS_PER_YEAR,
};

export function computeSegmentRate(
  segment: Segment,
  totalCrashes: number,
  config: CrashRateConfig = DEFAULT_CRASH_RATE_CONFIG
): SegmentRate {
  const avgCrashes = totalCrashes / config.years;
  const dailyVmt =
    segment.lengthMiles !== null && segment.aadt !== null ? segment.lengthMiles * segment.aadt : null;
  const annualVmt = dailyVmt !== null ? dailyVmt * config.daysPerYear : null;
  const per100mVmt =
    annualVmt !== null && annualVmt > 0 ? (avgCrashes / annualVmt) * CRASH_RATES.VMT_UNIT : null;

  return { segment, totalCrashes, avgCrashes, dailyVmt, annualVmt, per100mVmt };
}

/**
 * Rates for every segment; segments absent from counts had no crashes.
 */
export function computeSegmentRates(
  segments: Segment[],
  counts: SegmentKeyMap<number>,
  config: CrashRateConfig = DEFAULT_CRASH_RATE_CONFIG
): SegmentRate[] {
  return segments.map((segment) => computeSegmentRate(segment, counts.get(segment.key) ?? 0, config));
}

/**
 * Build the merged traffic line features.
 * Segments with no geometry in the lookup are skipped.
 */
export function buildMergedFeatures(
  rates: SegmentRate[],
  geometries: SegmentKeyMap<Feature>,
  signedRoutes: ReadonlyMap<string, string>
): Feature<MergedSegmentProperties>[] {
  const features: Feature<MergedSegmentProperties>[] = [];

  for (const rate of rates) {
    const { segment } = rate;
    const source = geometries.get(segment.key);
    if (!source?.geometry) continue;

    features.push({
      type: "Feature",
      geometry: source.geometry,
      properties: {
        SEGMENT_KEY: formatSegmentKey(segment.key),
        CORRIDOR: segment.corridorId,
        CORR_MP: segment.key.startMilepost,
        CORR_ENDMP: segment.key.endMilepost,
        DEPT_ID: segment.departmentId,
        SEC_LNT_MI: segment.lengthMiles ?? "",
        SIGNED_ROUTE: lookupSignedRoute(signedRoutes, segment.departmentId),
        TOTAL_CRASHES: rate.totalCrashes,
        AVG_CRASHES: rate.avgCrashes,
        PER_100M_VMT: rate.per100mVmt ?? "",
        TYC_AADT: segment.aadt ?? "",
      },
    });
  }

  return features;
}
