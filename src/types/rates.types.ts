/**
 * Crash Rate Type Definitions
 */

import type { Segment } from "./segment.types.js";

// ============================================
// Per-segment rates
// ============================================

export interface SegmentRate {
  segment: Segment;
  totalCrashes: number;
  avgCrashes: number;
  /** Vehicle miles travelled per day (length x AADT) */
  dailyVmt: number | null;
  annualVmt: number | null;
  /** Crashes per 100 million vehicle miles travelled */
  per100mVmt: number | null;
}

/** Properties written on each merged traffic line */
export interface MergedSegmentProperties {
  [field: string]: unknown;
  SEGMENT_KEY: string;
  CORRIDOR: string;
  CORR_MP: string;
  CORR_ENDMP: string;
  DEPT_ID: string;
  SEC_LNT_MI: number | "";
  SIGNED_ROUTE: string;
  TOTAL_CRASHES: number;
  AVG_CRASHES: number;
  PER_100M_VMT: number | "";
  TYC_AADT: number | "";
}

// ============================================
// Category report
// ============================================

export type CategoryName =
  | "all_outside"
  | "non_interstate_outside"
  | "interstate_outside"
  | "all_inside"
  | "non_interstate_inside"
  | "interstate_inside";

export interface CategorySegment {
  segmentKey: string;
  lengthMiles: number;
  crashRate: number;
  totalCrashes: number;
  dailyVmt: number;
}

export interface WeightedAverage {
  weightedRate: number;
  totalMiles: number;
  /** null when the weighted rate is zero */
  milesPerCrash: number | null;
}

export interface CategorySummary extends WeightedAverage {
  category: CategoryName | "all";
  segmentCount: number;
  totalCrashes: number;
  totalDailyMiles: number;
}

// ============================================
// County report
// ============================================

export interface CountyRate {
  county: string;
  totalAccidents: number;
  accidentsPer100kResidents: number | null;
}
