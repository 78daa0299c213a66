/**
 * Line Deduplication Type Definitions
 */

import type { FeatureRecord } from "./geo.types.js";

/** Tolerances for the spatial grid; every field is optional at call sites */
export interface SpatialMatchOptions {
  /** Grid cell size in degrees */
  binSize: number;
  /** Points sampled per line */
  sampleCount: number;
  maxDistanceMeters: number;
  maxBearingDiff: number;
}

export interface DedupOptions extends SpatialMatchOptions {
  /** Share of samples that must match for a line to count as a duplicate */
  matchFraction: number;
}

export type DedupDecision = "keep" | "remove";

export interface LineClassification {
  decision: DedupDecision;
  matchedSamples: number;
  totalSamples: number;
  matchFraction: number;
  /** False when the geometry had no usable line (kept by default) */
  sampled: boolean;
}

/** Kept and removed hold the caller's own feature objects, in input order */
export interface DedupResult<T extends FeatureRecord = FeatureRecord> {
  kept: T[];
  removed: T[];
  classifications: LineClassification[];
  keptCount: number;
  removedCount: number;
}
