/**
 * Crash Type Definitions
 */

import type { SegmentKey } from "./segment.types.js";
import type { SegmentKeyMap } from "../utils/segment-key.js";

/** A parsed crash row. Only CORRIDOR and REF_POINT are read by the matcher. */
export interface CrashRecord {
  CORRIDOR?: unknown;
  REF_POINT?: unknown;
  COUNTY?: unknown;
  [field: string]: unknown;
}

/** Why a crash did not land on a segment */
export type UnmatchedReason =
  | "unknown-corridor"
  | "unparseable-milepost"
  | "outside-intervals";

export type CrashMatch =
  | { matched: true; key: SegmentKey }
  | { matched: false; reason: UnmatchedReason };

export interface CrashMatchSummary {
  counts: SegmentKeyMap<number>;
  matched: number;
  unmatched: number;
  unmatchedByReason: Record<UnmatchedReason, number>;
}
