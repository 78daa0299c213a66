/**
 * Crash Matching Service
 * Assigns crash events to road segments by corridor + milepost
 *
 * Unmatched crashes are not errors: the source data is inconsistently
 * formatted, so a crash with an unknown corridor, an unparseable reference
 * point, or a milepost in a coverage gap is simply left out of the counts
 * (and tallied by reason for reporting).
 */

import type { CrashMatch, CrashMatchSummary, CrashRecord, UnmatchedReason } from "../types/crash.types.js";
import { CorridorIntervalIndex } from "./corridor-index.service.js";
import { normalizeCorridorId, parseMilepost } from "../utils/milepost.js";
import { SegmentKeyMap, incrementCount } from "../utils/segment-key.js";

export class CrashMatcher {
  constructor(private readonly index: CorridorIntervalIndex) {}

  /**
   * Match a single crash.
   */
  match(crash: CrashRecord): CrashMatch {
    const corridor = normalizeCorridorId(crash.CORRIDOR);
    if (!corridor || !this.index.hasCorridor(corridor)) {
      return { matched: false, reason: "unknown-corridor" };
    }

    const milepost = parseMilepost(crash.REF_POINT);
    if (milepost === null) {
      return { matched: false, reason: "unparseable-milepost" };
    }

    const key = this.index.lookup(corridor, milepost);
    if (!key) {
      return { matched: false, reason: "outside-intervals" };
    }

    return { matched: true, key };
  }

  /**
   * Match every crash and count hits per segment.
   *
   * @example
   * const { counts, unmatched } = matcher.matchAll(crashes);
   * counts.get(segment.key); // number of crashes on that segment
   */
  matchAll(crashes: Iterable<CrashRecord>): CrashMatchSummary {
    const counts = new SegmentKeyMap<number>();
    const unmatchedByReason: Record<UnmatchedReason, number> = {
      "unknown-corridor": 0,
      "unparseable-milepost": 0,
      "outside-intervals": 0,
    };
    let matched = 0;
    let unmatched = 0;

    for (const crash of crashes) {
      const result = this.match(crash);
      if (result.matched) {
        incrementCount(counts, result.key);
        matched++;
      } else {
        unmatchedByReason[result.reason]++;
        unmatched++;
      }
    }

    console.log(
      `[CrashMatcher] ${matched} crashes matched to ${counts.size} segments, ${unmatched} unmatched`
    );

    return { counts, matched, unmatched, unmatchedByReason };
  }
}
