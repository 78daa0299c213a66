/**
 * Corridor Interval Index
 * Per-corridor sorted milepost intervals for point-in-interval lookups
 *
 * OVERVIEW:
 * ---------
 * Segments are grouped by corridor and sorted by start milepost. Each
 * corridor keeps three parallel arrays (starts, ends, keys) so a lookup is
 * a binary search over `starts` followed by one bounds check on `ends`.
 *
 * RULES:
 * ------
 * - The chosen interval is the LAST one whose start <= milepost
 * - A milepost past that interval's end is unmatched (gap in coverage)
 * - Segments with an unparseable start or end are not indexed
 * - Equal starts keep their input order (stable sort), so the later row wins
 *
 * The index is read-only once built and can be shared freely.
 */

import type { Segment, SegmentKey } from "../types/segment.types.js";
import { normalizeCorridorId } from "../utils/milepost.js";

interface CorridorIntervals {
  readonly starts: readonly number[];
  readonly ends: readonly number[];
  readonly keys: readonly SegmentKey[];
}

/**
 * Index of the last element <= value in an ascending array, or -1.
 */
export function lastIndexAtOrBelow(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  // Upper bound: first index whose element is > value
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}

export class CorridorIntervalIndex {
  private readonly corridors: ReadonlyMap<string, CorridorIntervals>;

  private constructor(corridors: Map<string, CorridorIntervals>) {
    this.corridors = corridors;
  }

  /**
   * Build the index from segments.
   *
   * @example
   * const index = CorridorIntervalIndex.build(segments);
   * index.lookup("MT-1", 5); // key of the segment covering milepost 5
   */
  static build(segments: Iterable<Segment>): CorridorIntervalIndex {
    const grouped = new Map<string, Array<{ start: number; end: number; key: SegmentKey }>>();

    for (const segment of segments) {
      if (segment.start === null || segment.end === null) continue;
      const corridor = normalizeCorridorId(segment.corridorId);
      const list = grouped.get(corridor) ?? [];
      list.push({ start: segment.start, end: segment.end, key: segment.key });
      grouped.set(corridor, list);
    }

    const corridors = new Map<string, CorridorIntervals>();
    for (const [corridor, intervals] of grouped) {
      intervals.sort((a, b) => a.start - b.start);
      corridors.set(corridor, {
        starts: intervals.map((i) => i.start),
        ends: intervals.map((i) => i.end),
        keys: intervals.map((i) => i.key),
      });
    }

    return new CorridorIntervalIndex(corridors);
  }

  /** Number of indexed corridors */
  get corridorCount(): number {
    return this.corridors.size;
  }

  /** Number of indexed intervals across all corridors */
  get intervalCount(): number {
    let total = 0;
    for (const intervals of this.corridors.values()) total += intervals.starts.length;
    return total;
  }

  hasCorridor(corridorId: string): boolean {
    return this.corridors.has(normalizeCorridorId(corridorId));
  }

  /**
   * Find the segment whose interval contains a milepost.
   *
   * @returns The segment key, or null when the corridor is unknown or the
   *          milepost falls before the first interval or inside a gap
   */
  lookup(corridorId: string, milepost: number): SegmentKey | null {
    const intervals = this.corridors.get(normalizeCorridorId(corridorId));
    if (!intervals || Number.isNaN(milepost)) return null;

    const i = lastIndexAtOrBelow(intervals.starts, milepost);
    if (i < 0) return null;
    if (milepost > intervals.ends[i]) return null;

    return intervals.keys[i];
  }
}
