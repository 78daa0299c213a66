/**
 * Structural segment keys.
 *
 * Segment keys are compared by value. Maps keyed by them encode the tuple
 * with JSON, so no field content (e.g. an underscore in a department id)
 * can make two different keys collide.
 */

import type { SegmentKey } from "../types/segment.types.js";
import { normalizeCorridorId } from "./milepost.js";

/**
 * Build a key from raw table fields. Corridor and department ids are
 * normalized; mileposts are kept verbatim (trimmed).
 */
export function createSegmentKey(fields: {
  corridorId: unknown;
  startMilepost: unknown;
  endMilepost: unknown;
  departmentId: unknown;
}): SegmentKey {
  return {
    corridorId: normalizeCorridorId(fields.corridorId),
    startMilepost: fields.startMilepost == null ? "" : String(fields.startMilepost).trim(),
    endMilepost: fields.endMilepost == null ? "" : String(fields.endMilepost).trim(),
    departmentId: normalizeCorridorId(fields.departmentId),
  };
}

export function segmentKeysEqual(a: SegmentKey, b: SegmentKey): boolean {
  return (
    a.corridorId === b.corridorId &&
    a.startMilepost === b.startMilepost &&
    a.endMilepost === b.endMilepost &&
    a.departmentId === b.departmentId
  );
}

/** Unambiguous encoding used as the internal Map key */
function encode(key: SegmentKey): string {
  return JSON.stringify([key.corridorId, key.startMilepost, key.endMilepost, key.departmentId]);
}

/**
 * Human-readable SEGMENT_KEY label written to output files:
 * CORR_ID_CORR_MP_CORR_ENDMP_DEPT_ID. Output only; never parsed back.
 */
export function formatSegmentKey(key: SegmentKey): string {
  return `${key.corridorId}_${key.startMilepost}_${key.endMilepost}_${key.departmentId}`;
}

/**
 * Map keyed by SegmentKey value.
 */
export class SegmentKeyMap<V> {
  private readonly entriesById = new Map<string, { key: SegmentKey; value: V }>();

  get size(): number {
    return this.entriesById.size;
  }

  get(key: SegmentKey): V | undefined {
    return this.entriesById.get(encode(key))?.value;
  }

  has(key: SegmentKey): boolean {
    return this.entriesById.has(encode(key));
  }

  set(key: SegmentKey, value: V): this {
    const id = encode(key);
    const existing = this.entriesById.get(id);
    // Keep the first key object seen so callers holding it stay in sync
    this.entriesById.set(id, { key: existing?.key ?? key, value });
    return this;
  }

  *keys(): IterableIterator<SegmentKey> {
    for (const entry of this.entriesById.values()) yield entry.key;
  }

  *entries(): IterableIterator<[SegmentKey, V]> {
    for (const entry of this.entriesById.values()) yield [entry.key, entry.value];
  }

  [Symbol.iterator](): IterableIterator<[SegmentKey, V]> {
    return this.entries();
  }
}

/**
 * Add one to the count stored for key.
 */
export function incrementCount(counts: SegmentKeyMap<number>, key: SegmentKey, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/**
 * Sum any number of partial count maps into a new map.
 * Summation is order-independent, so partitioned match passes merge to
 * the same result regardless of how the input was split.
 */
export function mergeCounts(...parts: SegmentKeyMap<number>[]): SegmentKeyMap<number> {
  const merged = new SegmentKeyMap<number>();
  for (const part of parts) {
    for (const [key, count] of part) incrementCount(merged, key, count);
  }
  return merged;
}
