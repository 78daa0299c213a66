/**
 * Traffic Service
 * Builds road segments from yearly traffic-count (TYC) tables
 *
 * OVERVIEW:
 * ---------
 * The base year's table defines the segment list. Every other year only
 * contributes AADT values for segments it shares a key with; the segment's
 * AADT becomes the mean over all years that report a number for it.
 *
 * Also hosts the lookups the merge step needs: the department -> signed
 * route table and the per-segment geometry from the yearly GeoJSON exports.
 */

import type { Feature, FeatureCollection } from "../types/geo.types.js";
import type {
  OnSystemRouteRecord,
  Segment,
  SegmentFilter,
  SegmentRecord,
} from "../types/segment.types.js";
import { parseMilepost, parseNumber, stripTrailingLetter } from "../utils/milepost.js";
import { SegmentKeyMap, createSegmentKey } from "../utils/segment-key.js";
import { SEGMENT_FILTER } from "../config/constants.js";

export const DEFAULT_SEGMENT_FILTER: SegmentFilter = {
  minAadt: SEGMENT_FILTER.MIN_AADT,
  excludedDepartmentPrefixes: SEGMENT_FILTER.EXCLUDED_DEPARTMENT_PREFIXES,
  keptDepartmentIds: SEGMENT_FILTER.KEPT_DEPARTMENT_IDS,
};

// ============================================
// Segments
// ============================================

function keyOf(record: SegmentRecord) {
  return createSegmentKey({
    corridorId: record.CORR_ID,
    startMilepost: record.CORR_MP,
    endMilepost: record.CORR_ENDMP,
    departmentId: record.DEPT_ID,
  });
}

/**
 * Build segments from the base year's TYC rows.
 */
export function buildSegments(records: Iterable<SegmentRecord>): Segment[] {
  const segments: Segment[] = [];

  for (const record of records) {
    const key = keyOf(record);
    const aadt = parseNumber(record.TYC_AADT);
    segments.push({
      key,
      corridorId: key.corridorId,
      departmentId: key.departmentId,
      start: parseMilepost(key.startMilepost),
      end: parseMilepost(key.endMilepost),
      lengthMiles: parseNumber(record.SEC_LNT_MI),
      aadt,
      yearsWithData: aadt === null ? 0 : 1,
    });
  }

  return segments;
}

/**
 * Average AADT across the base year and any number of other years.
 *
 * @param segments - Segments built from the base year
 * @param otherYears - TYC rows of the remaining years (missing years simply absent)
 * @returns New segments; aadt is the mean of every numeric value seen for the key,
 *          yearsWithData the number of such values
 */
export function averageTraffic(
  segments: Segment[],
  otherYears: Iterable<Iterable<SegmentRecord>>
): Segment[] {
  const values = new SegmentKeyMap<number[]>();
  const add = (segmentKey: Segment["key"], value: number | null) => {
    if (value === null) return;
    const list = values.get(segmentKey);
    if (list) {
      list.push(value);
    } else {
      values.set(segmentKey, [value]);
    }
  };

  for (const segment of segments) add(segment.key, segment.aadt);
  for (const rows of otherYears) {
    for (const row of rows) add(keyOf(row), parseNumber(row.TYC_AADT));
  }

  return segments.map((segment) => {
    const list = values.get(segment.key) ?? [];
    if (list.length === 0) {
      return { ...segment, yearsWithData: 0 };
    }
    const mean = list.reduce((sum, v) => sum + v, 0) / list.length;
    return { ...segment, aadt: mean, yearsWithData: list.length };
  });
}

/**
 * Whether a department route is kept in the merged output.
 */
export function isDepartmentIncluded(departmentId: string, filter: SegmentFilter = DEFAULT_SEGMENT_FILTER): boolean {
  const dept = departmentId.trim().toUpperCase();
  if (filter.keptDepartmentIds.some((kept) => kept.toUpperCase() === dept)) return true;
  return !filter.excludedDepartmentPrefixes.some((prefix) => dept.startsWith(prefix));
}

/**
 * Drop low-volume segments and excluded department routes.
 */
export function filterSegments(segments: Segment[], filter: SegmentFilter = DEFAULT_SEGMENT_FILTER): Segment[] {
  const withTraffic = segments.filter((s) => s.aadt !== null && s.aadt >= filter.minAadt);
  const kept = withTraffic.filter((s) => isDepartmentIncluded(s.departmentId, filter));

  const removed = withTraffic.length - kept.length;
  if (removed > 0) {
    console.log(
      `[traffic] Filtered out ${removed} segments because DEPT_ID starts with ${filter.excludedDepartmentPrefixes.join(", ")} (kept ${filter.keptDepartmentIds.join(", ")})`
    );
  }

  return kept;
}

// ============================================
// Signed Routes
// ============================================

/**
 * Map departmental route (trailing letter stripped) -> signed route.
 * The first non-empty signed route seen for a department wins.
 */
export function buildSignedRouteMap(records: Iterable<OnSystemRouteRecord>): Map<string, string> {
  const mapping = new Map<string, string>();

  for (const record of records) {
    const department = stripTrailingLetter(record["DEPARTMENTAL ROUTE"]);
    if (!department) continue;
    const signed = record["SIGNED ROUTE"] == null ? "" : String(record["SIGNED ROUTE"]).trim();
    if (!mapping.has(department) || (!mapping.get(department) && signed)) {
      mapping.set(department, signed);
    }
  }

  return mapping;
}

export function lookupSignedRoute(mapping: ReadonlyMap<string, string>, departmentId: string): string {
  return mapping.get(stripTrailingLetter(departmentId)) ?? "";
}

// ============================================
// Geometry
// ============================================

/**
 * Collect one feature per segment key from yearly TYC GeoJSON exports.
 *
 * @param collections - Exports in priority order (base year first); the
 *                      first feature seen for a key wins
 * @param neededKeys - When given, only these keys are collected
 */
export function buildGeometryMap(
  collections: Iterable<FeatureCollection>,
  neededKeys?: SegmentKeyMap<unknown>
): SegmentKeyMap<Feature> {
  const geometries = new SegmentKeyMap<Feature>();

  for (const collection of collections) {
    for (const feature of collection.features) {
      const p = feature.properties;
      const key = createSegmentKey({
        corridorId: p.CORR_ID,
        startMilepost: p.CORR_MP,
        endMilepost: p.CORR_ENDMP,
        departmentId: p.DEPT_ID,
      });
      if (neededKeys && !neededKeys.has(key)) continue;
      if (!geometries.has(key)) geometries.set(key, feature);
    }
  }

  return geometries;
}
