/**
 * Road Segment Type Definitions
 *
 * A segment is one physical stretch of a corridor between two mileposts,
 * owned by a department route. Traffic and crash attributes hang off it.
 */

// ============================================
// Keys
// ============================================

/**
 * Composite identifier of one physical road segment.
 * Mileposts are kept as the raw source text so keys from different
 * yearly tables compare equal only when the source rows agree exactly.
 */
export interface SegmentKey {
  corridorId: string;
  startMilepost: string;
  endMilepost: string;
  departmentId: string;
}

// ============================================
// Source Records (already parsed CSV rows)
// ============================================

/**
 * A row of a yearly traffic-count (TYC) table. CSV rows carry strings,
 * JSON request bodies may carry numbers; every reader tolerates both.
 */
export interface SegmentRecord {
  CORR_ID?: unknown;
  CORR_MP?: unknown;
  CORR_ENDMP?: unknown;
  DEPT_ID?: unknown;
  TYC_AADT?: unknown;
  SEC_LNT_MI?: unknown;
  [field: string]: unknown;
}

/** A row of the on-system routes table */
export interface OnSystemRouteRecord {
  "DEPARTMENTAL ROUTE"?: unknown;
  "SIGNED ROUTE"?: unknown;
  [field: string]: unknown;
}

// ============================================
// Domain
// ============================================

export interface Segment {
  key: SegmentKey;
  corridorId: string;
  departmentId: string;
  /** Parsed start milepost, null when the source text is unparseable */
  start: number | null;
  /** Parsed end milepost, null when the source text is unparseable */
  end: number | null;
  /** Official section length (SEC_LNT_MI) */
  lengthMiles: number | null;
  /** Mean annual average daily traffic across the years with data */
  aadt: number | null;
  yearsWithData: number;
}

/** Filter applied before merged features are written */
export interface SegmentFilter {
  minAadt: number;
  excludedDepartmentPrefixes: readonly string[];
  keptDepartmentIds: readonly string[];
}
