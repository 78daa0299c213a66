/**
 * Crash Matching API Endpoints
 * Matches crash records to road segments by corridor + milepost
 *
 * ENDPOINTS:
 * ----------
 * | Method | Path            | Description                              |
 * |--------|-----------------|------------------------------------------|
 * | POST   | /crashes/match  | Count crashes per segment                |
 *
 * Body: { segments: SegmentRecord[], crashes: CrashRecord[] }
 * Segment rows use the TYC column names (CORR_ID, CORR_MP, CORR_ENDMP,
 * DEPT_ID); crash rows use CORRIDOR and REF_POINT.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import { buildSegments } from "../services/traffic.service.js";
import { CorridorIntervalIndex } from "../services/corridor-index.service.js";
import { CrashMatcher } from "../services/crash-matching.service.js";
import { formatSegmentKey } from "../utils/segment-key.js";
import { isRecord } from "../utils/geojson.js";
import { ERROR_CODES } from "../config/constants.js";

const router = Router();

function isRecordArray(value: unknown): value is Record<string, unknown>[] {
  return Array.isArray(value) && value.every(isRecord);
}

// ============================================
// POST /crashes/match
// ============================================

router.post("/match", (req: Request, res: Response): void => {
  const body: unknown = req.body;
  const segments = isRecord(body) ? body.segments : undefined;
  const crashes = isRecord(body) ? body.crashes : undefined;

  if (!isRecordArray(segments)) {
    res.status(400).json({
      success: false,
      error: "segments must be an array of segment records",
      code: ERROR_CODES.INVALID_SEGMENTS,
    });
    return;
  }

  if (!isRecordArray(crashes)) {
    res.status(400).json({
      success: false,
      error: "crashes must be an array of crash records",
      code: ERROR_CODES.INVALID_CRASHES,
    });
    return;
  }

  try {
    const index = CorridorIntervalIndex.build(buildSegments(segments));
    const summary = new CrashMatcher(index).matchAll(crashes);

    res.json({
      success: true,
      data: {
        matched: summary.matched,
        unmatched: summary.unmatched,
        unmatchedByReason: summary.unmatchedByReason,
        segments: [...summary.counts].map(([key, crashCount]) => ({
          segmentKey: formatSegmentKey(key),
          ...key,
          crashCount,
        })),
      },
    });
  } catch (error) {
    console.error("[Crashes] Error matching crashes:", error);
    res.status(500).json({
      success: false,
      error: "Failed to match crashes",
      code: ERROR_CODES.INTERNAL_ERROR,
    });
  }
});

export default router;
