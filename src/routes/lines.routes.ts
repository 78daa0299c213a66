/**
 * Line Deduplication API Endpoints
 *
 * ENDPOINTS:
 * ----------
 * | Method | Path          | Description                                  |
 * |--------|---------------|----------------------------------------------|
 * | POST   | /lines/dedup  | Drop candidates already in the existing set  |
 *
 * Body: { existing: FeatureCollection, candidates: FeatureCollection,
 *         options?: { binSize, sampleCount, maxDistanceMeters,
 *                     maxBearingDiff, matchFraction } }
 */

import { Router } from "express";
import type { Request, Response } from "express";
import type { DedupOptions } from "../types/dedup.types.js";
import { LineDeduplicator } from "../services/line-dedup.service.js";
import { isRecord, parseFeatureCollection, parseFeatureRecords } from "../utils/geojson.js";
import { ERROR_CODES } from "../config/constants.js";

const router = Router();

const OPTION_KEYS = [
  "binSize",
  "sampleCount",
  "maxDistanceMeters",
  "maxBearingDiff",
  "matchFraction",
] as const;

/**
 * Validate tolerance overrides. Every value must be a positive number;
 * sampleCount must also be an integer.
 *
 * @returns The options, or an error message
 */
export function parseDedupOptions(value: unknown): Partial<DedupOptions> | string {
  if (value === undefined) return {};
  if (!isRecord(value)) return "options must be an object";

  const options: Partial<DedupOptions> = {};
  for (const key of OPTION_KEYS) {
    const raw = value[key];
    if (raw === undefined) continue;
    if (typeof raw !== "number" || !Number.isFinite(raw) || raw <= 0) {
      return `options.${key} must be a positive number`;
    }
    if (key === "sampleCount" && !Number.isInteger(raw)) {
      return "options.sampleCount must be an integer";
    }
    options[key] = raw;
  }
  return options;
}

// ============================================
// POST /lines/dedup
// ============================================

router.post("/dedup", (req: Request, res: Response): void => {
  const body: unknown = req.body;
  const existing = parseFeatureCollection(isRecord(body) ? body.existing : undefined);
  const candidates = parseFeatureRecords(isRecord(body) ? body.candidates : undefined);

  if (!existing || !candidates) {
    res.status(400).json({
      success: false,
      error: "existing and candidates must be GeoJSON FeatureCollections",
      code: ERROR_CODES.INVALID_FEATURE_COLLECTION,
    });
    return;
  }

  const options = parseDedupOptions(isRecord(body) ? body.options : undefined);
  if (typeof options === "string") {
    res.status(400).json({
      success: false,
      error: options,
      code: ERROR_CODES.INVALID_DEDUP_OPTIONS,
    });
    return;
  }

  try {
    const deduplicator = LineDeduplicator.fromExisting(existing.features, options);
    const result = deduplicator.dedupe(candidates);

    res.json({
      success: true,
      data: {
        kept: { type: "FeatureCollection", features: result.kept },
        keptCount: result.keptCount,
        removedCount: result.removedCount,
        classifications: result.classifications,
      },
    });
  } catch (error) {
    console.error("[Lines] Error deduplicating lines:", error);
    res.status(500).json({
      success: false,
      error: "Failed to deduplicate lines",
      code: ERROR_CODES.INTERNAL_ERROR,
    });
  }
});

export default router;
