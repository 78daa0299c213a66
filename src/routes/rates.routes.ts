/**
 * Crash Rate API Endpoints
 *
 * ENDPOINTS:
 * ----------
 * | Method | Path               | Description                                 |
 * |--------|--------------------|---------------------------------------------|
 * | POST   | /rates/categories  | Length-weighted crash rate by road category |
 *
 * Body: { features: FeatureCollection (merged traffic lines),
 *         municipalities?: FeatureCollection }
 */

import { Router } from "express";
import type { Request, Response } from "express";
import {
  categorizeSegments,
  prepareMunicipalities,
  summarizeCategories,
} from "../services/category-rates.service.js";
import { isRecord, parseFeatureCollection } from "../utils/geojson.js";
import { ERROR_CODES } from "../config/constants.js";

const router = Router();

// ============================================
// POST /rates/categories
// ============================================

router.post("/categories", (req: Request, res: Response): void => {
  const body: unknown = req.body;
  const features = parseFeatureCollection(isRecord(body) ? body.features : undefined);
  const rawMunicipalities = isRecord(body) ? body.municipalities : undefined;
  const municipalities =
    rawMunicipalities === undefined
      ? { type: "FeatureCollection" as const, features: [] }
      : parseFeatureCollection(rawMunicipalities);

  if (!features || !municipalities) {
    res.status(400).json({
      success: false,
      error: "features (and municipalities, when given) must be GeoJSON FeatureCollections",
      code: ERROR_CODES.INVALID_FEATURE_COLLECTION,
    });
    return;
  }

  try {
    const polygons = prepareMunicipalities(municipalities.features);
    const categories = categorizeSegments(features.features, polygons);
    res.json({ success: true, data: { categories: summarizeCategories(categories) } });
  } catch (error) {
    console.error("[Rates] Error computing category rates:", error);
    res.status(500).json({
      success: false,
      error: "Failed to compute category rates",
      code: ERROR_CODES.INTERNAL_ERROR,
    });
  }
});

export default router;
