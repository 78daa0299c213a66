/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api/v1
 *
 * ROUTE MODULES:
 * --------------
 * | Module  | Path      | Description                              |
 * |---------|-----------|------------------------------------------|
 * | crashes | /crashes  | Crash-to-segment matching                |
 * | lines   | /lines    | Highway line deduplication               |
 * | rates   | /rates    | Category crash-rate summaries            |
 */

import { Router } from "express";
import crashesRoutes from "./crashes.routes.js";
import linesRoutes from "./lines.routes.js";
import ratesRoutes from "./rates.routes.js";

const router = Router();

// Mount route modules
router.use("/crashes", crashesRoutes);
router.use("/lines", linesRoutes);
router.use("/rates", ratesRoutes);

export default router;
