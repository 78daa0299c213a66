/**
 * Split merged traffic lines into per-route files
 *
 * Usage:
 *   npx tsx src/scripts/individual-highways.ts                      # every default group
 *   npx tsx src/scripts/individual-highways.ts --routes US-93,I-90  # one file per route
 *   npx tsx src/scripts/individual-highways.ts --routes-file routes.txt
 *   npx tsx src/scripts/individual-highways.ts --group helena
 *   npx tsx src/scripts/individual-highways.ts --groups-file groups.json
 *
 * Options:
 *   --in <path>       Merged GeoJSON (default: output/merged_data/merged_traffic_lines.geojson)
 *   --out-dir <path>  Output directory (default: output/individual_roads)
 *
 * A groups file is a JSON object of group name -> list of signed routes.
 * Routes are matched on SIGNED_ROUTE exactly (after trimming).
 */

import "dotenv/config";
import path from "node:path";
import { parseArgs } from "node:util";
import type { BundleRequest, RouteGroups } from "../services/route-groups.service.js";
import { buildRouteBundles } from "../services/route-groups.service.js";
import {
  DatasetParseError,
  readGeoJson,
  readJson,
  readLines,
  writeGeoJson,
} from "../services/data-io.service.js";
import { isRecord } from "../utils/geojson.js";
import { DATA_PATHS, DEFAULT_ROUTE_GROUPS } from "../config/constants.js";

function readGroupsFile(filePath: string): RouteGroups {
  const raw = readJson(filePath);
  if (!isRecord(raw)) {
    throw new DatasetParseError(filePath, "expected an object of group name -> routes");
  }

  const groups: Record<string, string[]> = {};
  for (const [name, routes] of Object.entries(raw)) {
    if (!Array.isArray(routes) || !routes.every((r): r is string => typeof r === "string")) {
      throw new DatasetParseError(filePath, `group "${name}" must be a list of route names`);
    }
    groups[name] = routes;
  }
  return groups;
}

function resolveRequest(values: {
  routes?: string;
  "routes-file"?: string;
  group?: string;
  "groups-file"?: string;
}): BundleRequest {
  if (values.routes) {
    const routes = values.routes.split(",").map((r) => r.trim()).filter((r) => r.length > 0);
    return { mode: "routes", routes };
  }
  if (values["routes-file"]) {
    return { mode: "routes", routes: readLines(values["routes-file"]) };
  }

  const groups = values["groups-file"] ? readGroupsFile(values["groups-file"]) : DEFAULT_ROUTE_GROUPS;
  if (values.group) {
    const routes = groups[values.group];
    if (!routes) {
      throw new Error(
        `Unknown group "${values.group}". Known groups: ${Object.keys(groups).join(", ")}`
      );
    }
    return { mode: "group", name: values.group, routes };
  }
  return { mode: "groups", groups };
}

function main(): void {
  try {
    const { values } = parseArgs({
      options: {
        routes: { type: "string" },
        "routes-file": { type: "string" },
        group: { type: "string" },
        "groups-file": { type: "string" },
        in: { type: "string" },
        "out-dir": { type: "string" },
      },
    });

    const input = values.in ?? DATA_PATHS.MERGED_GEOJSON;
    const outDir = values["out-dir"] ?? DATA_PATHS.INDIVIDUAL_ROADS_DIR;
    const request = resolveRequest(values);

    console.log(`📥 Loading ${input}...`);
    const merged = readGeoJson(input);

    const bundles = buildRouteBundles(merged.features, request);
    for (const bundle of bundles) {
      const file = path.join(outDir, bundle.fileName);
      writeGeoJson(file, { type: "FeatureCollection", features: bundle.features });
      if (bundle.features.length === 0) {
        console.warn(`⚠️  ${bundle.name}: no matching features`);
      }
      console.log(`📁 ${bundle.name}: ${bundle.features.length} features -> ${file}`);
    }

    console.log(`\n✅ Wrote ${bundles.length} file(s) to ${outDir}\n`);
  } catch (error) {
    console.error("❌ Split failed:", error);
    process.exit(1);
  }
}

main();
