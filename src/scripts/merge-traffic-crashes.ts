/**
 * Merge yearly traffic counts with crash data
 *
 * Usage: npx tsx src/scripts/merge-traffic-crashes.ts
 *
 * Reads the TYC tables for every configured year (the first year is
 * required, the rest optional), matches the crash CSV onto segments by
 * corridor + milepost, computes crashes per 100M VMT and writes:
 *   output/merged_data/merged_traffic_lines.geojson
 *   output/merged_data/merged_traffic_lines.csv
 */

import "dotenv/config";
import fs from "node:fs";
import type { FeatureCollection } from "../types/geo.types.js";
import { runMergePipeline } from "../services/merge-pipeline.service.js";
import {
  DatasetNotFoundError,
  firstExistingPath,
  readCsv,
  readGeoJson,
  writeCsv,
  writeGeoJson,
} from "../services/data-io.service.js";
import { CRASH_RATES, DATA_PATHS } from "../config/constants.js";

function main(): void {
  try {
    const [baseYear, ...otherYears] = CRASH_RATES.YEARS;

    console.log(`📥 Loading TYC ${baseYear}...`);
    const base = readCsv(DATA_PATHS.TYC_CSV(baseYear));

    const others = otherYears.flatMap((year) => {
      const file = DATA_PATHS.TYC_CSV(year);
      if (!fs.existsSync(file)) {
        console.warn(`⚠️  TYC ${year} not found, skipping (${file})`);
        return [];
      }
      console.log(`📥 Loading TYC ${year}...`);
      return [readCsv(file)];
    });

    console.log("📥 Loading crash data...");
    const crashes = readCsv(DATA_PATHS.CRASH_CSV);

    let onSystemRoutes: Record<string, string>[] = [];
    if (fs.existsSync(DATA_PATHS.ON_SYSTEM_ROUTES_CSV)) {
      onSystemRoutes = readCsv(DATA_PATHS.ON_SYSTEM_ROUTES_CSV);
    } else {
      console.warn("⚠️  On-system routes table not found, SIGNED_ROUTE will be empty");
    }

    const geometries: FeatureCollection[] = [];
    for (const year of CRASH_RATES.YEARS) {
      const file = firstExistingPath(DATA_PATHS.TYC_GEOJSON(year));
      if (file) {
        console.log(`📥 Loading TYC ${year} geometry from ${file}...`);
        geometries.push(readGeoJson(file));
      }
    }
    if (geometries.length === 0) {
      throw new DatasetNotFoundError(DATA_PATHS.TYC_GEOJSON(baseYear)[0]);
    }

    const result = runMergePipeline({
      baseYear: base,
      otherYears: others,
      crashes,
      geometries,
      onSystemRoutes,
    });

    writeGeoJson(DATA_PATHS.MERGED_GEOJSON, { type: "FeatureCollection", features: result.features });
    writeCsv(
      DATA_PATHS.MERGED_CSV,
      result.features.map((feature) => feature.properties)
    );

    const { crashSummary } = result;
    console.log("\n✅ Merge complete");
    console.log(`   Segments:          ${result.segmentCount} (${result.filteredCount} after filtering)`);
    console.log(`   Crashes matched:   ${crashSummary.matched}`);
    console.log(`   Crashes unmatched: ${crashSummary.unmatched}`);
    for (const [reason, count] of Object.entries(crashSummary.unmatchedByReason)) {
      console.log(`     - ${reason}: ${count}`);
    }
    console.log(`   Lines written:     ${result.features.length}`);
    console.log(`📁 ${DATA_PATHS.MERGED_GEOJSON}`);
    console.log(`📁 ${DATA_PATHS.MERGED_CSV}\n`);
  } catch (error) {
    console.error("❌ Merge failed:", error);
    process.exit(1);
  }
}

main();
