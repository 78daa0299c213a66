/**
 * Build the mini highways file
 *
 * Usage: npx tsx src/scripts/minify-highways.ts
 *
 * Removes every highway line that already appears (same place, same
 * direction) in the simplified merged traffic lines, then writes the
 * remainder as compact JSON for the web map.
 *
 * Tolerances come from DEDUP_* environment variables (see config/constants.ts).
 */

import "dotenv/config";
import { LineDeduplicator } from "../services/line-dedup.service.js";
import {
  DatasetNotFoundError,
  fileSizeMb,
  firstExistingPath,
  readFeatureRecords,
  readGeoJson,
  writeGeoJson,
} from "../services/data-io.service.js";
import { DATA_PATHS } from "../config/constants.js";

function formatMb(size: number | null): string {
  return size === null ? "n/a" : `${size.toFixed(2)} MB`;
}

function main(): void {
  try {
    const mergedPath = firstExistingPath(DATA_PATHS.SIMPLIFIED_MERGED_GEOJSON);
    if (!mergedPath) {
      throw new DatasetNotFoundError(DATA_PATHS.SIMPLIFIED_MERGED_GEOJSON[0]);
    }

    console.log(`📥 Loading merged lines from ${mergedPath}...`);
    const merged = readGeoJson(mergedPath);
    console.log(`📥 Loading highways from ${DATA_PATHS.HIGHWAYS_GEOJSON}...`);
    const highways = readFeatureRecords(DATA_PATHS.HIGHWAYS_GEOJSON);

    const deduplicator = LineDeduplicator.fromExisting(merged.features);
    const result = deduplicator.dedupe(highways);

    writeGeoJson(
      DATA_PATHS.MINI_HIGHWAYS_JSON,
      { type: "FeatureCollection", features: result.kept },
      { compact: true }
    );

    const unsampled = result.classifications.filter((c) => !c.sampled).length;
    console.log("\n✅ Mini highways written");
    console.log(`   Highways in:   ${highways.length}`);
    console.log(`   Removed:       ${result.removedCount}`);
    console.log(`   Kept:          ${result.keptCount} (${unsampled} without a usable line)`);
    console.log(`   Input size:    ${formatMb(fileSizeMb(DATA_PATHS.HIGHWAYS_GEOJSON))}`);
    console.log(`   Output size:   ${formatMb(fileSizeMb(DATA_PATHS.MINI_HIGHWAYS_JSON))}`);
    console.log(`📁 ${DATA_PATHS.MINI_HIGHWAYS_JSON}\n`);
  } catch (error) {
    console.error("❌ Minify failed:", error);
    process.exit(1);
  }
}

main();
