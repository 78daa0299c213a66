/**
 * Crash rates by road category
 *
 * Usage: npx tsx src/scripts/category-crash-rates.ts
 *
 * Splits the merged traffic lines into interstate / non-interstate roads,
 * inside / outside municipality limits, and prints the length-weighted
 * crash rate (per 100M VMT) of each category.
 */

import "dotenv/config";
import type { CategorySummary } from "../types/rates.types.js";
import {
  categorizeSegments,
  prepareMunicipalities,
  summarizeCategories,
} from "../services/category-rates.service.js";
import { readGeoJson } from "../services/data-io.service.js";
import { DATA_PATHS } from "../config/constants.js";

function printSummary(summary: CategorySummary): void {
  const milesPerCrash =
    summary.milesPerCrash === null ? "n/a" : Math.round(summary.milesPerCrash).toLocaleString("en-US");

  console.log(`\n${summary.category}`);
  console.log(`   Segments:               ${summary.segmentCount}`);
  console.log(`   Road miles:             ${summary.totalMiles.toFixed(2)}`);
  console.log(`   Total crashes:          ${summary.totalCrashes}`);
  console.log(`   Daily vehicle miles:    ${Math.round(summary.totalDailyMiles).toLocaleString("en-US")}`);
  console.log(`   Weighted rate /100M VMT: ${summary.weightedRate.toFixed(2)}`);
  console.log(`   Miles per crash:        ${milesPerCrash}`);
}

function main(): void {
  try {
    console.log(`📥 Loading municipalities from ${DATA_PATHS.MUNICIPALITIES_GEOJSON}...`);
    const municipalities = prepareMunicipalities(readGeoJson(DATA_PATHS.MUNICIPALITIES_GEOJSON).features);

    console.log(`📥 Loading merged lines from ${DATA_PATHS.MERGED_GEOJSON}...`);
    const merged = readGeoJson(DATA_PATHS.MERGED_GEOJSON);

    const categories = categorizeSegments(merged.features, municipalities);
    summarizeCategories(categories).forEach(printSummary);
    console.log();
  } catch (error) {
    console.error("❌ Category report failed:", error);
    process.exit(1);
  }
}

main();
