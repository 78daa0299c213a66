/**
 * Crashes per 100k residents by county
 *
 * Usage: npx tsx src/scripts/county-crash-rates.ts
 *
 * Counts crash records per county, divides by the census population and
 * writes the ranking (highest rate first) to
 * output/county-analysis/ranking_by_county.csv
 */

import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import {
  computeCountyRates,
  countCrashesByCounty,
  loadCensusPopulations,
  toCountyCsv,
} from "../services/county-rates.service.js";
import { readCsv } from "../services/data-io.service.js";
import { DATA_PATHS } from "../config/constants.js";

function main(): void {
  try {
    console.log(`📥 Loading crashes from ${DATA_PATHS.CRASH_CSV}...`);
    const counts = countCrashesByCounty(readCsv(DATA_PATHS.CRASH_CSV));

    console.log(`📥 Loading census from ${DATA_PATHS.CENSUS_CSV}...`);
    const populations = loadCensusPopulations(readCsv(DATA_PATHS.CENSUS_CSV));

    const rates = computeCountyRates(counts, populations);

    fs.mkdirSync(path.dirname(DATA_PATHS.COUNTY_RANKING_CSV), { recursive: true });
    fs.writeFileSync(DATA_PATHS.COUNTY_RANKING_CSV, toCountyCsv(rates), "utf-8");

    const missing = rates.filter((r) => r.accidentsPer100kResidents === null).length;
    console.log(`\n✅ Ranked ${rates.length} counties (${missing} without population)`);
    rates.slice(0, 5).forEach((rate, index) => {
      console.log(
        `   ${index + 1}. ${rate.county}: ${rate.accidentsPer100kResidents?.toFixed(2) ?? "n/a"} per 100k`
      );
    });
    console.log(`📁 ${DATA_PATHS.COUNTY_RANKING_CSV}\n`);
  } catch (error) {
    console.error("❌ County report failed:", error);
    process.exit(1);
  }
}

main();
