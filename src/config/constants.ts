/**
 * Application Constants
 * Centralized configuration values
 *
 * Matching tolerances can be overridden through environment variables
 * (loaded from .env by server.ts and the scripts).
 */

// ============================================
// Environment Variable Helpers
// ============================================

/**
 * Get optional environment variable with default
 */
export function getEnvVarOptional(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

/**
 * Get optional numeric environment variable with default.
 * Non-numeric values fall back to the default.
 */
export function getEnvNumber(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api/v1",
  /** Request bodies carry whole feature collections */
  JSON_BODY_LIMIT: "50mb",
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // Dataset errors
  DATASET_NOT_FOUND: "DATASET_NOT_FOUND",
  DATASET_PARSE_ERROR: "DATASET_PARSE_ERROR",

  // Matching errors
  INVALID_SEGMENTS: "INVALID_SEGMENTS",
  INVALID_CRASHES: "INVALID_CRASHES",
  INVALID_FEATURE_COLLECTION: "INVALID_FEATURE_COLLECTION",
  INVALID_DEDUP_OPTIONS: "INVALID_DEDUP_OPTIONS",
} as const;

// ============================================
// Linear Referencing
// ============================================

export const LINEAR_REF = {
  /** Earth radius used for segment lengths (miles) */
  EARTH_RADIUS_MILES: 3958.8,
} as const;

// ============================================
// Spatial Deduplication
// ============================================

export const SPATIAL_DEDUP = {
  /** Earth radius used for point proximity (meters) */
  EARTH_RADIUS_METERS: 6371000,
  /** Grid cell size in degrees (~1.1 km of latitude) */
  BIN_SIZE_DEG: getEnvNumber("DEDUP_BIN_SIZE_DEG", 0.01),
  /** Points sampled along every line; trades recall against speed */
  SAMPLE_COUNT: getEnvNumber("DEDUP_SAMPLE_COUNT", 12),
  /** Max distance between a sample and an indexed point to count as close */
  MAX_DISTANCE_M: getEnvNumber("DEDUP_MAX_DISTANCE_M", 50),
  /** Max heading difference to count as the same direction */
  MAX_BEARING_DIFF: getEnvNumber("DEDUP_MAX_BEARING_DIFF", 30),
  /** Share of samples that must match for a line to be a duplicate */
  MATCH_FRACTION: getEnvNumber("DEDUP_MATCH_FRACTION", 0.25),
} as const;

// ============================================
// Crash Rates
// ============================================

export const CRASH_RATES = {
  /** Yearly traffic tables read, base year first */
  YEARS: [2023, 2022, 2021, 2020, 2019],
  /**
   * Days per year over the 2019-2023 window (one leap year).
   * Change together with YEARS.
   */
  DAYS_PER_YEAR: 365.2,
  /** Rates are expressed per this many vehicle miles */
  VMT_UNIT: 100_000_000,
} as const;

export const SEGMENT_FILTER = {
  MIN_AADT: 1,
  /** Local and urban department routes are left out of the merged output */
  EXCLUDED_DEPARTMENT_PREFIXES: ["R", "L", "X", "U"],
  /** ...except these urban routes */
  KEPT_DEPARTMENT_IDS: ["U-5832", "U-8133", "U-1216", "U-602", "U-8135"],
} as const;

// ============================================
// Category Report
// ============================================

export const CATEGORY_RATES = {
  /** Consolidated city-counties treated as outside municipalities */
  EXCLUDED_MUNICIPALITIES: ["Butte-Silver Bow", "Anaconda-Deer Lodge"],
  INTERSTATE_PREFIX: "I-",
} as const;

export const COUNTY_RATES = {
  PER_RESIDENTS: 100_000,
} as const;

// ============================================
// Route Groups
// ============================================

/**
 * Default bundles of signed routes written by the route splitter.
 * Passed explicitly to the bundling service; never mutated.
 */
export const DEFAULT_ROUTE_GROUPS: Readonly<Record<string, readonly string[]>> = {
  flathead_area: ["MT-35", "MT-82", "MT-200/US-93"],
  helena: ["S-279", "S-518"],
  missoula_area: ["US-93", "US-12"],
  yellowstone: ["US-89", "S-540", "S-571"],
  bozeman_pass: ["I-90"],
  red_lodge: ["US-212", "S-421"],
};

// ============================================
// Data Paths (relative to the working directory)
// ============================================

export const DATA_PATHS = {
  TYC_CSV: (year: number) => `data/Traffic_Yearly_Counts_${year}/TYC_${year}.csv`,
  /** Candidate locations of a year's TYC GeoJSON, tried in order */
  TYC_GEOJSON: (year: number) => [
    `data/Traffic_Yearly_Counts/TYC_${year}.json`,
    `data/Traffic_Yearly_Counts_${year}/TYC_${year}.json`,
    `data/Traffic_Yearly_Counts_${year}/TYC_${year}.JSON`,
  ],
  CRASH_CSV: getEnvVarOptional("CRASH_CSV", "raw-mdt-source-data/2019-2023-crash-data.csv"),
  ON_SYSTEM_ROUTES_CSV: "raw-mdt-source-data/Montana_On_System_Routes_OD.csv",
  CENSUS_CSV: "data/2024-census-county.csv",
  MUNICIPALITIES_GEOJSON: "data/mt-municipalities-1m.geojson",
  HIGHWAYS_GEOJSON: "data/mt-highways-1m.geojson",
  MERGED_DIR: "output/merged_data",
  MERGED_GEOJSON: "output/merged_data/merged_traffic_lines.geojson",
  MERGED_CSV: "output/merged_data/merged_traffic_lines.csv",
  SIMPLIFIED_MERGED_GEOJSON: [
    "output/simplified-data/merged_traffic_lines-1m.geojson",
    "output/simplified_data/merged_traffic_lines-1m.geojson",
  ],
  MINI_HIGHWAYS_JSON: "output/mini_highways/mini_mt_highways-1m.json",
  INDIVIDUAL_ROADS_DIR: "output/individual_roads",
  COUNTY_RANKING_CSV: "output/county-analysis/ranking_by_county.csv",
} as const;
