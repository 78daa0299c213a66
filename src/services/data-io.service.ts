/**
 * Data I/O Service
 * Reads and writes the CSV and GeoJSON files the pipeline scripts exchange
 *
 * - CSV is parsed with papaparse (header row, all values kept as strings)
 * - GeoJSON is read with fs + JSON.parse and validated into typed features
 *
 * Missing or unreadable inputs throw DatasetNotFoundError /
 * DatasetParseError; scripts decide whether a missing optional input is
 * fatal.
 */

import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import type { FeatureCollection, FeatureRecord } from "../types/geo.types.js";
import { parseFeatureCollection, parseFeatureRecords } from "../utils/geojson.js";

export type CsvRow = Record<string, string>;

// ============================================
// Paths
// ============================================

/**
 * First existing path among candidates, or null.
 */
export function firstExistingPath(candidates: readonly string[]): string | null {
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

function readText(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DatasetNotFoundError(filePath);
  }
  return fs.readFileSync(filePath, "utf-8");
}

function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

// ============================================
// CSV
// ============================================

/**
 * Parse CSV text with a header row. Cells stay strings; header names are
 * trimmed.
 */
export function parseCsv(text: string): CsvRow[] {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });

  if (parsed.errors.length > 0) {
    // Ragged rows are common in exported tables; report and keep going
    console.warn(
      `[data-io] ${parsed.errors.length} CSV row warnings (first: ${parsed.errors[0].message})`
    );
  }

  return parsed.data;
}

export function readCsv(filePath: string): CsvRow[] {
  return parseCsv(readText(filePath));
}

export function writeCsv(filePath: string, rows: Array<Record<string, unknown>>): void {
  ensureParentDir(filePath);
  fs.writeFileSync(filePath, Papa.unparse(rows), "utf-8");
}

/**
 * Read a plain list file: one trimmed, non-empty entry per line.
 */
export function readLines(filePath: string): string[] {
  return readText(filePath)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// ============================================
// JSON / GeoJSON
// ============================================

export function readJson(filePath: string): unknown {
  const text = readText(filePath);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DatasetParseError(
      filePath,
      error instanceof Error ? error.message : "invalid JSON"
    );
  }
}

export function readGeoJson(filePath: string): FeatureCollection {
  const collection = parseFeatureCollection(readJson(filePath));
  if (!collection) {
    throw new DatasetParseError(filePath, "not a GeoJSON FeatureCollection");
  }
  return collection;
}

/**
 * Read a FeatureCollection without rebuilding its features.
 */
export function readFeatureRecords(filePath: string): FeatureRecord[] {
  const features = parseFeatureRecords(readJson(filePath));
  if (!features) {
    throw new DatasetParseError(filePath, "not a GeoJSON FeatureCollection");
  }
  return features;
}

/**
 * Write a FeatureCollection. `compact` drops all whitespace for
 * web-delivered files.
 */
export function writeGeoJson(
  filePath: string,
  collection: { type: "FeatureCollection"; features: readonly FeatureRecord[] },
  options: { compact?: boolean } = {}
): void {
  ensureParentDir(filePath);
  const body = options.compact ? JSON.stringify(collection) : JSON.stringify(collection, null, 2);
  fs.writeFileSync(filePath, body, "utf-8");
}

/** File size in megabytes, or null when the file is missing */
export function fileSizeMb(filePath: string): number | null {
  if (!fs.existsSync(filePath)) return null;
  return fs.statSync(filePath).size / 1024 / 1024;
}

// ============================================
// Errors
// ============================================

/**
 * Error thrown when a required input file does not exist
 */
export class DatasetNotFoundError extends Error {
  public filePath: string;

  constructor(filePath: string) {
    super(`Dataset not found: ${filePath}`);
    this.name = "DatasetNotFoundError";
    this.filePath = filePath;
  }
}

/**
 * Error thrown when an input file cannot be parsed
 */
export class DatasetParseError extends Error {
  public filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Could not parse ${filePath}: ${reason}`);
    this.name = "DatasetParseError";
    this.filePath = filePath;
  }
}
