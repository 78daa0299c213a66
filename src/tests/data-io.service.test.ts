/**
 * Data I/O Service Tests
 * CSV parsing and file helpers against a temporary directory
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  DatasetNotFoundError,
  DatasetParseError,
  firstExistingPath,
  parseCsv,
  readCsv,
  readGeoJson,
  readLines,
  writeCsv,
  writeGeoJson,
} from "../services/data-io.service.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "crash-atlas-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("parseCsv", () => {
  it("keeps cells as strings, trims headers and skips blank lines", () => {
    expect(parseCsv(" CORR_ID ,TYC_AADT\nMT-1,0100\n\nMT-2,\n")).toEqual([
      { CORR_ID: "MT-1", TYC_AADT: "0100" },
      { CORR_ID: "MT-2", TYC_AADT: "" },
    ]);
  });

  it("warns about ragged rows and keeps them", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const rows = parseCsv("A,B\n1,2,3\n4,5\n");
    expect(rows).toHaveLength(2);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("file helpers", () => {
  it("writes and reads CSV", () => {
    const file = path.join(dir, "nested", "out.csv");
    writeCsv(file, [{ COUNTY: "Park", TOTAL: 3 }]);
    expect(readCsv(file)).toEqual([{ COUNTY: "Park", TOTAL: "3" }]);
  });

  it("reads list files without blank lines", () => {
    const file = path.join(dir, "routes.txt");
    fs.writeFileSync(file, "US-93\r\n\n  I-90  \n");
    expect(readLines(file)).toEqual(["US-93", "I-90"]);
  });

  it("writes compact GeoJSON and reads it back", () => {
    const file = path.join(dir, "lines.json");
    writeGeoJson(file, { type: "FeatureCollection", features: [] }, { compact: true });
    expect(fs.readFileSync(file, "utf-8")).toBe('{"type":"FeatureCollection","features":[]}');
    expect(readGeoJson(file)).toEqual({ type: "FeatureCollection", features: [] });
  });

  it("finds the first existing candidate", () => {
    const present = path.join(dir, "b.json");
    fs.writeFileSync(present, "{}");
    expect(firstExistingPath([path.join(dir, "a.json"), present])).toBe(present);
    expect(firstExistingPath([path.join(dir, "a.json")])).toBeNull();
  });

  it("throws typed errors for missing and malformed files", () => {
    expect(() => readCsv(path.join(dir, "missing.csv"))).toThrow(DatasetNotFoundError);

    const bad = path.join(dir, "bad.json");
    fs.writeFileSync(bad, "{ not json");
    expect(() => readGeoJson(bad)).toThrow(DatasetParseError);

    const notGeo = path.join(dir, "array.json");
    fs.writeFileSync(notGeo, "[]");
    expect(() => readGeoJson(notGeo)).toThrow("not a GeoJSON FeatureCollection");
  });
});
