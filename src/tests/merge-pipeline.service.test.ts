/**
 * Merge Pipeline Tests
 * Traffic tables + crashes + geometry -> merged traffic lines
 */
import { describe, it, expect } from "vitest";
import type { Feature, FeatureCollection } from "../types/geo.types.js";
import type { SegmentRecord } from "../types/segment.types.js";
import { runMergePipeline } from "../services/merge-pipeline.service.js";

function tyc(corridor: string, start: string, end: string, dept: string, aadt: string, length: string): SegmentRecord {
  return { CORR_ID: corridor, CORR_MP: start, CORR_ENDMP: end, DEPT_ID: dept, TYC_AADT: aadt, SEC_LNT_MI: length };
}

function geometry(corridor: string, start: string, end: string, dept: string, lon: number): Feature {
  return {
    type: "Feature",
    geometry: { type: "LineString", coordinates: [[lon, 46], [lon, 46.1]] },
    properties: { CORR_ID: corridor, CORR_MP: start, CORR_ENDMP: end, DEPT_ID: dept },
  };
}

const geometries: FeatureCollection = {
  type: "FeatureCollection",
  features: [
    geometry("MT-1", "0+0.0", "10+0.0", "N-1", -110),
    geometry("MT-1", "10+0.0", "20+0.0", "N-1", -110.1),
    geometry("MT-1", "20+0.0", "30+0.0", "L-5", -110.2),
  ],
};

describe("runMergePipeline", () => {
  const result = runMergePipeline({
    baseYear: [
      tyc("MT-1", "0+0.0", "10+0.0", "N-1", "1000", "2"),
      tyc("MT-1", "10+0.0", "20+0.0", "N-1", "", "4"),
      tyc("MT-1", "20+0.0", "30+0.0", "L-5", "800", "1"),
      tyc("MT-2", "0+0.0", "5+0.0", "N-2", "100", "1"),
    ],
    otherYears: [
      [tyc("MT-1", "0+0.0", "10+0.0", "N-1", "3000", "2"), tyc("MT-1", "10+0.0", "20+0.0", "N-1", "500", "4")],
    ],
    crashes: [
      { CORRIDOR: "MT-1", REF_POINT: "5+0.0" },
      { CORRIDOR: "MT-1", REF_POINT: "6+0.0" },
      { CORRIDOR: "MT-1", REF_POINT: "15+0.0" },
      { CORRIDOR: "MT-1", REF_POINT: "25+0.0" },
      { CORRIDOR: "MT-2", REF_POINT: "1+0.0" },
      { CORRIDOR: "MT-3", REF_POINT: "1+0.0" },
    ],
    geometries: [geometries],
    onSystemRoutes: [{ "DEPARTMENTAL ROUTE": "N-1", "SIGNED ROUTE": "US-93" }],
  });

  it("matches crashes before filtering segments", () => {
    expect(result.crashSummary.matched).toBe(5);
    expect(result.crashSummary.unmatched).toBe(1);
    expect(result.segmentCount).toBe(4);
    expect(result.filteredCount).toBe(3);
  });

  it("writes kept segments that have geometry", () => {
    expect(result.features.map((f) => f.properties.SEGMENT_KEY)).toEqual([
      "MT-1_0+0.0_10+0.0_N-1",
      "MT-1_10+0.0_20+0.0_N-1",
    ]);
  });

  it("averages AADT and computes the rate", () => {
    const [first, second] = result.features;
    expect(first.properties.TYC_AADT).toBe(2000);
    expect(first.properties.TOTAL_CRASHES).toBe(2);
    expect(first.properties.AVG_CRASHES).toBe(0.4);
    expect(first.properties.SIGNED_ROUTE).toBe("US-93");
    expect(first.properties.PER_100M_VMT).toBeCloseTo(27.3823, 4);

    expect(second.properties.TYC_AADT).toBe(500);
    expect(second.properties.TOTAL_CRASHES).toBe(1);
    expect(second.properties.PER_100M_VMT).toBeCloseTo(27.3823, 4);
  });

  it("honours a custom rate window", () => {
    const single = runMergePipeline(
      {
        baseYear: [tyc("MT-1", "0+0.0", "10+0.0", "N-1", "1000", "2")],
        otherYears: [],
        crashes: [{ CORRIDOR: "MT-1", REF_POINT: "1+0.0" }],
        geometries: [geometries],
        onSystemRoutes: [],
      },
      { rates: { years: 1, daysPerYear: 100 } }
    );
    // 1 crash / (2 mi x 1000 x 100 days) x 1e8
    expect(single.features[0].properties.PER_100M_VMT).toBeCloseTo(500, 6);
  });
});
