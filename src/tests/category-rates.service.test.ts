/**
 * Category Rates Service Tests
 * Interstate / municipality classification and length-weighted rates
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Feature, LonLat } from "../types/geo.types.js";
import type { CategorySegment } from "../types/rates.types.js";
import {
  categorizeSegments,
  isInsideMunicipality,
  isInterstate,
  prepareMunicipalities,
  summarizeCategories,
  toCategorySegment,
  weightedAverage,
} from "../services/category-rates.service.js";

function square(name: string, min: number, max: number): Feature {
  return {
    type: "Feature",
    geometry: {
      type: "Polygon",
      coordinates: [[[min, min], [max, min], [max, max], [min, max], [min, min]]],
    },
    properties: { NAME: name },
  };
}

function road(coordinates: LonLat[], properties: Record<string, unknown>): Feature {
  return { type: "Feature", geometry: { type: "LineString", coordinates }, properties };
}

function categorySegment(lengthMiles: number, crashRate: number): CategorySegment {
  return { segmentKey: "K", lengthMiles, crashRate, totalCrashes: 0, dailyVmt: 0 };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("prepareMunicipalities", () => {
  it("skips excluded names and non-polygon geometry", () => {
    const polygons = prepareMunicipalities([
      square("Town", 0, 1),
      square("Butte-Silver Bow", 10, 11),
      { type: "Feature", geometry: { type: "Point", coordinates: [0, 0] }, properties: { NAME: "Dot" } },
    ]);
    expect(polygons).toHaveLength(1);
    expect(polygons[0].properties).toEqual({ NAME: "Town" });
  });

  it("skips rings turf rejects", () => {
    const open: Feature = {
      type: "Feature",
      geometry: { type: "Polygon", coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1]]] },
      properties: { NAME: "Open" },
    };
    expect(prepareMunicipalities([open])).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe("isInsideMunicipality", () => {
  const municipalities = prepareMunicipalities([square("Town", 0, 1)]);

  it("is true for a line inside or crossing a polygon", () => {
    expect(isInsideMunicipality({ type: "LineString", coordinates: [[0.2, 0.2], [0.4, 0.4]] }, municipalities)).toBe(true);
    expect(isInsideMunicipality({ type: "LineString", coordinates: [[0.5, 0.5], [2, 2]] }, municipalities)).toBe(true);
  });

  it("is false for a line outside every polygon", () => {
    expect(isInsideMunicipality({ type: "LineString", coordinates: [[2, 2], [3, 3]] }, municipalities)).toBe(false);
  });

  it("is false without a line", () => {
    expect(isInsideMunicipality(null, municipalities)).toBe(false);
    expect(isInsideMunicipality({ type: "LineString", coordinates: [[0.5, 0.5]] }, municipalities)).toBe(false);
  });
});

describe("isInterstate", () => {
  it("reads the signed route first, then the department id", () => {
    expect(isInterstate({ SIGNED_ROUTE: "I-15" })).toBe(true);
    expect(isInterstate({ SIGNED_ROUTE: "", DEPT_ID: "i-90" })).toBe(true);
    expect(isInterstate({ SIGNED_ROUTE: "US-93", DEPT_ID: "N-5" })).toBe(false);
    expect(isInterstate({})).toBe(false);
  });
});

describe("toCategorySegment", () => {
  it("falls back through field names and to geometry length", () => {
    const segment = toCategorySegment(
      road([[0, 0], [0, 1]], {
        SEGMENT_KEY: "MT-1_0_1_N-1",
        PER_100M_VMT: "40",
        SEC_LNT_MI: "",
        TOTAL: "7",
        TYC_AADT: 0,
        AADT: "500",
      })
    );
    expect(segment?.segmentKey).toBe("MT-1_0_1_N-1");
    expect(segment?.crashRate).toBe(40);
    expect(segment?.lengthMiles).toBeCloseTo(69.0941, 3);
    expect(segment?.totalCrashes).toBe(7);
    expect(segment?.dailyVmt).toBeCloseTo(34547.05, 1);
  });

  it("prefers the official section length", () => {
    const segment = toCategorySegment(road([[0, 0], [0, 1]], { PER_100M_VMT: 10, SEC_LNT_MI: "2.5", TYC_AADT: 100 }));
    expect(segment?.lengthMiles).toBe(2.5);
    expect(segment?.dailyVmt).toBe(250);
    expect(segment?.totalCrashes).toBe(0);
  });

  it("skips segments without a positive rate", () => {
    expect(toCategorySegment(road([[0, 0], [0, 1]], { PER_100M_VMT: "", SEC_LNT_MI: 1 }))).toBeNull();
    expect(toCategorySegment(road([[0, 0], [0, 1]], { PER_100M_VMT: 0, SEC_LNT_MI: 1 }))).toBeNull();
  });

  it("skips segments without any length", () => {
    const multi: Feature = {
      type: "Feature",
      geometry: { type: "MultiLineString", coordinates: [[[0, 0], [0, 1]]] },
      properties: { PER_100M_VMT: 5 },
    };
    expect(toCategorySegment(multi)).toBeNull();
  });
});

describe("weightedAverage", () => {
  it("weights rates by length", () => {
    expect(weightedAverage([categorySegment(1, 100), categorySegment(3, 20)])).toEqual({
      weightedRate: 40,
      totalMiles: 4,
      milesPerCrash: 2500000,
    });
  });

  it("returns zeros for no segments", () => {
    expect(weightedAverage([])).toEqual({ weightedRate: 0, totalMiles: 0, milesPerCrash: null });
  });
});

describe("categorizeSegments + summarizeCategories", () => {
  const municipalities = prepareMunicipalities([square("Town", 0, 1), square("Butte-Silver Bow", 10, 11)]);
  const features = [
    road([[0.2, 0.2], [0.4, 0.4]], { SIGNED_ROUTE: "I-15", SEC_LNT_MI: 1, PER_100M_VMT: 100, TOTAL_CRASHES: 3, TYC_AADT: 1000 }),
    road([[0.5, 0.5], [0.6, 0.6]], { DEPT_ID: "N-1", SEC_LNT_MI: 3, PER_100M_VMT: 20, TOTAL_CRASHES: 1, TYC_AADT: 500 }),
    road([[2, 2], [3, 3]], { DEPT_ID: "I-90", SEC_LNT_MI: 2, PER_100M_VMT: 50, TOTAL_CRASHES: 2, TYC_AADT: 2000 }),
    road([[10.2, 10.2], [10.4, 10.4]], { DEPT_ID: "N-2", SEC_LNT_MI: 1, PER_100M_VMT: 10, TOTAL_CRASHES: 1, TYC_AADT: 100 }),
    road([[0.2, 0.2], [0.3, 0.3]], { DEPT_ID: "N-3", SEC_LNT_MI: 1, PER_100M_VMT: 0 }),
  ];

  const categories = categorizeSegments(features, municipalities);

  it("puts each segment in its rollup and its interstate bucket", () => {
    expect(categories.interstate_inside).toHaveLength(1);
    expect(categories.non_interstate_inside).toHaveLength(1);
    expect(categories.interstate_outside).toHaveLength(1);
    // Inside an excluded municipality counts as outside
    expect(categories.non_interstate_outside).toHaveLength(1);
    expect(categories.all_inside).toHaveLength(2);
    expect(categories.all_outside).toHaveLength(2);
  });

  it("summarizes every category and the all-roads rollup", () => {
    const summaries = summarizeCategories(categories);
    expect(summaries.map((s) => s.category)).toEqual([
      "all_outside",
      "non_interstate_outside",
      "interstate_outside",
      "all_inside",
      "non_interstate_inside",
      "interstate_inside",
      "all",
    ]);

    const allInside = summaries[3];
    expect(allInside).toEqual({
      category: "all_inside",
      segmentCount: 2,
      totalCrashes: 4,
      totalDailyMiles: 2500,
      weightedRate: 40,
      totalMiles: 4,
      milesPerCrash: 2500000,
    });

    const all = summaries[6];
    expect(all.segmentCount).toBe(4);
    expect(all.totalCrashes).toBe(7);
    expect(all.totalDailyMiles).toBe(6600);
    expect(all.totalMiles).toBe(7);
    expect(all.weightedRate).toBeCloseTo(38.5714, 4);
  });
});
