/**
 * County Rates Service Tests
 */
import { describe, it, expect } from "vitest";
import {
  computeCountyRates,
  countCrashesByCounty,
  loadCensusPopulations,
  titleCase,
  toCountyCsv,
} from "../services/county-rates.service.js";

describe("titleCase", () => {
  it("capitalizes every word", () => {
    expect(titleCase("lewis and clark")).toBe("Lewis And Clark");
    expect(titleCase("SILVER BOW")).toBe("Silver Bow");
  });
});

describe("loadCensusPopulations", () => {
  it("keys by lower-cased county and treats non-integers as 0", () => {
    const populations = loadCensusPopulations([
      { COUNTY: " Gallatin ", TOT_POP: "100000" },
      { COUNTY: "Park", TOT_POP: "1,000" },
      { COUNTY: "", TOT_POP: "5" },
    ]);
    expect([...populations]).toEqual([
      ["gallatin", 100000],
      ["park", 0],
    ]);
  });
});

describe("countCrashesByCounty", () => {
  it("counts case-insensitively and skips blank counties", () => {
    const counts = countCrashesByCounty([
      { COUNTY: "Gallatin" },
      { COUNTY: "GALLATIN " },
      { COUNTY: "Park" },
      { COUNTY: "" },
      {},
    ]);
    expect([...counts]).toEqual([
      ["gallatin", 2],
      ["park", 1],
    ]);
  });
});

describe("computeCountyRates", () => {
  const rates = computeCountyRates(
    new Map([
      ["gallatin", 50],
      ["yellowstone", 30],
      ["unknownco", 3],
    ]),
    new Map([
      ["gallatin", 100000],
      ["yellowstone", 200000],
      ["petroleum", 500],
    ])
  );

  it("ranks by crashes per 100k residents, counties without population last", () => {
    expect(rates.map((r) => r.county)).toEqual(["Gallatin", "Yellowstone", "Petroleum", "Unknownco"]);
    expect(rates[0].accidentsPer100kResidents).toBe(50);
    expect(rates[1].accidentsPer100kResidents).toBeCloseTo(15, 9);
    expect(rates[2]).toEqual({ county: "Petroleum", totalAccidents: 0, accidentsPer100kResidents: 0 });
    expect(rates[3]).toEqual({ county: "Unknownco", totalAccidents: 3, accidentsPer100kResidents: null });
  });

  it("writes a CSV with two decimals", () => {
    expect(toCountyCsv(rates).split("\r\n")).toEqual([
      "county,totalAccidents,accidentsPer100kResidents",
      "Gallatin,50,50.00",
      "Yellowstone,30,15.00",
      "Petroleum,0,0.00",
      "Unknownco,3,",
    ]);
  });
});
