/**
 * Geo Service
 * Geodesic primitives shared by the crash matcher and the line deduplicator
 *
 * This service provides utility functions for:
 * - Great-circle distances (haversine) in meters and in miles
 * - Initial bearings and circular bearing differences
 * - Interpolating points along a line by arc length
 * - Sampling lines at evenly spaced fractions
 * - Picking the line to sample out of a LineString / MultiLineString
 *
 * Two Earth radii are in use on purpose: proximity checks use 6,371,000 m
 * (SPATIAL_DEDUP), section lengths use 3,958.8 mi (LINEAR_REF). Turf gives
 * us the central angle; each caller scales it by its own radius.
 *
 * Dependencies:
 * - @turf/turf: central angle and bearing computations
 */

import * as turf from "@turf/turf";
import type { Geometry, LonLat } from "../types/geo.types.js";
import { LINEAR_REF, SPATIAL_DEDUP } from "../config/constants.js";
import { isLine } from "../utils/geojson.js";

// ============================================
// Distance Calculations
// ============================================

/**
 * Central angle between two points in radians (haversine).
 */
function centralAngle(from: LonLat, to: LonLat): number {
  return turf.distance(from, to, { units: "radians" });
}

/**
 * Great-circle distance in meters (Earth radius 6,371,000 m)
 *
 * @example
 * distanceMeters([-111.03, 45.67], [-111.03, 45.68]);
 * // Returns: ~1111.95
 */
export function distanceMeters(p1: LonLat, p2: LonLat): number {
  return centralAngle(p1, p2) * SPATIAL_DEDUP.EARTH_RADIUS_METERS;
}

/**
 * Great-circle distance in miles (Earth radius 3,958.8 mi)
 */
export function distanceMiles(p1: LonLat, p2: LonLat): number {
  return centralAngle(p1, p2) * LINEAR_REF.EARTH_RADIUS_MILES;
}

/**
 * Length of a line in miles, summed pairwise.
 * Used when a segment row carries no official SEC_LNT_MI.
 */
export function lineLengthMiles(coords: LonLat[]): number {
  let total = 0;
  for (let i = 1; i < coords.length; i++) {
    total += distanceMiles(coords[i - 1], coords[i]);
  }
  return total;
}

// ============================================
// Bearings
// ============================================

/**
 * Initial bearing from p1 to p2 in degrees, normalized to [0, 360).
 *
 * @example
 * bearingDegrees([0, 0], [0, 1]); // 0 (north)
 * bearingDegrees([0, 0], [1, 0]); // 90 (east)
 */
export function bearingDegrees(p1: LonLat, p2: LonLat): number {
  // turf.bearing returns (-180, 180]
  const bearing = (turf.bearing(p1, p2) + 360) % 360;
  return bearing === 360 ? 0 : bearing;
}

/**
 * Smallest angle between two headings, in [0, 180].
 * abs((a - b + 180) mod 360 - 180) with a floored modulo.
 */
export function bearingDifference(a: number, b: number): number {
  const shifted = a - b + 180;
  const mod = ((shifted % 360) + 360) % 360;
  return Math.abs(mod - 180);
}

// ============================================
// Line Interpolation & Sampling
// ============================================

/**
 * Point at an arc-length fraction along a line.
 *
 * Cumulative length is measured with distanceMeters; the position inside
 * the bracketing segment is interpolated linearly in lon/lat.
 *
 * @param coords - Line vertices
 * @param fraction - 0 = first vertex, 1 = last vertex
 * @returns The interpolated point, or null for an empty line
 *
 * @example
 * pointAtFraction([[0, 0], [2, 2]], 0.5); // [1, 1]
 */
export function pointAtFraction(coords: LonLat[], fraction: number): LonLat | null {
  if (coords.length === 0) return null;
  if (fraction <= 0) return coords[0];
  if (fraction >= 1) return coords[coords.length - 1];

  const segmentLengths: number[] = [];
  let total = 0;
  for (let i = 0; i < coords.length - 1; i++) {
    const d = distanceMeters(coords[i], coords[i + 1]);
    segmentLengths.push(d);
    total += d;
  }

  // Zero-length (or single-vertex) line
  if (total === 0) return coords[0];

  const target = total * fraction;
  let travelled = 0;

  for (let i = 0; i < segmentLengths.length; i++) {
    const segment = segmentLengths[i];
    if (travelled + segment >= target) {
      const t = segment !== 0 ? (target - travelled) / segment : 0;
      const [lonA, latA] = coords[i];
      const [lonB, latB] = coords[i + 1];
      return [lonA + (lonB - lonA) * t, latA + (latB - latA) * t];
    }
    travelled += segment;
  }

  // Floating-point shortfall on the last segment
  return coords[coords.length - 1];
}

/**
 * Sample n points along a line at fractions i / (n - 1).
 *
 * @returns [] for an empty line; the single first vertex when the line has
 *          one vertex or n is 1
 */
export function sampleLine(coords: LonLat[], n: number): LonLat[] {
  if (coords.length === 0 || n < 1) return [];
  if (coords.length === 1 || n === 1) return [coords[0]];

  const samples: LonLat[] = [];
  for (let i = 0; i < n; i++) {
    const point = pointAtFraction(coords, i / (n - 1));
    if (point) samples.push(point);
  }
  return samples;
}

/**
 * Pair every sample with the heading it is travelling in.
 *
 * Each point takes the bearing toward the next sample; the last point
 * reuses the bearing of the final pair so the terminal vertex is covered
 * too. A lone point gets bearing 0.
 */
export function directedSamples(samples: LonLat[]): Array<{ point: LonLat; bearing: number }> {
  const directed: Array<{ point: LonLat; bearing: number }> = [];

  for (let i = 0; i < samples.length - 1; i++) {
    directed.push({ point: samples[i], bearing: bearingDegrees(samples[i], samples[i + 1]) });
  }

  if (samples.length >= 2) {
    const last = samples.length - 1;
    directed.push({
      point: samples[last],
      bearing: bearingDegrees(samples[last - 1], samples[last]),
    });
  } else if (samples.length === 1) {
    directed.push({ point: samples[0], bearing: 0 });
  }

  return directed;
}

// ============================================
// Geometry Access
// ============================================

function arcLengthMeters(coords: LonLat[]): number {
  let total = 0;
  for (let i = 1; i < coords.length; i++) {
    total += distanceMeters(coords[i - 1], coords[i]);
  }
  return total;
}

/**
 * Extract the line to sample from a feature geometry.
 *
 * - LineString: its coordinates
 * - MultiLineString: the constituent with the greatest arc length
 *   (the first one wins a tie)
 * - anything else: null
 *
 * Malformed or empty coordinate arrays also yield null. The returned
 * array is the geometry's own; callers must not mutate it.
 */
export function extractLineCoordinates(geometry: Geometry | null | undefined): LonLat[] | null {
  if (!geometry) return null;

  if (geometry.type === "LineString") {
    const line = geometry.coordinates;
    return isLine(line) && line.length > 0 ? line : null;
  }

  if (geometry.type === "MultiLineString") {
    if (!Array.isArray(geometry.coordinates)) return null;

    let longest: LonLat[] | null = null;
    let longestLength = -1;
    for (const line of geometry.coordinates) {
      if (!isLine(line) || line.length === 0) continue;
      const length = arcLengthMeters(line);
      if (length > longestLength) {
        longest = line;
        longestLength = length;
      }
    }
    return longest;
  }

  return null;
}
