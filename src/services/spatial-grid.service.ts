/**
 * Spatial Grid Index
 * Coarse lon/lat grid of directed samples taken from existing line geometry
 *
 * OVERVIEW:
 * ---------
 * Every indexed line is sampled at evenly spaced arc-length fractions.
 * Each sample is stored with its heading in the cell
 * (floor(lon / binSize), floor(lat / binSize)). Queries only look at the
 * 3x3 block of cells around the query point, so the search area is bounded
 * no matter how large the dataset is.
 *
 * The block reaches at least one full cell in every direction, which covers
 * any sample within maxDistanceMeters as long as binSize (in meters) is
 * larger than that distance. The default 0.01 deg (~1.1 km) against 50 m
 * leaves plenty of room.
 *
 * SCAN ORDER:
 * -----------
 * Cells are visited in lexicographic order of (dx, dy), dx and dy from -1
 * to 1, and samples in insertion order. hasMatch() stops at the first
 * accepted sample; findMatch() keeps scanning and returns the nearest one
 * (earlier scan position wins a distance tie). Both are deterministic.
 *
 * The grid is read-only once built.
 */

import type { Feature, GridBinKey, LonLat, SpatialSample } from "../types/geo.types.js";
import type { SpatialMatchOptions } from "../types/dedup.types.js";
import {
  bearingDifference,
  directedSamples,
  distanceMeters,
  extractLineCoordinates,
  sampleLine,
} from "./geo.service.js";
import { SPATIAL_DEDUP } from "../config/constants.js";

export const DEFAULT_SPATIAL_MATCH_OPTIONS: SpatialMatchOptions = {
  binSize: SPATIAL_DEDUP.BIN_SIZE_DEG,
  sampleCount: SPATIAL_DEDUP.SAMPLE_COUNT,
  maxDistanceMeters: SPATIAL_DEDUP.MAX_DISTANCE_M,
  maxBearingDiff: SPATIAL_DEDUP.MAX_BEARING_DIFF,
};

export interface SampleMatch {
  sample: SpatialSample;
  distanceMeters: number;
  bearingDiff: number;
}

export class SpatialGridIndex {
  readonly options: Readonly<SpatialMatchOptions>;
  /** x -> y -> samples; integer-pair keys without string formatting */
  private readonly bins = new Map<number, Map<number, SpatialSample[]>>();
  private sampleTotal = 0;

  private constructor(options: SpatialMatchOptions) {
    if (!(options.binSize > 0)) {
      throw new RangeError(`binSize must be positive, got ${options.binSize}`);
    }
    this.options = Object.freeze({ ...options });
  }

  /**
   * Sample every line feature and index the samples.
   * Features without a usable line (points, polygons, empty geometry) are skipped.
   */
  static build(
    features: Iterable<Feature>,
    options: Partial<SpatialMatchOptions> = {}
  ): SpatialGridIndex {
    const index = new SpatialGridIndex({ ...DEFAULT_SPATIAL_MATCH_OPTIONS, ...options });
    let indexedFeatures = 0;
    let skippedFeatures = 0;

    for (const feature of features) {
      const coords = extractLineCoordinates(feature.geometry);
      if (!coords) {
        skippedFeatures++;
        continue;
      }
      const samples = sampleLine(coords, index.options.sampleCount);
      for (const { point, bearing } of directedSamples(samples)) {
        index.insert({ lon: point[0], lat: point[1], bearing });
      }
      indexedFeatures++;
    }

    console.log(
      `[SpatialGrid] indexed ${index.sampleTotal} samples from ${indexedFeatures} lines into ${index.binCount} bins (${skippedFeatures} skipped)`
    );

    return index;
  }

  /** Grid cell containing a point */
  binOf(lon: number, lat: number): GridBinKey {
    return {
      x: Math.floor(lon / this.options.binSize),
      y: Math.floor(lat / this.options.binSize),
    };
  }

  get binCount(): number {
    let total = 0;
    for (const column of this.bins.values()) total += column.size;
    return total;
  }

  get sampleCount(): number {
    return this.sampleTotal;
  }

  /** Samples stored in one cell (empty when the cell is unused) */
  samplesIn(bin: GridBinKey): readonly SpatialSample[] {
    return this.bins.get(bin.x)?.get(bin.y) ?? [];
  }

  /**
   * True when any sample in the 3x3 neighbourhood lies within the distance
   * tolerance and points the same way (within the bearing tolerance).
   */
  hasMatch(point: LonLat, bearing: number): boolean {
    for (const sample of this.neighbourhood(point)) {
      if (this.accept(point, bearing, sample)) return true;
    }
    return false;
  }

  /**
   * Nearest tolerance-satisfying sample, or null.
   */
  findMatch(point: LonLat, bearing: number): SampleMatch | null {
    let best: SampleMatch | null = null;

    for (const sample of this.neighbourhood(point)) {
      const match = this.accept(point, bearing, sample);
      if (match && (!best || match.distanceMeters < best.distanceMeters)) {
        best = match;
      }
    }

    return best;
  }

  private insert(sample: SpatialSample): void {
    const { x, y } = this.binOf(sample.lon, sample.lat);
    let column = this.bins.get(x);
    if (!column) {
      column = new Map();
      this.bins.set(x, column);
    }
    const cell = column.get(y);
    if (cell) {
      cell.push(sample);
    } else {
      column.set(y, [sample]);
    }
    this.sampleTotal++;
  }

  private *neighbourhood(point: LonLat): Generator<SpatialSample> {
    const { x, y } = this.binOf(point[0], point[1]);
    for (let dx = -1; dx <= 1; dx++) {
      const column = this.bins.get(x + dx);
      if (!column) continue;
      for (let dy = -1; dy <= 1; dy++) {
        const cell = column.get(y + dy);
        if (cell) yield* cell;
      }
    }
  }

  private accept(point: LonLat, bearing: number, sample: SpatialSample): SampleMatch | null {
    const distance = distanceMeters(point, [sample.lon, sample.lat]);
    if (distance > this.options.maxDistanceMeters) return null;

    const diff = bearingDifference(bearing, sample.bearing);
    if (diff > this.options.maxBearingDiff) return null;

    return { sample, distanceMeters: distance, bearingDiff: diff };
  }
}
