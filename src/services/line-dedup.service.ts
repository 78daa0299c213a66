/**
 * Line Deduplication Service
 * Drops simplified highway lines that already exist in the merged dataset
 *
 * A candidate is sampled the same way the grid was built. Each sample is
 * looked up in the grid with its heading; if at least `matchFraction`
 * of the samples find a close, same-direction neighbour, the candidate is
 * a duplicate and removed. Lines that cannot be sampled are kept.
 */

import type { Feature, FeatureRecord } from "../types/geo.types.js";
import type { DedupOptions, DedupResult, LineClassification } from "../types/dedup.types.js";
import { directedSamples, extractLineCoordinates, sampleLine } from "./geo.service.js";
import { SpatialGridIndex } from "./spatial-grid.service.js";
import { SPATIAL_DEDUP } from "../config/constants.js";
import { parseGeometry } from "../utils/geojson.js";

export class LineDeduplicator {
  readonly matchFraction: number;

  constructor(
    private readonly grid: SpatialGridIndex,
    matchFraction: number = SPATIAL_DEDUP.MATCH_FRACTION
  ) {
    this.matchFraction = matchFraction;
  }

  /**
   * Build the grid from existing lines and wrap it in a deduplicator.
   */
  static fromExisting(existing: Iterable<Feature>, options: Partial<DedupOptions> = {}): LineDeduplicator {
    const { matchFraction, ...gridOptions } = options;
    return new LineDeduplicator(SpatialGridIndex.build(existing, gridOptions), matchFraction);
  }

  /**
   * Decide whether one candidate is a duplicate.
   *
   * matchFraction = matched samples / total samples, where only samples
   * that have a heading (all of them, once the line yields two or more)
   * can match.
   */
  classify(feature: FeatureRecord): LineClassification {
    const coords = extractLineCoordinates(parseGeometry(feature.geometry));
    const samples = coords ? sampleLine(coords, this.grid.options.sampleCount) : [];

    if (samples.length === 0) {
      return { decision: "keep", matchedSamples: 0, totalSamples: 0, matchFraction: 0, sampled: false };
    }

    // A single sample has no heading to compare
    const headed = samples.length >= 2 ? directedSamples(samples) : [];
    let matchedSamples = 0;
    for (const { point, bearing } of headed) {
      if (this.grid.hasMatch(point, bearing)) matchedSamples++;
    }

    const totalSamples = samples.length;
    const matchFraction = matchedSamples / Math.max(1, totalSamples);

    return {
      decision: matchFraction >= this.matchFraction ? "remove" : "keep",
      matchedSamples,
      totalSamples,
      matchFraction,
      sampled: true,
    };
  }

  /**
   * Classify every candidate. The returned lists hold the candidate objects
   * themselves, so kept features are written back out exactly as read.
   */
  dedupe<T extends FeatureRecord>(candidates: Iterable<T>): DedupResult<T> {
    const kept: T[] = [];
    const removed: T[] = [];
    const classifications: LineClassification[] = [];

    for (const feature of candidates) {
      const classification = this.classify(feature);
      classifications.push(classification);
      if (classification.decision === "remove") {
        removed.push(feature);
      } else {
        kept.push(feature);
      }
    }

    console.log(
      `[LineDedup] ${classifications.length} candidates: ${removed.length} removed, ${kept.length} kept`
    );

    return {
      kept,
      removed,
      classifications,
      keptCount: kept.length,
      removedCount: removed.length,
    };
  }
}
