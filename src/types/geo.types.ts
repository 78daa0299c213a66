/**
 * Geometry Type Definitions
 * GeoJSON shapes consumed by the spatial index and line deduplicator
 *
 * Coordinates follow GeoJSON order: [longitude, latitude].
 */

// ============================================
// Coordinates
// ============================================

/** A single [lon, lat] pair */
export type LonLat = [number, number];

// ============================================
// GeoJSON Geometries
// ============================================

export interface LineStringGeometry {
  type: "LineString";
  coordinates: LonLat[];
}

export interface MultiLineStringGeometry {
  type: "MultiLineString";
  coordinates: LonLat[][];
}

/**
 * Any other geometry the source files may carry (points, polygons).
 * Kept loose: the core only reads lines and treats the rest as "no line".
 */
export interface OtherGeometry {
  type: "Point" | "MultiPoint" | "Polygon" | "MultiPolygon" | "GeometryCollection";
  coordinates?: unknown;
  geometries?: unknown;
}

export type Geometry = LineStringGeometry | MultiLineStringGeometry | OtherGeometry;

/** Feature properties are passed through unchanged */
export type FeatureProperties = Record<string, unknown>;

export interface Feature<P extends FeatureProperties = FeatureProperties> {
  type: "Feature";
  geometry: Geometry | null;
  properties: P;
}

/**
 * A Feature exactly as it was read. Only `type` is checked; `id`, `bbox`
 * and any foreign members ride along untouched.
 */
export interface FeatureRecord {
  type: "Feature";
  geometry?: unknown;
  properties?: unknown;
}

export interface FeatureCollection<P extends FeatureProperties = FeatureProperties> {
  type: "FeatureCollection";
  features: Feature<P>[];
}

// ============================================
// Spatial Grid
// ============================================

/** A sampled point on an indexed line, with the heading toward the next sample */
export interface SpatialSample {
  lon: number;
  lat: number;
  bearing: number; // degrees, [0, 360)
}

/** Integer grid cell coordinates: floor(lon / binSize), floor(lat / binSize) */
export interface GridBinKey {
  x: number;
  y: number;
}
