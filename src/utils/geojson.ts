/**
 * GeoJSON guards.
 * Narrow JSON read from disk or request bodies into the feature types the
 * services work with, without trusting its shape.
 */

import type {
  Feature,
  FeatureCollection,
  FeatureProperties,
  FeatureRecord,
  Geometry,
  LonLat,
  OtherGeometry,
} from "../types/geo.types.js";

const OTHER_GEOMETRY_TYPES: ReadonlyArray<OtherGeometry["type"]> = [
  "Point",
  "MultiPoint",
  "Polygon",
  "MultiPolygon",
  "GeometryCollection",
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** [lon, lat] with finite numbers; a trailing elevation is allowed */
export function isLonLat(value: unknown): value is LonLat {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number" &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

export function isLine(value: unknown): value is LonLat[] {
  return Array.isArray(value) && value.every(isLonLat);
}

function isOtherGeometryType(type: unknown): type is OtherGeometry["type"] {
  return OTHER_GEOMETRY_TYPES.some((t) => t === type);
}

/**
 * Parse a geometry object.
 * Lines with malformed coordinates and unknown geometry types become null,
 * which the matchers treat as "no line".
 */
export function parseGeometry(value: unknown): Geometry | null {
  if (!isRecord(value)) return null;
  const { type, coordinates } = value;

  if (type === "LineString") {
    return isLine(coordinates) ? { type, coordinates } : null;
  }
  if (type === "MultiLineString") {
    return Array.isArray(coordinates) && coordinates.every(isLine) ? { type, coordinates } : null;
  }
  if (isOtherGeometryType(type)) {
    const geometry: OtherGeometry = { type, coordinates };
    if (value.geometries !== undefined) geometry.geometries = value.geometries;
    return geometry;
  }
  return null;
}

export function parseFeature(value: unknown): Feature | null {
  if (!isRecord(value) || value.type !== "Feature") return null;
  const properties: FeatureProperties = isRecord(value.properties) ? value.properties : {};
  return {
    type: "Feature",
    geometry: parseGeometry(value.geometry),
    properties,
  };
}

/**
 * Parse a FeatureCollection.
 * @returns null when the value is not a FeatureCollection or any entry is not a Feature
 */
export function parseFeatureCollection(value: unknown): FeatureCollection | null {
  if (!isRecord(value) || value.type !== "FeatureCollection" || !Array.isArray(value.features)) {
    return null;
  }

  const features: Feature[] = [];
  for (const entry of value.features) {
    const feature = parseFeature(entry);
    if (!feature) return null;
    features.push(feature);
  }

  return { type: "FeatureCollection", features };
}

export function isFeatureRecord(value: unknown): value is FeatureRecord {
  return isRecord(value) && value.type === "Feature";
}

/**
 * Features of a FeatureCollection as they were received, for callers that
 * write features back out and must not lose members.
 * @returns null when the value is not a FeatureCollection or any entry is not a Feature
 */
export function parseFeatureRecords(value: unknown): FeatureRecord[] | null {
  if (!isRecord(value) || value.type !== "FeatureCollection" || !Array.isArray(value.features)) {
    return null;
  }
  const features: unknown[] = value.features;
  return features.every(isFeatureRecord) ? features : null;
}
