/**
 * Route Groups Service
 * Splits merged traffic lines into per-route or per-group bundles
 *
 * Features are matched on their trimmed SIGNED_ROUTE, exactly. Group
 * definitions are configuration (see DEFAULT_ROUTE_GROUPS) and are always
 * passed in by the caller.
 */

import type { Feature } from "../types/geo.types.js";

export type RouteGroups = Readonly<Record<string, readonly string[]>>;

/** What to bundle: one file per route, one named group, or every group */
export type BundleRequest =
  | { mode: "routes"; routes: readonly string[] }
  | { mode: "group"; name: string; routes: readonly string[] }
  | { mode: "groups"; groups: RouteGroups };

export interface RouteBundle {
  name: string;
  fileName: string;
  features: Feature[];
}

export function normalizeSignedRoute(value: unknown): string {
  return value == null ? "" : String(value).trim();
}

/** individual_<name>.geojson with "/" and spaces replaced */
export function bundleFileName(name: string): string {
  return `individual_${name.replace(/\//g, "_").replace(/ /g, "_")}.geojson`;
}

export function indexBySignedRoute(features: Iterable<Feature>): Map<string, Feature[]> {
  const index = new Map<string, Feature[]>();
  for (const feature of features) {
    const route = normalizeSignedRoute(feature.properties.SIGNED_ROUTE);
    const list = index.get(route);
    if (list) {
      list.push(feature);
    } else {
      index.set(route, [feature]);
    }
  }
  return index;
}

function collect(index: ReadonlyMap<string, Feature[]>, routes: readonly string[]): Feature[] {
  return routes.flatMap((route) => index.get(normalizeSignedRoute(route)) ?? []);
}

/**
 * Build the bundles for a request. Unknown routes yield empty bundles.
 */
export function buildRouteBundles(features: Iterable<Feature>, request: BundleRequest): RouteBundle[] {
  const index = indexBySignedRoute(features);

  switch (request.mode) {
    case "routes":
      return request.routes.map((route) => {
        const name = normalizeSignedRoute(route);
        return { name, fileName: bundleFileName(name), features: collect(index, [route]) };
      });
    case "group":
      return [
        { name: request.name, fileName: bundleFileName(request.name), features: collect(index, request.routes) },
      ];
    case "groups":
      return Object.entries(request.groups).map(([name, routes]) => ({
        name,
        fileName: bundleFileName(name),
        features: collect(index, routes),
      }));
  }
}
