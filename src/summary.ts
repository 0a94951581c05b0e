/**
 * @module summary
 *
 * Read-only text renderings of a decoded {@link Tile}: per-layer feature
 * counts with sample features, truncated geometry listings, and selected
 * property columns. Every function returns lines instead of printing them.
 */

import { GeomType } from './types.js';
import type { Geometry, Tile } from './types.js';
import { plainProperties, plainValue } from './mvt/value.js';

/** Nested coordinate arrays, as produced by {@link geometryCoordinates}. */
export type NestedCoords = number | null | readonly NestedCoords[];

export interface SummaryOptions {
  /** Sample features listed per layer. @defaultValue 3 */
  maxFeatures?: number;
}

export interface GeometryListingOptions {
  /** Features listed per layer. @defaultValue 5 */
  maxFeatures?: number;
  /** Elements kept at every nesting level. @defaultValue 10 */
  maxCoords?: number;
}

/** Display name of a geometry type. */
export function geomTypeName(type: GeomType): 'Unknown' | 'Point' | 'LineString' | 'Polygon' {
  switch (type) {
    case GeomType.Point:
      return 'Point';
    case GeomType.LineString:
      return 'LineString';
    case GeomType.Polygon:
      return 'Polygon';
    default:
      return 'Unknown';
  }
}

/**
 * Flatten a {@link Geometry} into plain nested arrays.
 *
 * Points become `[[x, y], ...]`, lines `[[[x, y], ...], ...]`, and polygons
 * a list of ring lists with the exterior first (omitted when absent).
 * Unknown geometries yield their raw command integers.
 */
export function geometryCoordinates(geometry: Geometry): NestedCoords[] {
  switch (geometry.type) {
    case 'Point':
      return geometry.points;
    case 'LineString':
      return geometry.lines;
    case 'Polygon':
      return geometry.polygons.map(p => (p.exterior ? [p.exterior, ...p.holes] : p.holes));
    case 'Unknown':
      return geometry.commands;
  }
}

/**
 * Recursively keep the first `maxCoords` elements of every nested array.
 *
 * @example
 * ```ts
 * truncateGeometry([[1, 2], [3, 4], [5, 6]], 2); // [[1, 2], [3, 4]]
 * ```
 */
export function truncateGeometry(value: NestedCoords, maxCoords: number): NestedCoords {
  if (value === null || typeof value === 'number') return value;
  return value.slice(0, maxCoords).map(v => truncateGeometry(v, maxCoords));
}

/**
 * Layer headers plus a few sample features per layer.
 *
 * ```text
 *
 * Layer: main | feature count: 2
 *   Feature 1: type=Point sample_geom=[10,20] properties={"shipname":"A"}
 *   ... 1 more features omitted ...
 * ```
 */
export function summarizeTile(tile: Tile, options: SummaryOptions = {}): string[] {
  const maxFeatures = options.maxFeatures ?? 3;
  if (tile.layers.length === 0) return ['No layers found in the tile.'];

  const lines: string[] = [];
  for (const layer of tile.layers) {
    const { features } = layer;
    lines.push('', `Layer: ${layer.name} | feature count: ${features.length}`);

    features.slice(0, maxFeatures).forEach((feature, i) => {
      const sample = geometryCoordinates(feature.geometry)[0] ?? null;
      lines.push(
        `  Feature ${i + 1}: type=${geomTypeName(feature.type)} ` +
        `sample_geom=${toJson(sample)} properties=${toJson(plainProperties(feature))}`,
      );
    });

    if (features.length > maxFeatures) {
      lines.push(`  ... ${features.length - maxFeatures} more features omitted ...`);
    }
  }
  return lines;
}

/**
 * Truncated geometry for a limited number of features per layer. Layers
 * without features are skipped.
 */
export function describeGeometries(tile: Tile, options: GeometryListingOptions = {}): string[] {
  const maxFeatures = options.maxFeatures ?? 5;
  const maxCoords = options.maxCoords ?? 10;
  if (tile.layers.length === 0) return ['No geometries to display.'];

  const lines = [`Geometries (maxFeatures=${maxFeatures}, maxCoords=${maxCoords}):`];
  for (const layer of tile.layers) {
    const { features } = layer;
    if (features.length === 0) continue;

    lines.push('', `Layer: ${layer.name}`);
    features.slice(0, maxFeatures).forEach((feature, i) => {
      const coords = truncateGeometry(geometryCoordinates(feature.geometry), maxCoords);
      lines.push(`  Feature ${i + 1}: type=${geomTypeName(feature.type)} geometry=${toJson(coords)}`);
    });

    if (features.length > maxFeatures) {
      lines.push(`  ... ${features.length - maxFeatures} more features omitted ...`);
    }
  }
  return lines;
}

/**
 * One line per feature with the requested properties:
 * `<layer> | <field>=<value> | ...`. Missing properties print as `null`.
 */
export function selectFields(tile: Tile, fields: readonly string[]): string[] {
  if (tile.layers.length === 0) return ['No data to list requested fields.'];

  const lines = [`Requested fields (${fields.join(', ')}):`];
  for (const layer of tile.layers) {
    for (const feature of layer.features) {
      const cells = fields.map(field => {
        const value = feature.properties.get(field);
        return `${field}=${String(value ? plainValue(value) : null)}`;
      });
      lines.push([layer.name, ...cells].join(' | '));
    }
  }
  return lines;
}

/** `JSON.stringify` that writes bigints as decimal strings. */
function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}
