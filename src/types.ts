/**
 * @module types
 *
 * Shared type definitions for decoded vector tiles.
 *
 * This module defines the data structures produced by the decode pipeline:
 *
 * - **GeomType** — MVT geometry type constants
 * - **MvtValue** — typed property value (the MVT `Value` oneof)
 * - **Geometry** — reconstructed point, line and polygon coordinates
 * - **Feature / Layer / Tile** — the decoded tile hierarchy
 *
 * All coordinates are integers in the layer's local space, `[0, extent]`
 * for geometry inside the tile and beyond that range for buffered geometry.
 * Every structure is built once per decode and never mutated afterwards.
 */

// ─── Geometry Types ─────────────────────────────────────────────────────────

/**
 * MVT geometry type constants per the Mapbox Vector Tile 2.1 specification.
 *
 * Values outside this range in a tile decode to `Unknown`.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */
export const enum GeomType {
  Unknown = 0,
  Point = 1,
  LineString = 2,
  Polygon = 3,
}

// ─── Values ─────────────────────────────────────────────────────────────────

/**
 * A 64-bit integer: a `number` when it fits in the safe-integer range,
 * a `bigint` otherwise.
 */
export type Int64 = number | bigint;

/**
 * A tagged MVT property value.
 *
 * One variant per field of the MVT `Value` message, plus `null` for a
 * `Value` that carried no recognized field.
 */
export type MvtValue =
  | { type: 'string'; value: string }
  | { type: 'float'; value: number }
  | { type: 'double'; value: number }
  | { type: 'int'; value: Int64 }
  | { type: 'uint'; value: Int64 }
  | { type: 'sint'; value: Int64 }
  | { type: 'bool'; value: boolean }
  | { type: 'null' };

/** An {@link MvtValue} with its type tag stripped. */
export type PropertyValue = string | number | bigint | boolean | null;

// ─── Geometry ───────────────────────────────────────────────────────────────

/** An `[x, y]` pair in layer-local integer coordinates. */
export type Coord = [x: number, y: number];

/**
 * One polygon: an exterior ring plus zero or more holes.
 *
 * Rings hold their vertices once each; the closing edge back to the first
 * vertex is implicit. `exterior` is `null` only for the degenerate polygon
 * built from holes that appeared before any exterior ring.
 */
export interface Polygon {
  exterior: Coord[] | null;
  holes: Coord[][];
}

/**
 * Reconstructed feature geometry, discriminated by `type`.
 *
 * `Unknown` keeps the raw command integers, since their meaning depends on
 * a geometry type this decoder does not know.
 */
export type Geometry =
  | { type: 'Unknown'; commands: number[] }
  | { type: 'Point'; points: Coord[] }
  | { type: 'LineString'; lines: Coord[][] }
  | { type: 'Polygon'; polygons: Polygon[] };

// ─── Tile hierarchy ─────────────────────────────────────────────────────────

/**
 * A decoded feature.
 */
export interface Feature {
  /** Feature ID, or `null` when the field is absent (distinct from `0`). */
  readonly id: Int64 | null;
  readonly type: GeomType;
  readonly geometry: Geometry;
  /**
   * Properties resolved through the layer's key and value tables, in tag
   * order. A key repeated within one feature keeps its last value.
   */
  readonly properties: ReadonlyMap<string, MvtValue>;
}

/**
 * A decoded layer.
 *
 * `keys` and `values` are the layer-wide tables that feature tags index
 * into; they are kept as read so that duplicates stay distinct.
 */
export interface Layer {
  readonly name: string;
  /** MVT version, `1` when absent. */
  readonly version: number;
  /** Size of the local coordinate space, `4096` when absent. */
  readonly extent: number;
  readonly keys: readonly string[];
  readonly values: readonly MvtValue[];
  readonly features: readonly Feature[];
}

/**
 * A decoded tile. Layers appear in the order they were encountered in the
 * buffer.
 */
export interface Tile {
  readonly layers: readonly Layer[];
}
