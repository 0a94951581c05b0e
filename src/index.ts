/**
 * @module vt-decode
 *
 * Public API surface for the vt-decode library.
 *
 * vt-decode reads Mapbox Vector Tile (MVT 2.1) payloads into typed layers,
 * features and geometries, with no runtime dependencies. The library is
 * organized in three tiers:
 *
 * ---
 *
 * ### Decoding
 *
 * | Export | Input | Use case |
 * |--------|-------|----------|
 * | {@link decodeTile} | `Uint8Array` / `ArrayBuffer` | Decode a tile already in memory. |
 * | {@link TileClient} | Tile location | Fetch through a {@link Connector}, then decode. |
 * | {@link WireReader} | `Uint8Array` | Low-level protobuf access for other schemas. |
 *
 * Malformed input raises a {@link DecodeError} carrying a kind and an
 * absolute byte offset. Soft conditions arrive as {@link DecodeWarning}
 * values through {@link DecodeOptions.onWarning}.
 *
 * ---
 *
 * ### Connectors
 *
 * | Connector | Backend | Location format |
 * |-----------|---------|-----------------|
 * | {@link LocalConnector} | Local filesystem | `./tiles/12/3294/1837.mvt` |
 * | {@link HttpConnector} | HTTP/HTTPS with bearer token and retry | `https://tiles.example.com/12/3294/1837` |
 *
 * Both are also available from `vt-decode/connectors`.
 *
 * ---
 *
 * ### Helpers
 *
 * - {@link buildTileUrl} / {@link setMatchedFilter} -- tile URL construction.
 * - {@link summarizeTile}, {@link describeGeometries}, {@link selectFields}
 *   -- text listings of a decoded tile.
 * - {@link plainValue} / {@link plainProperties} -- untagged property values.
 */

// ─── Decoding ───────────────────────────────────────────────────────────────

export { decodeTile } from './tile.js';
export { TileClient } from './client.js';
export { DecodeError } from './errors.js';
export { WireReader, WireType, zigzagDecode, zigzagDecode64 } from './pbf/reader.js';
export { decodeLayer, DEFAULT_EXTENT, DEFAULT_VERSION } from './mvt/layer.js';
export { decodeValue, plainProperties, plainValue, toInt64 } from './mvt/value.js';
export { assembleGeometry, classifyRings, signedArea } from './mvt/geometry.js';

// ─── Connectors ─────────────────────────────────────────────────────────────

export { LocalConnector } from './connectors/local.js';
export { HttpConnector, HttpError } from './connectors/http.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

export { buildTileUrl, isMatchedChoice, setMatchedFilter } from './query.js';
export {
  describeGeometries,
  geometryCoordinates,
  geomTypeName,
  selectFields,
  summarizeTile,
  truncateGeometry,
} from './summary.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export { GeomType } from './types.js';
export type {
  Coord,
  Feature,
  Geometry,
  Int64,
  Layer,
  MvtValue,
  Polygon,
  PropertyValue,
  Tile,
} from './types.js';
export type { DecodeErrorKind, DecodeOptions, DecodeWarning, DecodeWarningKind } from './errors.js';
export type { Tag } from './pbf/reader.js';
export type { Connector, TileResponse } from './connectors/connector.js';
export type { HttpConnectorOptions } from './connectors/http.js';
export type { MatchedChoice, TileQuery } from './query.js';
export type { GeometryListingOptions, NestedCoords, SummaryOptions } from './summary.js';
