/**
 * @module tile
 *
 * Top-level tile decoding.
 *
 * ```protobuf
 * message Tile {
 *   repeated Layer layers = 3;
 *   extensions 16 to 8191;
 * }
 * ```
 *
 * Decoding is synchronous and pure: the input buffer is only read, and the
 * returned {@link Tile} shares no memory with it.
 *
 * @example
 * ```typescript
 * import { decodeTile } from 'vt-decode';
 *
 * const tile = decodeTile(bytes, {
 *   onWarning: w => console.warn(w.message),
 * });
 *
 * for (const layer of tile.layers) {
 *   console.log(layer.name, layer.features.length);
 * }
 * ```
 */

import type { DecodeOptions } from './errors.js';
import { WireReader, WireType } from './pbf/reader.js';
import { decodeLayer } from './mvt/layer.js';
import type { Layer, Tile } from './types.js';

const TILE_LAYERS = 3;

/**
 * Decode a Mapbox Vector Tile.
 *
 * Layers are returned in encounter order; fields other than `layers` are
 * skipped. An empty buffer is a valid tile with no layers.
 *
 * @param bytes - Raw (uncompressed) tile payload.
 * @param options - See {@link DecodeOptions}.
 * @returns The decoded tile.
 * @throws {DecodeError} On the first malformed structure anywhere in the
 *   tile. No partial tile is returned.
 */
export function decodeTile(bytes: Uint8Array | ArrayBuffer, options: DecodeOptions = {}): Tile {
  const reader = new WireReader(bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes));
  const layers: Layer[] = [];

  while (!reader.done) {
    const { field, wireType } = reader.readTag();
    if (field === TILE_LAYERS && wireType === WireType.LengthDelimited) {
      layers.push(decodeLayer(reader.readMessage(), options));
    } else {
      reader.skipField(wireType);
    }
  }

  return { layers };
}
