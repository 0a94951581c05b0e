/**
 * @module mvt/layer
 *
 * Decoder for the MVT `Layer` message:
 *
 * ```protobuf
 * message Layer {
 *   required uint32  version  = 15 [default = 1];
 *   required string  name     = 1;
 *   repeated Feature features = 2;
 *   repeated string  keys     = 3;
 *   repeated Value   values   = 4;
 *   optional uint32  extent   = 5 [default = 4096];
 * }
 * ```
 *
 * Fields may arrive in any order, and a feature's tags may reference keys
 * and values that appear after it. The layer is therefore read in two
 * passes: the first scan fills the key and value tables and collects
 * {@link RawFeature}s holding bare indices; the second resolves every
 * feature against the completed tables.
 */

import { DecodeError } from '../errors.js';
import type { DecodeOptions } from '../errors.js';
import { type WireReader, WireType } from '../pbf/reader.js';
import type { Layer, MvtValue } from '../types.js';
import { readFeature, resolveFeature } from './feature.js';
import type { RawFeature } from './feature.js';
import { decodeValue } from './value.js';

export const DEFAULT_VERSION = 1;
export const DEFAULT_EXTENT = 4096;

/**
 * Decode one `Layer` payload.
 *
 * @param reader - Reader positioned over the layer payload only.
 * @param options - Decode options; warnings raised by feature geometry are
 *   forwarded to `options.onWarning`.
 * @returns The fully resolved layer.
 * @throws {DecodeError} `MalformedLayer` when the name is missing or empty,
 *   plus any error raised while reading or resolving its features.
 */
export function decodeLayer(reader: WireReader, options: DecodeOptions = {}): Layer {
  const start = reader.offset;
  let name: string | null = null;
  let version = DEFAULT_VERSION;
  let extent = DEFAULT_EXTENT;
  const keys: string[] = [];
  const values: MvtValue[] = [];
  const rawFeatures: RawFeature[] = [];

  while (!reader.done) {
    const { field, wireType } = reader.readTag();

    if (field === 15 && wireType === WireType.Varint) {
      version = reader.readVarint();
    } else if (field === 1 && wireType === WireType.LengthDelimited) {
      name = reader.readString();
    } else if (field === 2 && wireType === WireType.LengthDelimited) {
      rawFeatures.push(readFeature(reader.readMessage()));
    } else if (field === 3 && wireType === WireType.LengthDelimited) {
      keys.push(reader.readString());
    } else if (field === 4 && wireType === WireType.LengthDelimited) {
      values.push(decodeValue(reader.readMessage()));
    } else if (field === 5 && wireType === WireType.Varint) {
      extent = reader.readVarint();
    } else {
      reader.skipField(wireType);
    }
  }

  if (name === null || name === '') {
    throw new DecodeError('MalformedLayer', 'layer has no name', start);
  }

  const layerName = name;
  const features = rawFeatures.map((raw, index) =>
    resolveFeature(raw, index, layerName, keys, values, options),
  );

  return { name: layerName, version, extent, keys, values, features };
}
