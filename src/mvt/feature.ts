/**
 * @module mvt/feature
 *
 * Two-pass decoding of the MVT `Feature` message:
 *
 * ```protobuf
 * message Feature {
 *   optional uint64   id       = 1 [default = 0];
 *   repeated uint32   tags     = 2 [packed = true];
 *   optional GeomType type     = 3 [default = UNKNOWN];
 *   repeated uint32   geometry = 4 [packed = true];
 * }
 * ```
 *
 * {@link readFeature} runs while the enclosing layer is still being scanned
 * and keeps tags as bare indices, since the keys and values they point at
 * may appear later in the layer. {@link resolveFeature} runs once the layer
 * is complete and dereferences the indices and assembles the geometry.
 */

import { DecodeError } from '../errors.js';
import type { DecodeOptions } from '../errors.js';
import { type WireReader, WireType } from '../pbf/reader.js';
import { GeomType } from '../types.js';
import type { Feature, Int64, MvtValue } from '../types.js';
import { assembleGeometry } from './geometry.js';
import { toInt64 } from './value.js';

/**
 * A feature as read from the wire, before tag and geometry resolution.
 */
export interface RawFeature {
  id: Int64 | null;
  type: GeomType;
  /** Interleaved `[keyIndex, valueIndex, ...]` pairs. */
  tags: number[];
  /** Raw geometry command stream. */
  geometry: number[];
  /** Absolute offset of the feature payload. */
  offset: number;
  /** Absolute offset of the first `tags` field, or of the feature when absent. */
  tagsOffset: number;
  /** Absolute offset of the first `geometry` field, or of the feature when absent. */
  geometryOffset: number;
}

/**
 * Read one `Feature` payload without resolving anything.
 *
 * `tags` and `geometry` are accepted both packed and as repeated single
 * varints; several occurrences are concatenated in order. Unknown fields are
 * skipped.
 *
 * @throws {DecodeError} `MalformedFeature` when the tag sequence has odd
 *   length.
 */
export function readFeature(reader: WireReader): RawFeature {
  const feature: RawFeature = {
    id: null,
    type: GeomType.Unknown,
    tags: [],
    geometry: [],
    offset: reader.offset,
    tagsOffset: -1,
    geometryOffset: -1,
  };

  while (!reader.done) {
    const { field, wireType } = reader.readTag();

    if (field === 1 && wireType === WireType.Varint) {
      feature.id = toInt64(reader.readVarint64());
    } else if (field === 2 && isRepeatedVarint(wireType)) {
      if (feature.tagsOffset < 0) feature.tagsOffset = reader.offset;
      readRepeatedVarint(reader, wireType, feature.tags);
    } else if (field === 3 && wireType === WireType.Varint) {
      feature.type = toGeomType(reader.readVarint());
    } else if (field === 4 && isRepeatedVarint(wireType)) {
      if (feature.geometryOffset < 0) feature.geometryOffset = reader.offset;
      readRepeatedVarint(reader, wireType, feature.geometry);
    } else {
      reader.skipField(wireType);
    }
  }

  if (feature.tagsOffset < 0) feature.tagsOffset = feature.offset;
  if (feature.geometryOffset < 0) feature.geometryOffset = feature.offset;

  if (feature.tags.length % 2 !== 0) {
    throw new DecodeError(
      'MalformedFeature',
      `tags must come in key/value pairs, got ${feature.tags.length} indices`,
      feature.tagsOffset,
    );
  }

  return feature;
}

/**
 * Dereference a raw feature's tags through the layer tables and build its
 * geometry.
 *
 * @param raw - Output of {@link readFeature}.
 * @param index - Position of the feature within its layer, for warnings.
 * @param layer - Name of the enclosing layer, for warnings.
 * @throws {DecodeError} `MalformedFeature` for a tag index outside `keys`
 *   or `values`; `MalformedGeometry` from {@link assembleGeometry}.
 */
export function resolveFeature(
  raw: RawFeature,
  index: number,
  layer: string,
  keys: readonly string[],
  values: readonly MvtValue[],
  options: DecodeOptions,
): Feature {
  const properties = new Map<string, MvtValue>();

  for (let i = 0; i < raw.tags.length; i += 2) {
    const keyIndex = raw.tags[i];
    const valueIndex = raw.tags[i + 1];
    if (keyIndex >= keys.length) {
      throw new DecodeError(
        'MalformedFeature',
        `key index ${keyIndex} out of range (layer "${layer}" has ${keys.length} keys)`,
        raw.tagsOffset,
      );
    }
    if (valueIndex >= values.length) {
      throw new DecodeError(
        'MalformedFeature',
        `value index ${valueIndex} out of range (layer "${layer}" has ${values.length} values)`,
        raw.tagsOffset,
      );
    }
    properties.set(keys[keyIndex], values[valueIndex]);
  }

  const { onWarning } = options;
  const geometry = assembleGeometry(raw.type, raw.geometry, raw.geometryOffset, onWarning && (ring => {
    onWarning({
      kind: 'OrphanHole',
      message: `ring ${ring} of feature ${index} in layer "${layer}" is a hole with no exterior ring`,
      offset: raw.geometryOffset,
      layer,
      feature: index,
    });
  }));

  return { id: raw.id, type: raw.type, geometry, properties };
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Map a wire geometry type to {@link GeomType}. Values this decoder does not
 * know become `Unknown`.
 */
export function toGeomType(n: number): GeomType {
  switch (n) {
    case 1:
      return GeomType.Point;
    case 2:
      return GeomType.LineString;
    case 3:
      return GeomType.Polygon;
    default:
      return GeomType.Unknown;
  }
}

function isRepeatedVarint(wireType: WireType): boolean {
  return wireType === WireType.LengthDelimited || wireType === WireType.Varint;
}

/**
 * Append one occurrence of a repeated uint32 field to `out`, one value at a
 * time (a spread `push` hits the argument limit on long geometry runs).
 */
function readRepeatedVarint(reader: WireReader, wireType: WireType, out: number[]): void {
  if (wireType === WireType.Varint) {
    out.push(reader.readVarint());
    return;
  }
  for (const v of reader.readPackedVarints()) {
    out.push(v);
  }
}
