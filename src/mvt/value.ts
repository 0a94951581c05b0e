/**
 * @module mvt/value
 *
 * Decoder for the MVT `Value` message, the typed union stored in each
 * layer's value table:
 *
 * ```protobuf
 * message Value {
 *   optional string string_value = 1;
 *   optional float  float_value  = 2;
 *   optional double double_value = 3;
 *   optional int64  int_value    = 4;
 *   optional uint64 uint_value   = 5;
 *   optional sint64 sint_value   = 6;
 *   optional bool   bool_value   = 7;
 * }
 * ```
 */

import { type WireReader, WireType } from '../pbf/reader.js';
import type { Feature, Int64, MvtValue, PropertyValue } from '../types.js';

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Decode one `Value` message.
 *
 * A well-formed value carries exactly one field. When several are present
 * the last one wins; when none is recognized the result is `{ type: 'null' }`.
 * Unknown field numbers, and known fields sent with an unexpected wire type,
 * are skipped.
 *
 * @param reader - Reader positioned over the `Value` payload only.
 */
export function decodeValue(reader: WireReader): MvtValue {
  let value: MvtValue = { type: 'null' };

  while (!reader.done) {
    const { field, wireType } = reader.readTag();

    if (field === 1 && wireType === WireType.LengthDelimited) {
      value = { type: 'string', value: reader.readString() };
    } else if (field === 2 && wireType === WireType.Fixed32) {
      value = { type: 'float', value: reader.readFloat() };
    } else if (field === 3 && wireType === WireType.Fixed64) {
      value = { type: 'double', value: reader.readDouble() };
    } else if (field === 4 && wireType === WireType.Varint) {
      // int64 is two's complement: negatives arrive as 10-byte varints
      value = { type: 'int', value: toInt64(BigInt.asIntN(64, reader.readVarint64())) };
    } else if (field === 5 && wireType === WireType.Varint) {
      value = { type: 'uint', value: toInt64(reader.readVarint64()) };
    } else if (field === 6 && wireType === WireType.Varint) {
      value = { type: 'sint', value: toInt64(reader.readZigzag64()) };
    } else if (field === 7 && wireType === WireType.Varint) {
      value = { type: 'bool', value: reader.readVarint() !== 0 };
    } else {
      reader.skipField(wireType);
    }
  }

  return value;
}

/**
 * Narrow a 64-bit integer to a `number` when that is lossless.
 *
 * @example
 * ```ts
 * toInt64(42n);        // 42
 * toInt64(2n ** 60n);  // 1152921504606846976n
 * ```
 */
export function toInt64(n: bigint): Int64 {
  return n >= MIN_SAFE && n <= MAX_SAFE ? Number(n) : n;
}

/** Strip the type tag from an {@link MvtValue}. */
export function plainValue(v: MvtValue): PropertyValue {
  return v.type === 'null' ? null : v.value;
}

/**
 * Convert a feature's properties to a plain object, preserving tag order.
 */
export function plainProperties(feature: Feature): Record<string, PropertyValue> {
  const out: Record<string, PropertyValue> = {};
  for (const [key, value] of feature.properties) {
    out[key] = plainValue(value);
  }
  return out;
}
