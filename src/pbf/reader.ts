/**
 * @module pbf/reader
 *
 * Minimal Protocol Buffer binary reader for decoding MVT tiles.
 *
 * Implements the subset of the protobuf wire format that the MVT 2.1 message
 * schema needs, with no knowledge of the schema itself. The reader wraps a
 * byte buffer and a cursor, and supports the following wire types:
 *
 * | Wire Type | ID | Encoding             | Used For                                    |
 * |-----------|----|----------------------|---------------------------------------------|
 * | VARINT    |  0 | Variable-length int  | uint32, uint64, int64, bool, enum, sint64   |
 * | I64       |  1 | Fixed 64-bit         | double                                      |
 * | LEN       |  2 | Length-delimited     | string, nested messages, packed repeated    |
 * | I32       |  5 | Fixed 32-bit         | float                                       |
 *
 * Nested messages are read through {@link WireReader.readMessage}, which
 * returns a child reader over a sub-view of the same memory (no copy). The
 * child remembers where its view starts inside the outermost buffer so that
 * every {@link DecodeError} reports an absolute byte offset.
 *
 * @see {@link https://protobuf.dev/programming-guides/encoding/ | Protobuf Encoding Guide}
 */

import { DecodeError } from '../errors.js';

/** Protobuf wire types understood by {@link WireReader}. */
export const enum WireType {
  Varint = 0,
  Fixed64 = 1,
  LengthDelimited = 2,
  Fixed32 = 5,
}

/** A decoded field header. */
export interface Tag {
  /** Field number (`key >> 3`). */
  field: number;
  /** Wire type (`key & 0x7`). */
  wireType: WireType;
}

const MAX_VARINT_BYTES = 10;
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * A forward-only cursor over a protobuf-encoded byte buffer.
 *
 * @example
 * ```ts
 * const reader = new WireReader(bytes);
 * while (!reader.done) {
 *   const { field, wireType } = reader.readTag();
 *   if (field === 1 && wireType === WireType.LengthDelimited) {
 *     console.log(reader.readString());
 *   } else {
 *     reader.skipField(wireType);
 *   }
 * }
 * ```
 */
export class WireReader {
  /** Bytes visible to this reader. */
  readonly bytes: Uint8Array;
  /** Position of `bytes[0]` within the outermost buffer. */
  readonly base: number;
  /** Cursor, relative to `bytes`. */
  pos: number = 0;

  private readonly view: DataView;

  /**
   * @param bytes - Buffer to read. It is never modified or retained past
   *   the reader's own lifetime.
   * @param base - Absolute offset of `bytes` within the enclosing buffer,
   *   used only for error reporting. Defaults to `0`.
   */
  constructor(bytes: Uint8Array, base: number = 0) {
    this.bytes = bytes;
    this.base = base;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Absolute offset of the cursor. */
  get offset(): number {
    return this.base + this.pos;
  }

  /** `true` once every byte has been consumed. */
  get done(): boolean {
    return this.pos >= this.bytes.length;
  }

  /** Number of unread bytes. */
  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  // ─── Varints ────────────────────────────────────────────────────────

  /**
   * Read an unsigned varint as a `number`.
   *
   * Exact for values up to `Number.MAX_SAFE_INTEGER`; larger values are
   * rounded to the nearest double. Use {@link readVarint64} when the full
   * 64-bit range matters.
   *
   * @throws {DecodeError} `TruncatedInput` if the buffer ends before the
   *   terminating byte, `VarintOverflow` past 10 bytes.
   */
  readVarint(): number {
    const start = this.offset;
    let result = 0;
    let scale = 1;
    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const b = this.nextVarintByte(start);
      result += (b & 0x7f) * scale;
      if (b < 0x80) return result;
      scale *= 128;
    }
    throw new DecodeError('VarintOverflow', `varint longer than ${MAX_VARINT_BYTES} bytes`, start);
  }

  /**
   * Read an unsigned varint as an exact 64-bit `bigint` in `[0, 2^64)`.
   *
   * Bits beyond the 64th (possible only in a malformed 10th byte) are
   * discarded.
   */
  readVarint64(): bigint {
    const start = this.offset;
    let result = 0n;
    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const b = this.nextVarintByte(start);
      result |= BigInt(b & 0x7f) << BigInt(7 * i);
      if (b < 0x80) return BigInt.asUintN(64, result);
    }
    throw new DecodeError('VarintOverflow', `varint longer than ${MAX_VARINT_BYTES} bytes`, start);
  }

  /** Read a zigzag-encoded signed varint as a `number`. */
  readZigzag(): number {
    return zigzagDecode(this.readVarint());
  }

  /** Read a zigzag-encoded signed varint as an exact 64-bit `bigint`. */
  readZigzag64(): bigint {
    return zigzagDecode64(this.readVarint64());
  }

  // ─── Field headers ──────────────────────────────────────────────────

  /**
   * Read a field header and split it into field number and wire type.
   *
   * @throws {DecodeError} `UnknownWireType` for wire types 3, 4, 6 and 7
   *   (groups are not supported).
   */
  readTag(): Tag {
    const start = this.offset;
    const key = this.readVarint();
    const wireType = key % 8;
    switch (wireType) {
      case WireType.Varint:
      case WireType.Fixed64:
      case WireType.LengthDelimited:
      case WireType.Fixed32:
        return { field: Math.floor(key / 8), wireType };
      default:
        throw new DecodeError('UnknownWireType', `unsupported wire type ${wireType}`, start);
    }
  }

  /**
   * Advance past a field's payload without interpreting it.
   *
   * Higher-level decoders call this for every field number they do not
   * recognize, which keeps them compatible with newer producers.
   */
  skipField(wireType: WireType): void {
    switch (wireType) {
      case WireType.Varint:
        this.readVarint();
        break;
      case WireType.Fixed64:
        this.advance(8);
        break;
      case WireType.LengthDelimited:
        this.readLengthDelimited();
        break;
      case WireType.Fixed32:
        this.advance(4);
        break;
    }
  }

  // ─── Length-delimited ───────────────────────────────────────────────

  /**
   * Read a varint length followed by that many bytes.
   *
   * @returns A sub-view of the underlying buffer (no copy).
   * @throws {DecodeError} `TruncatedInput`, reported at the offset of the
   *   length prefix, when fewer bytes remain than declared.
   */
  readLengthDelimited(): Uint8Array {
    const start = this.offset;
    const length = this.readVarint();
    if (length > this.remaining) {
      throw new DecodeError(
        'TruncatedInput',
        `length-delimited field declares ${length} bytes but only ${this.remaining} remain`,
        start,
      );
    }
    const slice = this.bytes.subarray(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  /**
   * Read a length-delimited nested message and return a reader over it.
   *
   * The child reader reports offsets relative to the same outermost buffer
   * as this one.
   */
  readMessage(): WireReader {
    const bytes = this.readLengthDelimited();
    return new WireReader(bytes, this.offset - bytes.length);
  }

  /**
   * Read a length-delimited UTF-8 string.
   *
   * @throws {DecodeError} `MalformedString` if the bytes are not valid
   *   UTF-8. The underlying `TextDecoder` error is kept as `cause`.
   */
  readString(): string {
    const start = this.offset;
    const bytes = this.readLengthDelimited();
    try {
      return textDecoder.decode(bytes);
    } catch (err) {
      throw new DecodeError('MalformedString', 'string field is not valid UTF-8', start, { cause: err });
    }
  }

  /**
   * Read a packed repeated varint field: a length-delimited run of varints.
   *
   * @throws {DecodeError} `TruncatedInput` if the last varint is cut off by
   *   the end of the packed payload.
   */
  readPackedVarints(): number[] {
    const packed = this.readMessage();
    const values: number[] = [];
    while (!packed.done) {
      values.push(packed.readVarint());
    }
    return values;
  }

  // ─── Fixed-width types ──────────────────────────────────────────────

  /** Read a little-endian IEEE 754 single-precision float. */
  readFloat(): number {
    const at = this.pos;
    this.advance(4);
    return this.view.getFloat32(at, true);
  }

  /** Read a little-endian IEEE 754 double-precision float. */
  readDouble(): number {
    const at = this.pos;
    this.advance(8);
    return this.view.getFloat64(at, true);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Consume one varint byte, failing with `TruncatedInput` (reported at
   * the varint's first byte) when the buffer is exhausted.
   */
  private nextVarintByte(start: number): number {
    if (this.pos >= this.bytes.length) {
      throw new DecodeError('TruncatedInput', 'buffer ends inside a varint', start);
    }
    return this.bytes[this.pos++];
  }

  /** Move the cursor forward by `n` bytes, which must all be present. */
  private advance(n: number): void {
    if (n > this.remaining) {
      throw new DecodeError(
        'TruncatedInput',
        `fixed-width field needs ${n} bytes but only ${this.remaining} remain`,
        this.offset,
      );
    }
    this.pos += n;
  }
}

// ─── Zigzag ─────────────────────────────────────────────────────────────────

/**
 * Decode a zigzag-encoded unsigned integer back to its signed value.
 *
 * The mapping is `0 -> 0, 1 -> -1, 2 -> 1, 3 -> -2, ...`. Arithmetic is done
 * without 32-bit bitwise operators so that the result is exact for every
 * safe integer input.
 *
 * @example
 * ```ts
 * zigzagDecode(50);  // 25
 * zigzagDecode(199); // -100
 * ```
 */
export function zigzagDecode(n: number): number {
  return n % 2 === 0 ? n / 2 : -(n + 1) / 2;
}

/** 64-bit variant of {@link zigzagDecode}: `(n >> 1) ^ -(n & 1)`. */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}
