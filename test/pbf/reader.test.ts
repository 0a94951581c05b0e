import { describe, it, expect } from 'vitest';
import Pbf from 'pbf';
import { WireReader, WireType, zigzagDecode, zigzagDecode64 } from '../../src/pbf/reader.js';
import { DecodeError } from '../../src/errors.js';

function reader(...bytes: number[]): WireReader {
  return new WireReader(new Uint8Array(bytes));
}

function caught(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected a DecodeError');
}

// ─── Varints ────────────────────────────────────────────────────────────────

describe('WireReader.readVarint', () => {
  it('should read a single-byte varint', () => {
    const r = reader(0x08);
    expect(r.readVarint()).toBe(8);
    expect(r.done).toBe(true);
  });

  it('should read a multi-byte varint', () => {
    const r = reader(0x96, 0x01, 0xac, 0x02);
    expect(r.readVarint()).toBe(150);
    expect(r.offset).toBe(2);
    expect(r.readVarint()).toBe(300);
  });

  it('should read values written by pbf', () => {
    const values = [0, 1, 127, 128, 16_383, 16_384, 2 ** 31, 2 ** 40 + 7, Number.MAX_SAFE_INTEGER];
    const pbf = new Pbf();
    for (const v of values) pbf.writeVarint(v);
    const r = new WireReader(pbf.finish());

    const out: number[] = [];
    while (!r.done) out.push(r.readVarint());
    expect(out).toEqual(values);
  });

  it('should fail with TruncatedInput when the buffer ends mid-varint', () => {
    const err = caught(() => reader(0x80, 0x80).readVarint());
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(0);
    expect(err.message).toBe('TruncatedInput: buffer ends inside a varint at byte 0');
  });

  it('should report the offset of the varint that was cut off', () => {
    const r = reader(0x05, 0xff);
    r.readVarint();
    const err = caught(() => r.readVarint());
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(1);
  });

  it('should fail with VarintOverflow past 10 bytes', () => {
    const r = new WireReader(new Uint8Array(11).fill(0x80));
    const err = caught(() => r.readVarint());
    expect(err.kind).toBe('VarintOverflow');
    expect(err.offset).toBe(0);
  });
});

describe('WireReader.readVarint64', () => {
  it('should read the largest 64-bit value exactly', () => {
    const r = reader(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01);
    expect(r.readVarint64()).toBe(18_446_744_073_709_551_615n);
    expect(r.done).toBe(true);
  });

  it('should read small values', () => {
    expect(reader(0x96, 0x01).readVarint64()).toBe(150n);
  });

  it('should fail with VarintOverflow past 10 bytes', () => {
    const r = new WireReader(new Uint8Array(12).fill(0xff));
    expect(caught(() => r.readVarint64()).kind).toBe('VarintOverflow');
  });
});

// ─── Zigzag ─────────────────────────────────────────────────────────────────

describe('zigzagDecode', () => {
  it('should map 0, 1, 2, 3 to 0, -1, 1, -2', () => {
    expect([0, 1, 2, 3].map(zigzagDecode)).toEqual([0, -1, 1, -2]);
  });

  it('should decode larger values', () => {
    expect(zigzagDecode(50)).toBe(25);
    expect(zigzagDecode(199)).toBe(-100);
  });

  it('should invert pbf signed varints', () => {
    const values = [0, -1, 1, -64, 64, -1_000_000, 1_000_000];
    const pbf = new Pbf();
    for (const v of values) pbf.writeSVarint(v);
    const r = new WireReader(pbf.finish());

    const out: number[] = [];
    while (!r.done) out.push(r.readZigzag());
    expect(out).toEqual(values);
  });
});

describe('zigzagDecode64', () => {
  it('should map the 64-bit extremes', () => {
    expect(zigzagDecode64(1n)).toBe(-1n);
    expect(zigzagDecode64(18_446_744_073_709_551_614n)).toBe(9_223_372_036_854_775_807n);
    expect(zigzagDecode64(18_446_744_073_709_551_615n)).toBe(-9_223_372_036_854_775_808n);
  });

  it('should be used by readZigzag64', () => {
    const r = reader(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01);
    expect(r.readZigzag64()).toBe(-9_223_372_036_854_775_808n);
  });
});

// ─── Field headers ──────────────────────────────────────────────────────────

describe('WireReader.readTag', () => {
  it('should split the key into field number and wire type', () => {
    expect(reader(0x1a).readTag()).toEqual({ field: 3, wireType: WireType.LengthDelimited });
    expect(reader(0x78).readTag()).toEqual({ field: 15, wireType: WireType.Varint });
    expect(reader(0x15).readTag()).toEqual({ field: 2, wireType: WireType.Fixed32 });
    expect(reader(0x19).readTag()).toEqual({ field: 3, wireType: WireType.Fixed64 });
  });

  it('should fail with UnknownWireType for group wire types', () => {
    const err = caught(() => reader(0x0b).readTag());
    expect(err.kind).toBe('UnknownWireType');
    expect(err.message).toBe('UnknownWireType: unsupported wire type 3 at byte 0');
  });

  it('should report the offset of the tag', () => {
    const r = reader(0x08, 0x01, 0x0e);
    r.readTag();
    r.readVarint();
    const err = caught(() => r.readTag());
    expect(err.kind).toBe('UnknownWireType');
    expect(err.offset).toBe(2);
  });
});

describe('WireReader.skipField', () => {
  it('should skip every supported wire type', () => {
    const r = reader(
      0x96, 0x01, // varint
      1, 2, 3, 4, 5, 6, 7, 8, // fixed64
      0x02, 0xaa, 0xbb, // length-delimited
      1, 2, 3, 4, // fixed32
      0x2a,
    );
    r.skipField(WireType.Varint);
    expect(r.offset).toBe(2);
    r.skipField(WireType.Fixed64);
    expect(r.offset).toBe(10);
    r.skipField(WireType.LengthDelimited);
    expect(r.offset).toBe(13);
    r.skipField(WireType.Fixed32);
    expect(r.offset).toBe(17);
    expect(r.readVarint()).toBe(42);
  });

  it('should fail with TruncatedInput when a fixed-width field is cut off', () => {
    const err = caught(() => reader(1, 2, 3).skipField(WireType.Fixed32));
    expect(err.kind).toBe('TruncatedInput');
    expect(err.message).toBe('TruncatedInput: fixed-width field needs 4 bytes but only 3 remain at byte 0');
  });
});

// ─── Length-delimited ───────────────────────────────────────────────────────

describe('WireReader.readLengthDelimited', () => {
  it('should return a sub-view without copying', () => {
    const bytes = new Uint8Array([0x03, 10, 20, 30, 40]);
    const r = new WireReader(bytes);
    const slice = r.readLengthDelimited();
    expect([...slice]).toEqual([10, 20, 30]);
    expect(slice.buffer).toBe(bytes.buffer);
    expect(r.offset).toBe(4);
  });

  it('should fail with TruncatedInput at the length prefix', () => {
    const r = reader(0x08, 0x01, 0x05, 1, 2);
    r.readTag();
    r.readVarint();
    const err = caught(() => r.readLengthDelimited());
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(2);
    expect(err.message).toBe(
      'TruncatedInput: length-delimited field declares 5 bytes but only 2 remain at byte 2',
    );
  });
});

describe('WireReader.readMessage', () => {
  it('should report absolute offsets from the child reader', () => {
    const r = reader(0x0a, 0x02, 0x08, 0x01);
    r.readTag();
    const child = r.readMessage();
    expect(child.base).toBe(2);
    expect(child.offset).toBe(2);
    expect(child.readTag()).toEqual({ field: 1, wireType: WireType.Varint });
    expect(child.offset).toBe(3);
    expect(child.readVarint()).toBe(1);
    expect(child.done).toBe(true);
  });

  it('should carry offsets through two levels of nesting', () => {
    const r = reader(0x1a, 0x04, 0x12, 0x02, 0x0b, 0x00);
    r.readTag();
    const layer = r.readMessage();
    layer.readTag();
    const feature = layer.readMessage();
    const err = caught(() => feature.readTag());
    expect(err.kind).toBe('UnknownWireType');
    expect(err.offset).toBe(4);
  });
});

describe('WireReader.readString', () => {
  it('should decode UTF-8', () => {
    const pbf = new Pbf();
    pbf.writeString('Zürich 東京');
    expect(new WireReader(pbf.finish()).readString()).toBe('Zürich 東京');
  });

  it('should decode an empty string', () => {
    expect(reader(0x00).readString()).toBe('');
  });

  it('should fail with MalformedString on invalid UTF-8', () => {
    const err = caught(() => reader(0x02, 0xc3, 0x28).readString());
    expect(err.kind).toBe('MalformedString');
    expect(err.offset).toBe(0);
    expect(err.cause).toBeInstanceOf(TypeError);
  });
});

describe('WireReader.readPackedVarints', () => {
  it('should read every varint in the payload', () => {
    expect(reader(0x03, 0x01, 0x96, 0x01).readPackedVarints()).toEqual([1, 150]);
  });

  it('should return an empty array for an empty payload', () => {
    expect(reader(0x00).readPackedVarints()).toEqual([]);
  });

  it('should fail when the last varint runs past the payload', () => {
    const err = caught(() => reader(0x02, 0x01, 0x96, 0x01).readPackedVarints());
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(2);
  });
});

// ─── Fixed-width ────────────────────────────────────────────────────────────

describe('WireReader fixed-width reads', () => {
  it('should read little-endian floats and doubles', () => {
    const pbf = new Pbf();
    pbf.writeFloat(1.5);
    pbf.writeDouble(-3.25);
    const r = new WireReader(pbf.finish());
    expect(r.readFloat()).toBe(1.5);
    expect(r.readDouble()).toBe(-3.25);
    expect(r.done).toBe(true);
  });

  it('should read from a view that does not start at byte 0 of its buffer', () => {
    const backing = new Uint8Array(12);
    new DataView(backing.buffer).setFloat64(4, 0.5, true);
    const r = new WireReader(backing.subarray(4));
    expect(r.readDouble()).toBe(0.5);
  });

  it('should fail with TruncatedInput when a double is cut off', () => {
    const err = caught(() => reader(0, 0, 0, 0).readDouble());
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(0);
  });
});
