import { describe, it, expect } from 'vitest';
import Pbf from 'pbf';
import { decodeTile } from '../src/tile.js';
import { DecodeError } from '../src/errors.js';
import type { DecodeWarning } from '../src/errors.js';
import { buildTile, ringCommands } from './helpers/tile-builder.js';

function decodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected a DecodeError');
}

describe('decodeTile', () => {
  it('should decode an empty buffer to a tile with no layers', () => {
    expect(decodeTile(new Uint8Array(0))).toEqual({ layers: [] });
  });

  it('should keep layers in buffer order', () => {
    const bytes = buildTile([{ name: 'b' }, { name: 'a' }, { name: 'c' }]);
    expect(decodeTile(bytes).layers.map(l => l.name)).toEqual(['b', 'a', 'c']);
  });

  it('should accept an ArrayBuffer', () => {
    const bytes = buildTile([{ name: 'only' }]);
    const copy = new ArrayBuffer(bytes.length);
    new Uint8Array(copy).set(bytes);
    expect(decodeTile(copy).layers[0].name).toBe('only');
  });

  it('should decode a view into a larger buffer', () => {
    const tile = buildTile([{ name: 'inner' }]);
    const backing = new Uint8Array(tile.length + 8);
    backing.set(tile, 4);
    const view = backing.subarray(4, 4 + tile.length);
    expect(decodeTile(view).layers.map(l => l.name)).toEqual(['inner']);
  });

  it('should skip unknown top-level fields', () => {
    const pbf = new Pbf();
    pbf.writeVarintField(1, 42);
    pbf.writeStringField(2, 'metadata');
    pbf.writeFixed64Field(4, 7);
    pbf.writeFixed32Field(5, 7);
    const prefix = pbf.finish();
    const bytes = new Uint8Array([...prefix, ...buildTile([{ name: 'kept' }])]);
    expect(decodeTile(bytes).layers.map(l => l.name)).toEqual(['kept']);
  });

  it('should skip a layer field sent with the wrong wire type', () => {
    const bytes = new Uint8Array([0x18, 0x01, ...buildTile([{ name: 'kept' }])]);
    expect(decodeTile(bytes).layers).toHaveLength(1);
  });

  it('should pass warnings to the callback', () => {
    const warnings: DecodeWarning[] = [];
    const hole: [number, number][] = [[2, 2], [2, 8], [8, 8], [8, 2]];
    const bytes = buildTile([
      { name: 'clean', features: [{ type: 1, geometry: [9, 0, 0] }] },
      { name: 'zones', features: [{ type: 1, geometry: [9, 0, 0] }, { type: 3, geometry: ringCommands(hole) }] },
    ]);
    decodeTile(bytes, { onWarning: w => warnings.push(w) });
    expect(warnings.map(w => [w.kind, w.layer, w.feature])).toEqual([['OrphanHole', 'zones', 1]]);
  });
});

describe('decodeTile: failures', () => {
  it('should fail with TruncatedInput at the layer length', () => {
    const err = decodeError(() => decodeTile(new Uint8Array([0x1a, 0x05, 0x0a])));
    expect(err.kind).toBe('TruncatedInput');
    expect(err.offset).toBe(1);
    expect(err.message).toBe('TruncatedInput: length-delimited field declares 5 bytes but only 1 remain at byte 1');
  });

  it('should fail with UnknownWireType on a group field', () => {
    const err = decodeError(() => decodeTile(new Uint8Array([0x0f])));
    expect(err.kind).toBe('UnknownWireType');
    expect(err.message).toBe('UnknownWireType: unsupported wire type 7 at byte 0');
  });

  it('should report MalformedLayer at the start of the layer payload', () => {
    const err = decodeError(() => decodeTile(buildTile([{ extent: 4096 }])));
    expect(err.kind).toBe('MalformedLayer');
    expect(err.offset).toBe(2);
  });

  it('should report errors in later layers at their absolute offset', () => {
    const first = buildTile([{ name: 'ok' }]);
    const bytes = new Uint8Array([...first, ...buildTile([{ extent: 4096 }])]);
    const err = decodeError(() => decodeTile(bytes));
    expect(first.length).toBe(6);
    expect(err.offset).toBe(8);
  });

  it('should fail with MalformedString on a layer name that is not UTF-8', () => {
    const err = decodeError(() => decodeTile(new Uint8Array([0x1a, 0x03, 0x0a, 0x01, 0xfe])));
    expect(err.kind).toBe('MalformedString');
    expect(err.offset).toBe(3);
  });
});
