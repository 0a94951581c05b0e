import { describe, it, expect } from 'vitest';
import { TileClient } from '../src/client.js';
import { DecodeError } from '../src/errors.js';
import type { DecodeWarning } from '../src/errors.js';
import type { Connector, TileResponse } from '../src/connectors/connector.js';
import { buildTile, ringCommands } from './helpers/tile-builder.js';

/** In-memory connector keyed by location. */
class MemoryConnector implements Connector {
  readonly reads: string[] = [];
  closed = false;
  private readonly tiles: Map<string, Uint8Array>;

  constructor(tiles: Record<string, Uint8Array>) {
    this.tiles = new Map(Object.entries(tiles));
  }

  async read(location: string): Promise<TileResponse> {
    this.reads.push(location);
    const bytes = this.tiles.get(location);
    if (!bytes) throw new Error(`no tile at ${location}`);
    return { status: 200, bytes, contentType: null };
  }

  async readMany(locations: readonly string[]): Promise<TileResponse[]> {
    return Promise.all(locations.map(l => this.read(l)));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const HOLE: [number, number][] = [[2, 2], [2, 8], [8, 8], [8, 2]];

const connector = () => new MemoryConnector({
  '0/0/0': buildTile([{ name: 'land' }]),
  '1/0/0': buildTile([{ name: 'water' }, { name: 'roads' }]),
  '1/1/0': buildTile([{ name: 'zones', features: [{ type: 3, geometry: ringCommands(HOLE) }] }]),
  'broken': new Uint8Array([0x0f]),
});

describe('TileClient', () => {
  it('should fetch and decode one tile', async () => {
    const client = new TileClient(connector());
    const tile = await client.tile('1/0/0');
    expect(tile.layers.map(l => l.name)).toEqual(['water', 'roads']);
  });

  it('should fetch and decode several tiles in order', async () => {
    const source = connector();
    const client = new TileClient(source);
    const tiles = await client.tiles(['1/0/0', '0/0/0']);
    expect(tiles.map(t => t.layers.map(l => l.name))).toEqual([['water', 'roads'], ['land']]);
    expect(source.reads).toEqual(['1/0/0', '0/0/0']);
  });

  it('should apply decode options to every tile', async () => {
    const warnings: DecodeWarning[] = [];
    const client = new TileClient(connector(), { onWarning: w => warnings.push(w) });
    await client.tiles(['0/0/0', '1/1/0']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].layer).toBe('zones');
  });

  it('should propagate connector errors', async () => {
    const client = new TileClient(connector());
    await expect(client.tile('9/9/9')).rejects.toThrow('no tile at 9/9/9');
  });

  it('should propagate decode errors', async () => {
    const client = new TileClient(connector());
    await expect(client.tile('broken')).rejects.toBeInstanceOf(DecodeError);
  });

  it('should close its connector', async () => {
    const source = connector();
    await new TileClient(source).close();
    expect(source.closed).toBe(true);
  });
});
