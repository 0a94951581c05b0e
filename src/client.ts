/**
 * @module client
 *
 * Fetch-and-decode convenience layer.
 *
 * A single {@link Connector} and one set of {@link DecodeOptions} are bound
 * at construction; tile locations are provided per call.
 *
 * @example
 * ```typescript
 * import { TileClient } from 'vt-decode';
 * import { HttpConnector } from 'vt-decode/connectors';
 *
 * const client = new TileClient(new HttpConnector({ token }), {
 *   onWarning: w => console.warn(w.message),
 * });
 *
 * const tile = await client.tile(url);
 * const [a, b] = await client.tiles([urlA, urlB]);
 *
 * await client.close();
 * ```
 */

import type { Connector } from './connectors/connector.js';
import type { DecodeOptions } from './errors.js';
import { decodeTile } from './tile.js';
import type { Tile } from './types.js';

export class TileClient {
  private readonly connector: Connector;
  private readonly options: DecodeOptions;

  /**
   * @param connector - Transport shared across all subsequent calls.
   * @param options - Decode options applied to every tile.
   */
  constructor(connector: Connector, options: DecodeOptions = {}) {
    this.connector = connector;
    this.options = options;
  }

  /**
   * Fetch and decode one tile.
   *
   * @throws {HttpError} From an HTTP connector on a non-2xx response.
   * @throws {DecodeError} If the payload is not a well-formed tile.
   */
  async tile(location: string): Promise<Tile> {
    const { bytes } = await this.connector.read(location);
    return decodeTile(bytes, this.options);
  }

  /**
   * Fetch and decode several tiles. The result order matches `locations`.
   */
  async tiles(locations: readonly string[]): Promise<Tile[]> {
    const responses = await this.connector.readMany(locations);
    return responses.map(r => decodeTile(r.bytes, this.options));
  }

  /**
   * Release connector resources. This client must not be used afterwards.
   */
  async close(): Promise<void> {
    await this.connector.close();
  }
}
