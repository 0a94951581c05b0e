/**
 * @module connectors/local
 *
 * Local filesystem {@link Connector} implementation, for tiles saved to disk
 * (`.mvt` / `.pbf` files).
 */

import { readFile } from 'node:fs/promises';
import type { Connector, TileResponse } from './connector.js';

const MVT_CONTENT_TYPE = 'application/x-protobuf';

/**
 * Reads whole tile files with `fs.readFile`. Reads within one
 * {@link LocalConnector.readMany} call are issued in parallel.
 *
 * @example
 * ```typescript
 * import { LocalConnector } from 'vt-decode/connectors';
 *
 * const connector = new LocalConnector();
 * const { bytes } = await connector.read('./tiles/12-3294-1837.mvt');
 * ```
 */
export class LocalConnector implements Connector {
  /**
   * Read a tile file.
   *
   * @param path - Absolute or relative filesystem path.
   * @returns The file contents with status 200.
   * @throws {Error} If the file cannot be read (e.g. `ENOENT`, `EACCES`).
   */
  async read(path: string): Promise<TileResponse> {
    const buf = await readFile(path);
    return {
      status: 200,
      bytes: new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength),
      contentType: MVT_CONTENT_TYPE,
    };
  }

  /** Read several tile files in parallel, preserving order. */
  async readMany(paths: readonly string[]): Promise<TileResponse[]> {
    return Promise.all(paths.map(p => this.read(p)));
  }

  /** No-op: no file handles are kept open between reads. */
  async close(): Promise<void> {
    // Nothing to release
  }
}
