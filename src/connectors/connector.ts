/**
 * @module connector
 *
 * Transport interface for fetching raw tile payloads.
 *
 * A {@link Connector} encapsulates where tile bytes come from (an HTTP API,
 * the local filesystem) and exposes a uniform read API. The decoder itself
 * never performs I/O; {@link TileClient} pairs a connector with
 * {@link decodeTile}.
 *
 * Locations are connector-specific: URLs for {@link HttpConnector},
 * filesystem paths for {@link LocalConnector}.
 *
 * Implementations manage their own resource lifecycle and release it when
 * {@link Connector.close} is called.
 */

/**
 * A fetched tile payload.
 */
export interface TileResponse {
  /** Transport status code (HTTP status, or 200 for local reads). */
  status: number;
  /** Raw tile bytes. */
  bytes: Uint8Array;
  /** Declared content type, or `null` when the transport has none. */
  contentType: string | null;
}

export interface Connector {
  /**
   * Read the tile at `location`.
   *
   * @throws {Error} If the tile cannot be read (not found, HTTP error,
   *   permission denied, network failure, etc.).
   */
  read(location: string): Promise<TileResponse>;

  /**
   * Read several tiles. Implementations may parallelize; the returned array
   * preserves the order of `locations`.
   *
   * @throws {Error} If any individual read fails.
   */
  readMany(locations: readonly string[]): Promise<TileResponse[]>;

  /**
   * Release all resources held by this connector. Calling `close()` on an
   * already-closed connector is a no-op.
   */
  close(): Promise<void>;
}
