/**
 * @module connectors/http
 *
 * HTTP(S) {@link Connector} implementation for tile APIs.
 *
 * Uses the Node.js built-in `fetch` API. Every request asks for a protobuf
 * body (`Accept: application/x-protobuf`) and can carry a bearer token and
 * an `Origin` header for APIs that check them. Includes configurable retry
 * with exponential backoff, per-request timeouts via `AbortController`, and
 * concurrency throttling for multi-tile reads.
 */

import type { Connector, TileResponse } from './connector.js';

const MVT_ACCEPT = 'application/x-protobuf';
const BODY_PREVIEW_LENGTH = 500;

/**
 * Configuration options for {@link HttpConnector}.
 */
export interface HttpConnectorOptions {
  /** Extra headers sent with every request. */
  headers?: Record<string, string>;
  /** Sent as `Authorization: Bearer <token>` when set. */
  token?: string;
  /** Sent as the `Origin` header when set. */
  origin?: string;
  /**
   * Per-request timeout in milliseconds.
   *
   * If a single fetch does not complete within this window, the request
   * is aborted and (if retries remain) retried.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Maximum number of concurrent requests issued by a single
   * {@link HttpConnector.readMany} call.
   *
   * @defaultValue 6
   */
  maxConcurrency?: number;
  /**
   * Retry configuration for transient failures.
   *
   * Retries are attempted on HTTP 5xx responses, HTTP 429 (Too Many
   * Requests), network errors, and timeouts. Backoff between attempts
   * follows an exponential schedule: `backoff * 2^attempt` ms.
   *
   * @defaultValue \{ attempts: 3, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts (including the initial request). */
    attempts: number;
    /** Base backoff delay in milliseconds before the first retry. */
    backoff: number;
  };
}

/**
 * A non-success HTTP response.
 *
 * Carries the start of the response body, since tile APIs explain
 * authentication and quota failures there.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;
  /** Value of the `Content-Type` response header, if any. */
  readonly contentType: string | null;

  constructor(status: number, url: string, body: string, contentType: string | null = null) {
    super(`HTTP ${status} fetching ${url}${body ? `: ${body}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
    this.body = body;
    this.contentType = contentType;
  }
}

/**
 * HTTP(S) connector using the Node.js built-in `fetch`.
 *
 * @example
 * ```typescript
 * import { HttpConnector } from 'vt-decode/connectors';
 *
 * const connector = new HttpConnector({
 *   token: process.env.GFW_TOKEN,
 *   timeout: 15_000,
 *   retry: { attempts: 5, backoff: 300 },
 * });
 *
 * const { status, bytes } = await connector.read(
 *   'https://tiles.example.com/v1/position/12/3294/1837?format=MVT',
 * );
 * ```
 */
export class HttpConnector implements Connector {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly maxConcurrency: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;

  /**
   * Create a new HTTP connector.
   *
   * @param options - Optional configuration. See {@link HttpConnectorOptions}.
   */
  constructor(options?: HttpConnectorOptions) {
    this.headers = { Accept: MVT_ACCEPT, ...options?.headers };
    if (options?.token) this.headers.Authorization = `Bearer ${options.token}`;
    if (options?.origin) this.headers.Origin = options.origin;
    this.timeout = options?.timeout ?? 30_000;
    this.maxConcurrency = options?.maxConcurrency ?? 6;
    this.retryAttempts = options?.retry?.attempts ?? 3;
    this.retryBackoff = options?.retry?.backoff ?? 200;
  }

  /**
   * Fetch one tile.
   *
   * @param url - Fully qualified tile URL.
   * @returns Status, body bytes and content type of a 2xx response.
   * @throws {HttpError} If the final response (after retries) is not 2xx.
   * @throws {Error} The last network or timeout error once retries are
   *   exhausted.
   */
  async read(url: string): Promise<TileResponse> {
    const response = await this.fetchWithRetry(url, { headers: this.headers });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpError(
        response.status,
        url,
        body.slice(0, BODY_PREVIEW_LENGTH),
        response.headers.get('content-type'),
      );
    }

    const buf = await response.arrayBuffer();
    return {
      status: response.status,
      bytes: new Uint8Array(buf),
      contentType: response.headers.get('content-type'),
    };
  }

  /**
   * Fetch several tiles through a worker pool limited to
   * {@link HttpConnectorOptions.maxConcurrency} concurrent requests.
   * Results are returned in the same order as the input URLs.
   *
   * @returns An empty array when `urls` is empty.
   * @throws {Error} If any individual request fails after retries.
   */
  async readMany(urls: readonly string[]): Promise<TileResponse[]> {
    if (urls.length === 0) return [];
    if (urls.length === 1) return [await this.read(urls[0])];

    const results = new Array<TileResponse>(urls.length);
    let cursor = 0;

    const worker = async () => {
      while (cursor < urls.length) {
        const idx = cursor++;
        results[idx] = await this.read(urls[idx]);
      }
    };

    const workers = Array.from(
      { length: Math.min(this.maxConcurrency, urls.length) },
      () => worker(),
    );

    await Promise.all(workers);
    return results;
  }

  /**
   * No-op for the HTTP connector: `fetch` keeps no connections that need
   * explicit cleanup.
   */
  async close(): Promise<void> {
    // No persistent connections to clean up with fetch
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * Execute a `fetch` with timeout and exponential-backoff retry.
   *
   * Retries are triggered by HTTP 5xx, HTTP 429, network errors, and
   * `AbortController` timeout aborts. The backoff schedule is
   * `retryBackoff * 2^attempt` milliseconds.
   *
   * @returns The last HTTP `Response` received, retryable or not.
   * @throws {Error} The last network error if every attempt failed without
   *   a response.
   */
  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeout);

      try {
        const response = await fetch(url, { ...init, signal: controller.signal });

        // Retry on 5xx or 429
        if ((response.status >= 500 || response.status === 429) && attempt < this.retryAttempts - 1) {
          await response.body?.cancel();
          await sleep(this.retryBackoff * Math.pow(2, attempt));
          continue;
        }

        return response;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.retryAttempts - 1) {
          await sleep(this.retryBackoff * Math.pow(2, attempt));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw lastError ?? new Error(`Failed to fetch ${url}`);
  }
}

/**
 * Sleep for the specified duration.
 *
 * @param ms - Duration in milliseconds.
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
