/**
 * @module cli
 *
 * `vt-decode` command: fetch one vector tile (or read it from disk), decode
 * it and print a summary.
 *
 * ```text
 * vt-decode [--url <url> | --file <path>] [--token <token>] [--origin <origin>]
 *           [--matched true|false|any] [--max-features <n>]
 *           [--print-geometry] [--geometry-max-features <n>] [--geometry-max-coords <n>]
 *           [--fields <a,b,c>] [--debug-http]
 * ```
 *
 * `GFW_TOKEN` and `GFW_MATCHED` supply defaults for `--token` and
 * `--matched`, from the environment or a `.env` file in the working
 * directory.
 */

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { Connector } from './connectors/connector.js';
import { HttpConnector, HttpError } from './connectors/http.js';
import { LocalConnector } from './connectors/local.js';
import { DecodeError } from './errors.js';
import { isMatchedChoice, setMatchedFilter } from './query.js';
import type { MatchedChoice } from './query.js';
import { describeGeometries, selectFields, summarizeTile } from './summary.js';
import { decodeTile } from './tile.js';

export const DEFAULT_TILE_URL =
  'https://gateway.api.globalfishingwatch.org/v3/4wings/tile/position/12/3294/1837' +
  '?datasets%5B0%5D=public-global-sentinel2-presence%3Av3.0' +
  '&filters%5B0%5D=matched%20IN%20%28%27false%27%29' +
  '&format=MVT&max-points=5000' +
  '&properties%5B0%5D=bearing%2Cshipname%2Cvessel_id' +
  '&date-range=2025-08-01T00%3A00%3A00.000Z%2C2025-11-24T00%3A00%3A00.000Z';

export interface CliOptions {
  url: string;
  file?: string;
  token?: string;
  origin?: string;
  matched?: MatchedChoice;
  maxFeatures: number;
  printGeometry: boolean;
  geometryMaxFeatures: number;
  geometryMaxCoords: number;
  fields: string[];
  debugHttp: boolean;
}

/** Output sinks; `console` in production. */
export interface CliIO {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

/**
 * Parse command-line arguments.
 *
 * @param argv - Arguments without the node executable and script path.
 * @param env - Environment consulted for `GFW_TOKEN` and `GFW_MATCHED`.
 * @throws {Error} On unknown flags, missing flag values, a `--matched`
 *   value other than true/false/any, or a non-integer count.
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      url: { type: 'string' },
      file: { type: 'string' },
      token: { type: 'string' },
      origin: { type: 'string' },
      matched: { type: 'string' },
      'max-features': { type: 'string' },
      'print-geometry': { type: 'boolean' },
      'geometry-max-features': { type: 'string' },
      'geometry-max-coords': { type: 'string' },
      fields: { type: 'string' },
      'debug-http': { type: 'boolean' },
    },
  });

  const matched = values.matched ?? env.GFW_MATCHED;
  if (matched !== undefined && !isMatchedChoice(matched)) {
    throw new Error(`--matched must be one of true, false, any (got "${matched}")`);
  }

  return {
    url: values.url ?? DEFAULT_TILE_URL,
    file: values.file,
    token: values.token ?? env.GFW_TOKEN,
    origin: values.origin,
    matched,
    maxFeatures: parseCount('--max-features', values['max-features'], 3),
    printGeometry: values['print-geometry'] ?? false,
    geometryMaxFeatures: parseCount('--geometry-max-features', values['geometry-max-features'], 5),
    geometryMaxCoords: parseCount('--geometry-max-coords', values['geometry-max-coords'], 10),
    fields: values.fields ? values.fields.split(',').map(f => f.trim()).filter(f => f !== '') : [],
    debugHttp: values['debug-http'] ?? false,
  };
}

/**
 * Fetch, decode and print one tile.
 *
 * @returns The process exit code: `0` on success, `1` on any failure.
 */
export async function run(options: CliOptions, io: CliIO = console): Promise<number> {
  let connector: Connector;
  let location: string;
  if (options.file !== undefined) {
    connector = new LocalConnector();
    location = options.file;
    io.log(`Reading tile...\n${location}\n`);
  } else {
    connector = new HttpConnector({ token: options.token, origin: options.origin });
    location = setMatchedFilter(options.url, options.matched);
    io.log(`Requesting tile...\n${location}\n`);
  }

  try {
    const response = await connector.read(location);
    if (options.debugHttp) io.log(describeResponse(response.status, response.contentType));

    io.log(`Received ${response.bytes.length} bytes. Decoding...`);
    const tile = decodeTile(response.bytes, {
      onWarning: w => io.warn(`Warning: ${w.message}`),
    });

    for (const line of summarizeTile(tile, { maxFeatures: options.maxFeatures })) io.log(line);

    if (options.printGeometry) {
      io.log('');
      const listing = describeGeometries(tile, {
        maxFeatures: options.geometryMaxFeatures,
        maxCoords: options.geometryMaxCoords,
      });
      for (const line of listing) io.log(line);
    }

    if (options.fields.length > 0) {
      io.log('');
      for (const line of selectFields(tile, options.fields)) io.log(line);
    }
    return 0;
  } catch (err) {
    if (options.debugHttp && err instanceof HttpError) io.log(describeResponse(err.status, err.contentType));
    io.error(describeFailure(err));
    return 1;
  } finally {
    await connector.close();
  }
}

/**
 * Entry point: parse `argv`, then {@link run}.
 *
 * @returns The process exit code.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv, io: CliIO = console): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv, env);
  } catch (err) {
    io.error(describeFailure(err));
    return 1;
  }
  return run(options, io);
}

/**
 * Load `KEY=value` lines from `path` into `process.env` when the file exists.
 * Variables already set in the environment are not overwritten.
 *
 * @returns Whether a file was loaded.
 */
export function loadEnvDefaults(path: string = '.env'): boolean {
  if (!existsSync(path)) return false;
  process.loadEnvFile(path);
  return true;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function parseCount(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} must be a non-negative integer (got "${raw}")`);
  }
  return n;
}

function describeResponse(status: number, contentType: string | null): string {
  return `HTTP ${status}, Content-Type: ${contentType ?? 'unknown'}`;
}

function describeFailure(err: unknown): string {
  if (err instanceof HttpError) return `HTTP error: ${err.message}`;
  if (err instanceof DecodeError) return `Decode error: ${err.message}`;
  if (err instanceof Error) return `Error: ${err.message}`;
  return `Error: ${String(err)}`;
}
