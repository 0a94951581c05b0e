/**
 * @module query
 *
 * Tile URL construction for the 4Wings-style tile API.
 *
 * Query parameters use the API's indexed-array convention
 * (`datasets[0]=...&filters[0]=...`) and are serialized with
 * `URLSearchParams`, so brackets, quotes and parentheses are
 * percent-encoded and spaces become `+`.
 */

/** Value of the `matched` filter override. `any` removes the filter. */
export type MatchedChoice = 'true' | 'false' | 'any';

const MATCHED_CHOICES: readonly string[] = ['true', 'false', 'any'] satisfies MatchedChoice[];

/**
 * Parameters for {@link buildTileUrl}.
 */
export interface TileQuery {
  /** Endpoint without the `/{z}/{x}/{y}` suffix. */
  baseUrl: string;
  z: number;
  x: number;
  y: number;
  /** Dataset identifiers, written as `datasets[i]`. */
  datasets: string[];
  /** Filter predicates, written as `filters[i]` (e.g. `matched IN ('false')`). */
  filters?: string[];
  /** Property names to include, comma-joined into `properties[0]`. */
  properties?: string[];
  /** ISO-8601 start and end, comma-joined into `date-range`. */
  dateRange?: [start: string, end: string];
  /** Upper bound on returned points, written as `max-points`. */
  maxPoints?: number;
  /** @defaultValue 'MVT' */
  format?: string;
}

/**
 * Build a tile request URL.
 *
 * @example
 * ```ts
 * buildTileUrl({
 *   baseUrl: 'https://tiles.example.com/v3/tile/position',
 *   z: 12, x: 3294, y: 1837,
 *   datasets: ['presence:v3.0'],
 *   filters: ["matched IN ('false')"],
 * });
 * // 'https://tiles.example.com/v3/tile/position/12/3294/1837
 * //   ?datasets%5B0%5D=presence%3Av3.0
 * //   &filters%5B0%5D=matched+IN+%28%27false%27%29&format=MVT'
 * ```
 */
export function buildTileUrl(query: TileQuery): string {
  const base = query.baseUrl.replace(/\/+$/, '');
  const url = new URL(`${base}/${query.z}/${query.x}/${query.y}`);
  const params = url.searchParams;

  query.datasets.forEach((d, i) => params.append(`datasets[${i}]`, d));
  query.filters?.forEach((f, i) => params.append(`filters[${i}]`, f));
  params.append('format', query.format ?? 'MVT');
  if (query.maxPoints !== undefined) params.append('max-points', String(query.maxPoints));
  if (query.properties && query.properties.length > 0) {
    params.append('properties[0]', query.properties.join(','));
  }
  if (query.dateRange) params.append('date-range', query.dateRange.join(','));

  return url.toString();
}

/**
 * Override the `matched` predicate in `filters[0]`.
 *
 * - `undefined` returns `url` unchanged.
 * - `'any'` removes `filters[0]`.
 * - `'true'` / `'false'` replace it with `matched IN ('<choice>')`,
 *   appended after the remaining parameters.
 *
 * Any change re-serializes the whole query string.
 */
export function setMatchedFilter(url: string, choice: MatchedChoice | undefined): string {
  if (choice === undefined) return url;

  const parsed = new URL(url);
  parsed.searchParams.delete('filters[0]');
  if (choice !== 'any') {
    parsed.searchParams.append('filters[0]', `matched IN ('${choice}')`);
  }
  return parsed.toString();
}

/** Type guard for {@link MatchedChoice}. */
export function isMatchedChoice(value: string): value is MatchedChoice {
  return MATCHED_CHOICES.includes(value);
}
