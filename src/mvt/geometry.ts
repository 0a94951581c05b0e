/**
 * @module mvt/geometry
 *
 * MVT 2.1 geometry command decoding.
 *
 * The Mapbox Vector Tile specification encodes geometries as a sequence of
 * **command integers** interleaved with **parameter integers**. Three commands
 * are defined:
 *
 * | Command   | ID | Parameters           | Meaning                                  |
 * |-----------|----|----------------------|------------------------------------------|
 * | MoveTo    |  1 | `count` x (dX, dY)   | Start `count` new part(s)                |
 * | LineTo    |  2 | `count` x (dX, dY)   | Extend the current part by `count` edges |
 * | ClosePath |  7 | *(none)*             | Close the current ring (polygon only)    |
 *
 * A **command integer** packs both the command ID and a repeat count:
 *
 *     command_id = command_integer & 0x7
 *     count      = command_integer >> 3
 *
 * Parameter integers are **zigzag-encoded deltas** relative to a running
 * cursor that starts at (0, 0) and persists across all parts of a feature.
 *
 * Polygon rings are grouped by winding: a ring with positive signed area
 * starts a new polygon, any other ring is a hole of the latest polygon.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */

import { DecodeError } from '../errors.js';
import { zigzagDecode } from '../pbf/reader.js';
import { GeomType } from '../types.js';
import type { Coord, Geometry, Polygon } from '../types.js';

const CMD_MOVE_TO = 1;
const CMD_LINE_TO = 2;
const CMD_CLOSE_PATH = 7;

/**
 * Reconstruct a feature's geometry from its command stream.
 *
 * @param type - Decoded geometry type of the feature.
 * @param commands - Raw command and parameter integers.
 * @param offset - Absolute byte offset of the feature's geometry field,
 *   attached to any {@link DecodeError}.
 * @param onOrphanHole - Called with the ring index of every hole that has
 *   no preceding exterior ring.
 * @returns The geometry variant matching `type`. `Unknown` types keep the
 *   raw commands without validating them.
 * @throws {DecodeError} `MalformedGeometry` on a stream underflow, an
 *   unknown command, a zero count, a ClosePath whose count is not 1 or that
 *   appears outside a polygon, an unclosed polygon ring, or trailing
 *   integers.
 *
 * @example
 * ```ts
 * assembleGeometry(GeomType.Point, [9, 50, 34]);
 * // { type: 'Point', points: [[25, 17]] }
 * ```
 */
export function assembleGeometry(
  type: GeomType,
  commands: readonly number[],
  offset: number = 0,
  onOrphanHole?: (ring: number) => void,
): Geometry {
  switch (type) {
    case GeomType.Point:
      return { type: 'Point', points: readParts(type, commands, offset).flat() };
    case GeomType.LineString:
      return { type: 'LineString', lines: readParts(type, commands, offset) };
    case GeomType.Polygon:
      return { type: 'Polygon', polygons: classifyRings(readParts(type, commands, offset), onOrphanHole) };
    default:
      return { type: 'Unknown', commands: [...commands] };
  }
}

// ─── Command stream ─────────────────────────────────────────────────────────

/**
 * Walk the command stream once, threading the cursor through every part.
 *
 * Each MoveTo parameter pair opens a new part (one point, one line or one
 * ring). Lines and rings take exactly one MoveTo pair per part. Every line
 * returned has at least 2 vertices, and every ring at least 3 and was closed
 * by a ClosePath.
 */
function readParts(type: GeomType, commands: readonly number[], offset: number): Coord[][] {
  const parts: Coord[][] = [];
  let current: Coord[] | null = null;
  let closed = false;
  let x = 0, y = 0;
  let i = 0;

  const fail = (message: string) => new DecodeError('MalformedGeometry', message, offset);

  while (i < commands.length) {
    const at = i;
    const cmd = commands[i++];
    const id = cmd % 8;
    const count = Math.floor(cmd / 8);

    if (id === CMD_CLOSE_PATH) {
      if (type !== GeomType.Polygon) throw fail(`ClosePath at command ${at} outside polygon geometry`);
      if (count !== 1) throw fail(`ClosePath at command ${at} has count ${count}, expected 1`);
      if (current === null || closed) throw fail(`ClosePath at command ${at} has no open ring`);
      if (current.length < 3) throw fail(`ClosePath at command ${at} closes a ring of ${current.length} vertices, expected at least 3`);
      closed = true;
      continue;
    }

    if (id !== CMD_MOVE_TO && id !== CMD_LINE_TO) {
      throw fail(`unknown command id ${id} at command ${at}`);
    }
    if (count === 0) {
      throw fail(`command ${at} has a zero count`);
    }
    if (commands.length - i < count * 2) {
      throw fail(`command ${at} needs ${count * 2} parameters but only ${commands.length - i} remain`);
    }

    if (id === CMD_LINE_TO) {
      if (type === GeomType.Point) throw fail(`LineTo at command ${at} in point geometry`);
      if (current === null || closed) throw fail(`LineTo at command ${at} has no open part`);
    } else if (type !== GeomType.Point) {
      if (count !== 1) throw fail(`MoveTo at command ${at} has count ${count}, expected 1`);
      if (type === GeomType.Polygon && current !== null && !closed) {
        throw fail(`MoveTo at command ${at} before the previous ring was closed`);
      }
      if (type === GeomType.LineString && current !== null && current.length < 2) {
        throw fail(`line ending before command ${at} has ${current.length} vertex, expected at least 2`);
      }
    }

    for (let k = 0; k < count; k++) {
      x += zigzagDecode(commands[i++]);
      y += zigzagDecode(commands[i++]);
      if (id === CMD_MOVE_TO) {
        current = [[x, y]];
        closed = false;
        parts.push(current);
      } else if (current !== null) {
        current.push([x, y]);
      }
    }
  }

  if (type === GeomType.Polygon && current !== null && !closed) {
    throw fail('polygon ring is not closed by ClosePath');
  }
  if (type === GeomType.LineString && current !== null && current.length < 2) {
    throw fail(`final line has ${current.length} vertex, expected at least 2`);
  }

  return parts;
}

// ─── Ring classification ────────────────────────────────────────────────────

type RingState =
  | { kind: 'awaiting-exterior' }
  | { kind: 'collecting-holes'; polygon: Polygon };

/**
 * Group closed rings into polygons by winding.
 *
 * Rings with a positive {@link signedArea} are exteriors; rings with zero or
 * negative area are holes of the most recent polygon. A hole that arrives
 * before any exterior becomes a polygon with `exterior: null`, and further
 * holes attach to it until the next exterior.
 */
export function classifyRings(
  rings: Coord[][],
  onOrphanHole?: (ring: number) => void,
): Polygon[] {
  const polygons: Polygon[] = [];
  let state: RingState = { kind: 'awaiting-exterior' };

  for (let index = 0; index < rings.length; index++) {
    const ring = rings[index];
    if (signedArea(ring) > 0) {
      const polygon: Polygon = { exterior: ring, holes: [] };
      polygons.push(polygon);
      state = { kind: 'collecting-holes', polygon };
      continue;
    }

    if (state.kind === 'awaiting-exterior') {
      const polygon: Polygon = { exterior: null, holes: [] };
      polygons.push(polygon);
      state = { kind: 'collecting-holes', polygon };
    }

    state.polygon.holes.push(ring);
    if (state.polygon.exterior === null) onOrphanHole?.(index);
  }

  return polygons;
}

/**
 * Signed area of a ring via the shoelace formula, closing the last vertex
 * back to the first.
 *
 * In tile coordinates (y pointing down) a clockwise ring on screen has a
 * positive area.
 *
 * @example
 * ```ts
 * signedArea([[0, 0], [10, 0], [10, 10], [0, 10]]); // 100
 * ```
 */
export function signedArea(ring: readonly Coord[]): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    sum += ring[j][0] * ring[i][1] - ring[i][0] * ring[j][1];
  }
  return sum / 2;
}
