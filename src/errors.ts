/**
 * @module errors
 *
 * Error and warning types raised while decoding a tile.
 *
 * Every hard failure is a {@link DecodeError}: the decode is aborted and no
 * partial tile is returned. Soft conditions that still let the decoder
 * produce a result are reported as {@link DecodeWarning} values through
 * {@link DecodeOptions.onWarning}.
 */

/**
 * Failure categories for {@link DecodeError}.
 *
 * | Kind                | Raised when                                                   |
 * |---------------------|---------------------------------------------------------------|
 * | `TruncatedInput`    | the buffer ends before a length or field is fully readable    |
 * | `VarintOverflow`    | a varint runs past 10 bytes                                   |
 * | `UnknownWireType`   | a tag's low 3 bits are not 0, 1, 2 or 5                       |
 * | `MalformedString`   | length-delimited text is not valid UTF-8                      |
 * | `MalformedLayer`    | a required layer field is missing                             |
 * | `MalformedFeature`  | odd-length tags, or a tag index outside the keys/values table |
 * | `MalformedGeometry` | command stream underflow, bad ClosePath, trailing integers    |
 */
export type DecodeErrorKind =
  | 'TruncatedInput'
  | 'VarintOverflow'
  | 'UnknownWireType'
  | 'MalformedString'
  | 'MalformedLayer'
  | 'MalformedFeature'
  | 'MalformedGeometry';

/**
 * A fatal tile decoding error.
 *
 * `offset` is absolute: it counts bytes from the start of the buffer handed
 * to {@link decodeTile}, even when the failure happened deep inside a
 * nested layer or feature message.
 *
 * @example
 * ```ts
 * try {
 *   decodeTile(bytes);
 * } catch (err) {
 *   if (err instanceof DecodeError) {
 *     console.error(`${err.kind} at ${err.offset}`);
 *   }
 * }
 * ```
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  readonly offset: number;

  constructor(kind: DecodeErrorKind, message: string, offset: number, options?: ErrorOptions) {
    super(`${kind}: ${message} at byte ${offset}`, options);
    this.name = 'DecodeError';
    this.kind = kind;
    this.offset = offset;
  }
}

/** Soft conditions reported through {@link DecodeOptions.onWarning}. */
export type DecodeWarningKind = 'OrphanHole';

/**
 * A non-fatal decoding diagnostic.
 *
 * The only current kind is `OrphanHole`: an interior ring appeared before
 * any exterior ring in a polygon feature and was kept as a polygon with no
 * exterior.
 */
export interface DecodeWarning {
  kind: DecodeWarningKind;
  message: string;
  /** Absolute byte offset of the geometry field that produced the warning. */
  offset: number;
  /** Name of the layer containing the feature. */
  layer: string;
  /** Zero-based index of the feature within its layer. */
  feature: number;
}

/**
 * Options accepted by {@link decodeTile}.
 */
export interface DecodeOptions {
  /**
   * Receives every {@link DecodeWarning} in the order it was raised.
   * Warnings are discarded when omitted.
   */
  onWarning?: (warning: DecodeWarning) => void;
}
