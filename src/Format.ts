/**
 * A carrier of string key:value pairs.
 * Tracers write to it on inject and iterate it on extract.
 */
export interface TextMap extends Iterable<readonly [key: string, value: string]> {
  put: (key: string, value: string) => void
}

/**
 * Holder for an opaque binary encoding of a span context.
 * `inject` replaces `buffer`, `extract` reads it.
 */
export interface BinaryCarrier {
  buffer: Uint8Array
}

declare const carrierShape: unique symbol

/**
 * Identifies a carrier encoding, and statically pairs it with the carrier shape it requires.
 * The phantom member keeps `CarrierT` invariant, so formats of different shapes
 * are not assignable to each other.
 */
export interface Format<CarrierT> {
  readonly name: string
  readonly [carrierShape]?: (carrier: CarrierT) => CarrierT
}

class BuiltinFormat {
  constructor(readonly name: string) {}

  toString(): string {
    return `Builtin.${this.name}`
  }
}

export const Builtin: {
  /**
   * Any string key:value pairs.
   * Keys and values are unrestricted, so the carrier must not need to escape them.
   */
  readonly TEXT_MAP: Format<TextMap>
  /**
   * Like TEXT_MAP, but keys and values must be usable as HTTP header names and values.
   * Keys are treated case-insensitively by most transports.
   */
  readonly HTTP_HEADERS: Format<TextMap>
  /** an opaque byte encoding */
  readonly BINARY: Format<BinaryCarrier>
} = {
  TEXT_MAP: new BuiltinFormat('TEXT_MAP'),
  HTTP_HEADERS: new BuiltinFormat('HTTP_HEADERS'),
  BINARY: new BuiltinFormat('BINARY'),
}

export const isTextMap = (value: unknown): value is TextMap =>
  typeof value === 'object' &&
  value !== null &&
  'put' in value &&
  typeof value.put === 'function' &&
  Symbol.iterator in value

export const isBinaryCarrier = (value: unknown): value is BinaryCarrier =>
  typeof value === 'object' &&
  value !== null &&
  'buffer' in value &&
  value.buffer instanceof Uint8Array

export const createBinaryCarrier = (
  buffer: Uint8Array = new Uint8Array(0),
): BinaryCarrier => ({ buffer })
