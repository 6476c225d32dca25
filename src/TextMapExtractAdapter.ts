import { UnsupportedOperationError } from './errors'
import type { TextMap } from './Format'

export type ReadonlyStringMap =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>

const isReadonlyMap = (
  source: ReadonlyStringMap,
): source is ReadonlyMap<string, string> => source instanceof Map

/**
 * A TextMap carrier for use with `Tracer.extract()` only.
 * Writing to it throws, so an extracted carrier can't be accidentally reused for injection.
 *
 * @example
 * ```ts
 * const context = tracer.extract(
 *   Builtin.HTTP_HEADERS,
 *   new TextMapExtractAdapter(request.headers),
 * )
 * ```
 */
export class TextMapExtractAdapter implements TextMap {
  readonly #source: ReadonlyStringMap

  constructor(source: ReadonlyStringMap) {
    this.#source = source
  }

  *[Symbol.iterator](): Iterator<readonly [key: string, value: string]> {
    const source = this.#source
    if (isReadonlyMap(source)) {
      yield* source.entries()
      return
    }
    yield* Object.entries(source)
  }

  put(_key: string, _value: string): never {
    throw new UnsupportedOperationError(
      'TextMapExtractAdapter should only be used with Tracer.extract()',
    )
  }
}
