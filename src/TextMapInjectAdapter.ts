import { UnsupportedOperationError } from './errors'
import type { TextMap } from './Format'

export type WritableStringMap = Map<string, string> | Record<string, string>

/**
 * A TextMap carrier for use with `Tracer.inject()` only.
 * It writes straight through to the wrapped map; iterating it throws.
 */
export class TextMapInjectAdapter implements TextMap {
  readonly #target: WritableStringMap

  constructor(target: WritableStringMap) {
    this.#target = target
  }

  [Symbol.iterator](): Iterator<readonly [key: string, value: string]> {
    throw new UnsupportedOperationError(
      'TextMapInjectAdapter should only be used with Tracer.inject()',
    )
  }

  put(key: string, value: string): void {
    if (this.#target instanceof Map) {
      this.#target.set(key, value)
      return
    }
    this.#target[key] = value
  }
}
