import type { Span } from './spanTypes'
import type { Scope, ScopeManager } from './types'

export interface WithActiveSpanOptions {
  /** finish the span when the scope closes; defaults to false */
  finishSpanOnClose?: boolean
}

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function'

/**
 * Activates `span` for the duration of `fn`, and closes the scope on every exit path:
 * when `fn` returns, when it throws, and, if it returns a promise, when that promise settles.
 *
 * `fn` runs in a fork of the current context, so concurrent calls each get their own stack
 * and the caller's active scope is left as it was.
 *
 * @example
 * ```ts
 * const span = tracer.buildSpan('load-user').start()
 * const user = await withActiveSpan(
 *   tracer.scopeManager(),
 *   span,
 *   () => repository.loadUser(id),
 *   { finishSpanOnClose: true },
 * )
 * ```
 */
export function withActiveSpan<T>(
  scopeManager: ScopeManager,
  span: Span,
  fn: (scope: Scope) => Promise<T>,
  options?: WithActiveSpanOptions,
): Promise<T>
export function withActiveSpan<T>(
  scopeManager: ScopeManager,
  span: Span,
  fn: (scope: Scope) => T,
  options?: WithActiveSpanOptions,
): T
export function withActiveSpan(
  scopeManager: ScopeManager,
  span: Span,
  fn: (scope: Scope) => unknown,
  { finishSpanOnClose = false }: WithActiveSpanOptions = {},
): unknown {
  return scopeManager.fork(() => {
    const scope = scopeManager.activate(span, finishSpanOnClose)
    let result: unknown
    try {
      result = fn(scope)
    } catch (error) {
      scope.close()
      throw error
    }

    if (!isPromiseLike(result)) {
      scope.close()
      return result
    }

    return Promise.resolve(result).finally(() => {
      scope.close()
    })
  })
}
