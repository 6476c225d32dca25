import type { ScopeCloseIgnoredEvent, ScopeClosedEvent } from './eventTypes'
import type { Span } from './spanTypes'
import type { Scope } from './types'

/**
 * The activation stack of one execution context.
 * Only the top is stored; each scope links to the one below it,
 * so following `toRestore` from the top reconstructs the whole nesting.
 */
export interface ActivationStack {
  top: AsyncLocalScope | undefined
}

/** what a scope needs from the manager that created it */
export interface ActivationUtilities {
  getCurrentStack: () => ActivationStack
  onScopeClosed: (event: ScopeClosedEvent) => void
  onScopeCloseIgnored: (event: ScopeCloseIgnoredEvent) => void
}

export class AsyncLocalScope implements Scope {
  readonly #utilities: ActivationUtilities
  readonly #wrapped: Span
  readonly #finishSpanOnClose: boolean
  readonly #toRestore: AsyncLocalScope | undefined

  constructor(
    utilities: ActivationUtilities,
    wrapped: Span,
    finishSpanOnClose: boolean,
    toRestore: AsyncLocalScope | undefined,
  ) {
    this.#utilities = utilities
    this.#wrapped = wrapped
    this.#finishSpanOnClose = finishSpanOnClose
    this.#toRestore = toRestore
  }

  get finishSpanOnClose(): boolean {
    return this.#finishSpanOnClose
  }

  /** the scope that becomes active again once this one closes */
  get toRestore(): AsyncLocalScope | undefined {
    return this.#toRestore
  }

  close(): void {
    const stack = this.#utilities.getCurrentStack()
    if (stack.top !== this) {
      // out of order: leave the stack alone
      this.#utilities.onScopeCloseIgnored({ scope: this, active: stack.top })
      return
    }

    try {
      if (this.#finishSpanOnClose) {
        this.#wrapped.finish()
      }
    } finally {
      stack.top = this.#toRestore
    }

    this.#utilities.onScopeClosed({
      scope: this,
      restored: this.#toRestore,
      finishedSpan: this.#finishSpanOnClose,
    })
  }

  span(): Span {
    return this.#wrapped
  }
}
