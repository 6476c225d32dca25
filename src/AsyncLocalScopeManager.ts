import { AsyncLocalStorage } from 'node:async_hooks'
import type { Observable } from 'rxjs'
import { Subject } from 'rxjs'
import {
  type ActivationStack,
  type ActivationUtilities,
  AsyncLocalScope,
} from './AsyncLocalScope'
import type { ScopeManagerEvents } from './eventTypes'
import type { Span } from './spanTypes'
import type { ReportWarningFn, Scope, ScopeManager } from './types'

export interface AsyncLocalScopeManagerConfig {
  /**
   * Called when a scope is closed while it is not the active one.
   * The close is ignored either way; by default nothing is reported.
   */
  reportWarningFn?: ReportWarningFn
}

/**
 * Scope manager that keeps one activation stack per asynchronous execution context.
 *
 * Code that never calls `fork` or `isolate` shares a single root stack.
 * `fork(fn)` gives `fn`, and every async continuation it creates, a stack of its own
 * that starts from the caller's active scope, so concurrent tasks never push onto the same stack.
 * `isolate(fn)` does the same from an empty stack, much like work handed to a new thread.
 * Active scopes never cross that boundary on their own:
 * re-activate the span inside if it should be current there.
 */
export class AsyncLocalScopeManager implements ScopeManager {
  readonly #storage = new AsyncLocalStorage<ActivationStack>()
  readonly #rootStack: ActivationStack = { top: undefined }
  readonly #utilities: ActivationUtilities

  private eventSubjects: {
    [EventT in keyof ScopeManagerEvents]: Subject<ScopeManagerEvents[EventT]>
  } = {
    'scope-activated': new Subject<ScopeManagerEvents['scope-activated']>(),
    'scope-closed': new Subject<ScopeManagerEvents['scope-closed']>(),
    'scope-close-ignored': new Subject<
      ScopeManagerEvents['scope-close-ignored']
    >(),
  }

  constructor({ reportWarningFn = () => {} }: AsyncLocalScopeManagerConfig = {}) {
    this.#utilities = {
      getCurrentStack: () => this.#getCurrentStack(),
      onScopeClosed: (event) => {
        this.eventSubjects['scope-closed'].next(event)
      },
      onScopeCloseIgnored: (event) => {
        reportWarningFn(
          new Error(
            'Ignoring close() of a scope that is not the active scope of the current context',
          ),
        )
        this.eventSubjects['scope-close-ignored'].next(event)
      },
    }
  }

  #getCurrentStack(): ActivationStack {
    return this.#storage.getStore() ?? this.#rootStack
  }

  activate(span: Span, finishSpanOnClose: boolean): Scope {
    const stack = this.#getCurrentStack()
    const previous = stack.top
    const scope = new AsyncLocalScope(
      this.#utilities,
      span,
      finishSpanOnClose,
      previous,
    )
    stack.top = scope
    this.eventSubjects['scope-activated'].next({ scope, previous })
    return scope
  }

  active(): Scope | undefined {
    return this.#getCurrentStack().top
  }

  fork<T>(fn: () => T): T {
    return this.#storage.run({ top: this.#getCurrentStack().top }, fn)
  }

  /**
   * Run `fn` against a new, empty activation stack.
   */
  isolate<T>(fn: () => T): T {
    return this.#storage.run({ top: undefined }, fn)
  }

  /**
   * Observable for scope lifecycle events
   * @param event The event type to observe
   */
  when<EventT extends keyof ScopeManagerEvents>(
    event: EventT,
  ): Observable<ScopeManagerEvents[EventT]> {
    return this.eventSubjects[event].asObservable()
  }
}
