import type { Observable } from 'rxjs'
import { Subject } from 'rxjs'
import { IllegalStateError } from './errors'
import type { RegistryEvents } from './eventTypes'
import { ForwardingTracer } from './ForwardingTracer'
import { isNoopTracer, noopTracer } from './NoopTracer'
import type { Tracer } from './types'

export type TracerProvider = () => Tracer

const describeThrown = (thrown: unknown): string => {
  if (typeof thrown === 'string') return thrown
  try {
    return JSON.stringify(thrown) ?? String(thrown)
  } catch {
    return String(thrown)
  }
}

/**
 * Holds the one tracer of the process.
 *
 * Starts out with the no-op tracer and can be switched to a real one at most once,
 * so independent initializers (an agent, the application itself) can all call
 * `registerIfAbsent` and exactly one of them wins.
 *
 * Prefer passing a tracer explicitly through your wiring; the registry is the fallback
 * for code that can't receive one, e.g. instrumentation inside third-party libraries.
 */
export class GlobalTracerRegistry {
  #tracer: Tracer = noopTracer
  #registering = false
  readonly #handle = new ForwardingTracer(() => this.#tracer)

  private eventSubjects: {
    [EventT in keyof RegistryEvents]: Subject<RegistryEvents[EventT]>
  } = {
    'tracer-registered': new Subject<RegistryEvents['tracer-registered']>(),
    'registration-rejected': new Subject<
      RegistryEvents['registration-rejected']
    >(),
  }

  /**
   * A tracer that forwards every call to whichever tracer is registered at the time of the call.
   * The same instance is returned every time.
   */
  get(): Tracer {
    return this.#handle
  }

  isRegistered(): boolean {
    return !isNoopTracer(this.#tracer)
  }

  /**
   * Register the tracer returned by `provider`, unless one is registered already.
   * The provider is not called in that case.
   *
   * Errors thrown by the provider propagate; anything thrown that isn't an `Error`
   * is wrapped in an `IllegalStateError`. Nothing is registered when it throws.
   *
   * @returns whether the provided tracer was registered by this call
   */
  registerIfAbsent(provider: TracerProvider): boolean {
    // a provider calling back into the registry counts as a competing writer
    if (this.isRegistered() || this.#registering) return false

    this.#registering = true
    let candidate: Tracer
    try {
      candidate = provider()
    } catch (error) {
      if (error instanceof Error) throw error
      throw new IllegalStateError(
        `Exception obtaining tracer from provider: ${describeThrown(error)}`,
        { cause: error },
      )
    } finally {
      this.#registering = false
    }

    if (candidate == null) {
      throw new TypeError('Cannot register GlobalTracer <null>.')
    }
    if (candidate instanceof ForwardingTracer) return false

    this.#tracer = candidate
    this.eventSubjects['tracer-registered'].next({ tracer: candidate })
    return true
  }

  /**
   * @deprecated use `registerIfAbsent`, which reports a lost race through its return value.
   * @throws IllegalStateError if a different tracer is registered already
   */
  register(tracer: Tracer): void {
    if (
      !this.registerIfAbsent(() => tracer) &&
      tracer !== this.#tracer &&
      !(tracer instanceof ForwardingTracer)
    ) {
      this.eventSubjects['registration-rejected'].next({
        registered: this.#tracer,
        rejected: tracer,
      })
      throw new IllegalStateError(
        'There is already a current global Tracer registered.',
      )
    }
  }

  /**
   * Observable for registry events
   * @param event The event type to observe
   */
  when<EventT extends keyof RegistryEvents>(
    event: EventT,
  ): Observable<RegistryEvents[EventT]> {
    return this.eventSubjects[event].asObservable()
  }

  toString(): string {
    return String(this.#handle)
  }
}

/** the process-wide registry */
export const GlobalTracer = new GlobalTracerRegistry()
