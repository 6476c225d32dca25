import type { Format } from './Format'
import type { Span, SpanBuilder, SpanContext } from './spanTypes'

/**
 * The activation record binding a span to "current" status in one execution context.
 * Obtained from `ScopeManager.activate`, and must be closed exactly once,
 * in LIFO order with the other scopes of that context.
 */
export interface Scope {
  /**
   * Ends the active period, restoring whichever scope was active before this one.
   * Closing more than once leads to undefined behavior.
   */
  close: () => void
  span: () => Span
}

export interface ScopeManager {
  /**
   * Make a span the active one.
   * It is a programming error to neglect to close the returned scope.
   */
  activate: (span: Span, finishSpanOnClose: boolean) => Scope
  /**
   * If there is an active scope, its span becomes the implicit parent
   * of any span started by the tracer.
   */
  active: () => Scope | undefined
  /**
   * Run `fn` on a stack of its own that starts out with the current active scope.
   * Activations made inside, and in every async continuation `fn` creates,
   * are invisible to the caller and to other forks.
   */
  fork: <T>(fn: () => T) => T
}

export interface Tracer {
  /** may be a no-op implementation, never undefined */
  scopeManager: () => ScopeManager
  /** shorthand for `scopeManager().active()?.span()` */
  activeSpan: () => Span | undefined
  buildSpan: (operationName: string) => SpanBuilder
  /**
   * Serialize a span context into a carrier, for propagation across process boundaries.
   * Every implementation must support `Builtin.TEXT_MAP` and `Builtin.BINARY`.
   */
  inject: <CarrierT>(
    spanContext: SpanContext,
    format: Format<CarrierT>,
    carrier: CarrierT,
  ) => void
  /**
   * Deserialize a span context from a carrier.
   * Returns undefined when the carrier holds no context, and throws
   * `InvalidArgumentError` when the state is present but corrupt.
   */
  extract: <CarrierT>(
    format: Format<CarrierT>,
    carrier: CarrierT,
  ) => SpanContext | undefined
}

export type ReportWarningFn = (warning: Error) => void
