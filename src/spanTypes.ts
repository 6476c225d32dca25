import type { ReferenceType } from './constants'
import type { Scope } from './types'

export type TagValue = string | number | boolean

export type SpanLogFields = Readonly<Record<string, unknown>>

/**
 * The propagable state of a span: trace identity plus baggage.
 * Read-only from the point of view of this library.
 */
export interface SpanContext {
  /**
   * All baggage items propagating along with the associated span.
   * Keys are unique, order is not significant.
   */
  baggageItems: () => Iterable<readonly [key: string, value: string]>
}

/**
 * A single timed unit of work.
 * This library only ever calls `finish` (when a scope that owns the span is closed);
 * everything else belongs to the tracer implementation.
 */
export interface Span {
  /**
   * May be called at any time, including after `finish()`.
   */
  context: () => SpanContext
  setTag: (key: string, value: TagValue) => this
  /**
   * Log key:value fields, or a single event name,
   * at the current walltime or at an explicit timestamp (microseconds since epoch).
   */
  log: (fieldsOrEvent: SpanLogFields | string, timestampMicros?: number) => this
  /**
   * Baggage is propagated to all future (recursive) children of this span's context,
   * including across process boundaries.
   */
  setBaggageItem: (key: string, value: string) => this
  getBaggageItem: (key: string) => string | undefined
  setOperationName: (operationName: string) => this
  /**
   * Sets the end timestamp (now, unless given in microseconds) and records the span.
   * Apart from `context()`, this should be the last call made to the span.
   */
  finish: (finishMicros?: number) => void
}

export interface SpanReference {
  type: ReferenceType
  referencedContext: SpanContext
}

export interface SpanBuilder {
  /** shorthand for `addReference(References.CHILD_OF, parent)`; no-op when parent is undefined */
  asChildOf: (parent: Span | SpanContext | undefined) => SpanBuilder
  /**
   * Adding any explicit reference disables the implicit CHILD_OF reference
   * to the scope manager's active span.
   */
  addReference: (
    type: ReferenceType,
    referencedContext: SpanContext | undefined,
  ) => SpanBuilder
  /** do not create an implicit CHILD_OF reference to the active span */
  ignoreActiveSpan: () => SpanBuilder
  withTag: (key: string, value: TagValue) => SpanBuilder
  withStartTimestamp: (micros: number) => SpanBuilder
  /**
   * Shorthand for `tracer.scopeManager().activate(builder.start(), finishSpanOnClose)`.
   */
  startActive: (finishSpanOnClose: boolean) => Scope
  start: () => Span
}

export const isSpan = (value: Span | SpanContext): value is Span =>
  'context' in value && typeof value.context === 'function'
