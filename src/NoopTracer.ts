import type { Format } from './Format'
import type { Span, SpanBuilder, SpanContext } from './spanTypes'
import type { Scope, ScopeManager, Tracer } from './types'

/*
 * Behaviorally inert implementations of every contract.
 * They hold no state, so one shared instance of each is enough.
 */

class NoopSpanContextImpl implements SpanContext {
  baggageItems(): Iterable<readonly [key: string, value: string]> {
    return []
  }

  toString(): string {
    return 'NoopSpanContext'
  }
}

export const NoopSpanContext: SpanContext = new NoopSpanContextImpl()

class NoopSpanImpl implements Span {
  context(): SpanContext {
    return NoopSpanContext
  }

  setTag(): this {
    return this
  }

  log(): this {
    return this
  }

  setBaggageItem(): this {
    return this
  }

  getBaggageItem(): string | undefined {
    return undefined
  }

  setOperationName(): this {
    return this
  }

  finish(): void {}

  toString(): string {
    return 'NoopSpan'
  }
}

export const NoopSpan: Span = new NoopSpanImpl()

class NoopScopeImpl implements Scope {
  close(): void {}

  span(): Span {
    return NoopSpan
  }
}

export const NoopScope: Scope = new NoopScopeImpl()

class NoopScopeManagerImpl implements ScopeManager {
  activate(): Scope {
    return NoopScope
  }

  active(): Scope | undefined {
    return undefined
  }

  fork<T>(fn: () => T): T {
    return fn()
  }
}

export const NoopScopeManager: ScopeManager = new NoopScopeManagerImpl()

class NoopSpanBuilderImpl implements SpanBuilder {
  asChildOf(): SpanBuilder {
    return this
  }

  addReference(): SpanBuilder {
    return this
  }

  ignoreActiveSpan(): SpanBuilder {
    return this
  }

  withTag(): SpanBuilder {
    return this
  }

  withStartTimestamp(): SpanBuilder {
    return this
  }

  startActive(): Scope {
    return NoopScope
  }

  start(): Span {
    return NoopSpan
  }

  toString(): string {
    return 'NoopSpanBuilder'
  }
}

export const NoopSpanBuilder: SpanBuilder = new NoopSpanBuilderImpl()

export class NoopTracer implements Tracer {
  scopeManager(): ScopeManager {
    return NoopScopeManager
  }

  activeSpan(): Span | undefined {
    return undefined
  }

  buildSpan(): SpanBuilder {
    return NoopSpanBuilder
  }

  inject<CarrierT>(
    _spanContext: SpanContext,
    _format: Format<CarrierT>,
    _carrier: CarrierT,
  ): void {}

  extract<CarrierT>(
    _format: Format<CarrierT>,
    _carrier: CarrierT,
  ): SpanContext | undefined {
    return undefined
  }

  toString(): string {
    return 'NoopTracer'
  }
}

export const noopTracer: Tracer = new NoopTracer()

export const isNoopTracer = (tracer: Tracer): boolean =>
  tracer instanceof NoopTracer
