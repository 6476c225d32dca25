import type { Format } from './Format'
import type { Span, SpanBuilder, SpanContext } from './spanTypes'
import type { ScopeManager, Tracer } from './types'

/**
 * A stable tracer handle that resolves its target on every call.
 * Holding on to it is safe even before the real tracer is known.
 */
export class ForwardingTracer implements Tracer {
  readonly #getTarget: () => Tracer

  constructor(getTarget: () => Tracer) {
    this.#getTarget = getTarget
  }

  scopeManager(): ScopeManager {
    return this.#getTarget().scopeManager()
  }

  activeSpan(): Span | undefined {
    return this.#getTarget().activeSpan()
  }

  buildSpan(operationName: string): SpanBuilder {
    return this.#getTarget().buildSpan(operationName)
  }

  inject<CarrierT>(
    spanContext: SpanContext,
    format: Format<CarrierT>,
    carrier: CarrierT,
  ): void {
    this.#getTarget().inject(spanContext, format, carrier)
  }

  extract<CarrierT>(
    format: Format<CarrierT>,
    carrier: CarrierT,
  ): SpanContext | undefined {
    return this.#getTarget().extract(format, carrier)
  }

  toString(): string {
    return `GlobalTracer{${String(this.#getTarget())}}`
  }
}
