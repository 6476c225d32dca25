import { AsyncLocalScopeManager } from '../AsyncLocalScopeManager'
import { References, type ReferenceType } from '../constants'
import { UnsupportedOperationError } from '../errors'
import { Builtin, type Format, isBinaryCarrier, isTextMap } from '../Format'
import {
  isSpan,
  type Span,
  type SpanBuilder,
  type SpanContext,
  type TagValue,
} from '../spanTypes'
import type { Scope, ScopeManager, Tracer } from '../types'
import {
  type MockReference,
  MockSpan,
  MockSpanContext,
  nowMicros,
} from './MockSpan'
import {
  extractBinary,
  extractTextMap,
  injectBinary,
  injectTextMap,
} from './mockPropagation'

export interface MockTracerConfig {
  /** defaults to a new AsyncLocalScopeManager */
  scopeManager?: ScopeManager
  /** used for both trace and span ids; defaults to an incrementing counter */
  generateId?: () => string
}

interface MockTracerUtilities {
  scopeManager: ScopeManager
  generateId: () => string
  onSpanFinished: (span: MockSpan) => void
}

export class MockSpanBuilder implements SpanBuilder {
  readonly #utilities: MockTracerUtilities
  readonly #operationName: string
  readonly #references: MockReference[] = []
  readonly #tags = new Map<string, TagValue>()
  #ignoringActiveSpan = false
  #startMicros: number | undefined

  constructor(utilities: MockTracerUtilities, operationName: string) {
    this.#utilities = utilities
    this.#operationName = operationName
  }

  asChildOf(parent: Span | SpanContext | undefined): this {
    if (!parent) return this
    return this.addReference(
      References.CHILD_OF,
      isSpan(parent) ? parent.context() : parent,
    )
  }

  addReference(
    type: ReferenceType,
    referencedContext: SpanContext | undefined,
  ): this {
    if (referencedContext) {
      this.#references.push({ type, referencedContext })
    }
    return this
  }

  ignoreActiveSpan(): this {
    this.#ignoringActiveSpan = true
    return this
  }

  withTag(key: string, value: TagValue): this {
    this.#tags.set(key, value)
    return this
  }

  withStartTimestamp(micros: number): this {
    this.#startMicros = micros
    return this
  }

  startActive(finishSpanOnClose: boolean): Scope {
    return this.#utilities.scopeManager.activate(
      this.start(),
      finishSpanOnClose,
    )
  }

  start(): MockSpan {
    const { generateId, scopeManager, onSpanFinished } = this.#utilities

    const references = [...this.#references]
    if (references.length === 0 && !this.#ignoringActiveSpan) {
      const activeSpan = scopeManager.active()?.span()
      if (activeSpan) {
        references.push({
          type: References.CHILD_OF,
          referencedContext: activeSpan.context(),
        })
      }
    }

    // the first CHILD_OF wins, otherwise the first reference of any kind
    const parentReference =
      references.find(({ type }) => type === References.CHILD_OF) ??
      references[0]
    const parentContext = parentReference?.referencedContext
    const parentMockContext =
      parentContext instanceof MockSpanContext ? parentContext : undefined

    const baggage = new Map<string, string>()
    for (const { referencedContext } of references) {
      for (const [key, value] of referencedContext.baggageItems()) {
        baggage.set(key, value)
      }
    }

    return new MockSpan({
      operationName: this.#operationName,
      context: new MockSpanContext(
        parentMockContext?.traceId ?? generateId(),
        generateId(),
        baggage,
      ),
      startMicros: this.#startMicros ?? nowMicros(),
      tags: this.#tags,
      references,
      parentId: parentMockContext?.spanId,
      onFinish: onSpanFinished,
    })
  }
}

/**
 * In-memory tracer for tests.
 * Records every finished span and propagates its own span contexts in all built-in formats.
 *
 * Text maps carry `trace-id`, `span-id` and one `baggage-<key>` entry per baggage item;
 * HTTP_HEADERS additionally URI-encodes baggage values.
 * BINARY carries a version byte followed by a JSON body.
 */
export class MockTracer implements Tracer {
  readonly #finishedSpans: MockSpan[] = []
  readonly #utilities: MockTracerUtilities

  constructor({ scopeManager, generateId }: MockTracerConfig = {}) {
    let nextId = 1
    this.#utilities = {
      scopeManager: scopeManager ?? new AsyncLocalScopeManager(),
      generateId: generateId ?? (() => String(nextId++)),
      onSpanFinished: (span) => {
        this.#finishedSpans.push(span)
      },
    }
  }

  scopeManager(): ScopeManager {
    return this.#utilities.scopeManager
  }

  activeSpan(): Span | undefined {
    return this.#utilities.scopeManager.active()?.span()
  }

  buildSpan(operationName: string): MockSpanBuilder {
    return new MockSpanBuilder(this.#utilities, operationName)
  }

  inject<CarrierT>(
    spanContext: SpanContext,
    format: Format<CarrierT>,
    carrier: CarrierT,
  ): void {
    if (!(spanContext instanceof MockSpanContext)) {
      throw new UnsupportedOperationError(
        `MockTracer can not inject a foreign span context: ${String(spanContext)}`,
      )
    }
    const formatKey: object = format
    if (formatKey === Builtin.BINARY && isBinaryCarrier(carrier)) {
      injectBinary(spanContext, carrier)
      return
    }
    if (
      (formatKey === Builtin.TEXT_MAP || formatKey === Builtin.HTTP_HEADERS) &&
      isTextMap(carrier)
    ) {
      injectTextMap(spanContext, carrier, {
        urlEncoding: formatKey === Builtin.HTTP_HEADERS,
      })
      return
    }
    throw new UnsupportedOperationError(
      `MockTracer does not support injecting ${String(format)}`,
    )
  }

  extract<CarrierT>(
    format: Format<CarrierT>,
    carrier: CarrierT,
  ): SpanContext | undefined {
    const formatKey: object = format
    if (formatKey === Builtin.BINARY && isBinaryCarrier(carrier)) {
      return extractBinary(carrier)
    }
    if (
      (formatKey === Builtin.TEXT_MAP || formatKey === Builtin.HTTP_HEADERS) &&
      isTextMap(carrier)
    ) {
      return extractTextMap(carrier, {
        urlEncoding: formatKey === Builtin.HTTP_HEADERS,
      })
    }
    throw new UnsupportedOperationError(
      `MockTracer does not support extracting ${String(format)}`,
    )
  }

  /** finished spans, in the order they were finished */
  finishedSpans(): MockSpan[] {
    return [...this.#finishedSpans]
  }

  reset(): void {
    this.#finishedSpans.length = 0
  }

  toString(): string {
    return 'MockTracer'
  }
}
