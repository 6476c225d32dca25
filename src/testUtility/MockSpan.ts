import {
  LogFields,
  MICROS_PER_MILLISECOND,
  type ReferenceType,
} from '../constants'
import type {
  Span,
  SpanContext,
  SpanLogFields,
  TagValue,
} from '../spanTypes'

export const nowMicros = () => Date.now() * MICROS_PER_MILLISECOND

/** immutable; setting baggage on a span swaps in a new context */
export class MockSpanContext implements SpanContext {
  readonly #baggage: ReadonlyMap<string, string>

  constructor(
    readonly traceId: string,
    readonly spanId: string,
    baggage: Iterable<readonly [string, string]> = [],
  ) {
    this.#baggage = new Map(baggage)
  }

  baggageItems(): Iterable<readonly [key: string, value: string]> {
    return [...this.#baggage]
  }

  getBaggageItem(key: string): string | undefined {
    return this.#baggage.get(key)
  }

  withBaggageItem(key: string, value: string): MockSpanContext {
    return new MockSpanContext(this.traceId, this.spanId, [
      ...this.#baggage,
      [key, value],
    ])
  }

  toString(): string {
    return `MockSpanContext{traceId=${this.traceId}, spanId=${this.spanId}}`
  }
}

export interface MockLogEntry {
  timestampMicros: number
  fields: SpanLogFields
}

export interface MockReference {
  type: ReferenceType
  referencedContext: SpanContext
}

export interface MockSpanInit {
  operationName: string
  context: MockSpanContext
  startMicros: number
  tags: ReadonlyMap<string, TagValue>
  references: readonly MockReference[]
  /** span id of the parent, when the parent was a mock span context */
  parentId: string | undefined
  onFinish: (span: MockSpan) => void
}

/**
 * In-memory span that records everything done to it.
 */
export class MockSpan implements Span {
  #context: MockSpanContext
  #operationName: string
  #finishMicros: number | undefined
  readonly #onFinish: (span: MockSpan) => void

  readonly startMicros: number
  readonly parentId: string | undefined
  readonly references: readonly MockReference[]
  readonly tags: Map<string, TagValue>
  readonly logEntries: MockLogEntry[] = []

  constructor({
    operationName,
    context,
    startMicros,
    tags,
    references,
    parentId,
    onFinish,
  }: MockSpanInit) {
    this.#operationName = operationName
    this.#context = context
    this.startMicros = startMicros
    this.tags = new Map(tags)
    this.references = references
    this.parentId = parentId
    this.#onFinish = onFinish
  }

  get operationName(): string {
    return this.#operationName
  }

  get finishMicros(): number | undefined {
    return this.#finishMicros
  }

  get isFinished(): boolean {
    return this.#finishMicros !== undefined
  }

  context(): MockSpanContext {
    return this.#context
  }

  setTag(key: string, value: TagValue): this {
    this.tags.set(key, value)
    return this
  }

  log(
    fieldsOrEvent: SpanLogFields | string,
    timestampMicros: number = nowMicros(),
  ): this {
    this.logEntries.push({
      timestampMicros,
      fields:
        typeof fieldsOrEvent === 'string'
          ? { [LogFields.EVENT]: fieldsOrEvent }
          : fieldsOrEvent,
    })
    return this
  }

  setBaggageItem(key: string, value: string): this {
    this.#context = this.#context.withBaggageItem(key, value)
    return this
  }

  getBaggageItem(key: string): string | undefined {
    return this.#context.getBaggageItem(key)
  }

  setOperationName(operationName: string): this {
    this.#operationName = operationName
    return this
  }

  /** later calls are ignored */
  finish(finishMicros: number = nowMicros()): void {
    if (this.#finishMicros !== undefined) return
    this.#finishMicros = finishMicros
    this.#onFinish(this)
  }

  toString(): string {
    return `MockSpan{${this.#operationName}, ${String(this.#context)}}`
  }
}
