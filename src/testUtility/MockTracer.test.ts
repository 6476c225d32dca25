import { beforeEach, describe, expect, it } from 'vitest'
import { References } from '../constants'
import { InvalidArgumentError, UnsupportedOperationError } from '../errors'
import { Builtin, createBinaryCarrier, type Format } from '../Format'
import { NoopSpanContext } from '../NoopTracer'
import { TextMapExtractAdapter } from '../TextMapExtractAdapter'
import { TextMapInjectAdapter } from '../TextMapInjectAdapter'
import { MockSpanContext } from './MockSpan'
import { MockTracer } from './MockTracer'

describe('MockTracer', () => {
  let tracer: MockTracer

  beforeEach(() => {
    tracer = new MockTracer()
  })

  describe('building spans', () => {
    it('starts a root span with fresh trace and span ids', () => {
      const span = tracer
        .buildSpan('root')
        .withTag('component', 'test')
        .withStartTimestamp(1_000)
        .start()

      expect(span.operationName).toBe('root')
      expect(span.context().traceId).toBe('1')
      expect(span.context().spanId).toBe('2')
      expect(span.parentId).toBeUndefined()
      expect(span.startMicros).toBe(1_000)
      expect(span.tags.get('component')).toBe('test')
    })

    it('uses the active span as implicit parent', () => {
      const parent = tracer.buildSpan('parent').start()
      const scope = tracer.scopeManager().activate(parent, false)

      const child = tracer.buildSpan('child').start()
      scope.close()

      expect(child.parentId).toBe(parent.context().spanId)
      expect(child.context().traceId).toBe(parent.context().traceId)
      expect(child.references).toHaveLength(1)
      expect(child.references[0]?.type).toBe(References.CHILD_OF)
    })

    it('ignores the active span when asked to', () => {
      const scope = tracer.buildSpan('parent').startActive(true)

      const detached = tracer.buildSpan('detached').ignoreActiveSpan().start()
      scope.close()

      expect(detached.parentId).toBeUndefined()
      expect(detached.references).toEqual([])
    })

    it('prefers an explicit parent over the active span', () => {
      const explicitParent = tracer.buildSpan('explicit').start()
      const scope = tracer.buildSpan('active').startActive(false)

      const child = tracer.buildSpan('child').asChildOf(explicitParent).start()
      scope.close()

      expect(child.parentId).toBe(explicitParent.context().spanId)
    })

    it('treats an undefined parent as no reference', () => {
      const child = tracer.buildSpan('child').asChildOf(undefined).start()

      expect(child.references).toEqual([])
      expect(child.parentId).toBeUndefined()
    })

    it('takes a follows-from reference as parent when there is no child-of', () => {
      const previous = tracer.buildSpan('previous').start()

      const next = tracer
        .buildSpan('next')
        .addReference(References.FOLLOWS_FROM, previous.context())
        .start()

      expect(next.parentId).toBe(previous.context().spanId)
    })

    it('inherits baggage from its parent', () => {
      const parent = tracer.buildSpan('parent').start()
      parent.setBaggageItem('tenant', 'acme')

      const child = tracer.buildSpan('child').asChildOf(parent).start()

      expect(child.getBaggageItem('tenant')).toBe('acme')
    })

    it('starts an active scope that finishes the span on close', () => {
      const scope = tracer.buildSpan('active').startActive(true)

      expect(tracer.activeSpan()).toBe(scope.span())
      scope.close()

      expect(tracer.activeSpan()).toBeUndefined()
      expect(tracer.finishedSpans()).toHaveLength(1)
      expect(tracer.finishedSpans()[0]).toBe(scope.span())
    })

    it('uses the configured id generator', () => {
      let counter = 100
      const customTracer = new MockTracer({
        generateId: () => `id-${counter++}`,
      })

      const span = customTracer.buildSpan('custom').start()

      expect(span.context().traceId).toBe('id-100')
      expect(span.context().spanId).toBe('id-101')
    })
  })

  describe('spans', () => {
    it('record logs, tags and renames', () => {
      const span = tracer.buildSpan('work').start()

      span
        .setTag('retries', 3)
        .log('cache-miss', 5)
        .log({ message: 'loaded', rows: 2 }, 6)
        .setOperationName('renamed-work')

      expect(span.operationName).toBe('renamed-work')
      expect(span.tags.get('retries')).toBe(3)
      expect(span.logEntries).toEqual([
        { timestampMicros: 5, fields: { event: 'cache-miss' } },
        { timestampMicros: 6, fields: { message: 'loaded', rows: 2 } },
      ])
    })

    it('are recorded once, on the first finish', () => {
      const span = tracer.buildSpan('work').start()

      span.finish(10)
      span.finish(20)

      expect(span.finishMicros).toBe(10)
      expect(tracer.finishedSpans()).toHaveLength(1)
    })

    it('can be cleared', () => {
      tracer.buildSpan('work').start().finish()
      tracer.reset()

      expect(tracer.finishedSpans()).toEqual([])
    })
  })

  describe('TEXT_MAP propagation', () => {
    it('round-trips ids and baggage', () => {
      const span = tracer.buildSpan('client').start()
      span.setBaggageItem('user', 'alice smith')
      const carrier: Record<string, string> = {}

      tracer.inject(span.context(), Builtin.TEXT_MAP, new TextMapInjectAdapter(carrier))

      expect(carrier).toEqual({
        'trace-id': '1',
        'span-id': '2',
        'baggage-user': 'alice smith',
      })

      const extracted = tracer.extract(
        Builtin.TEXT_MAP,
        new TextMapExtractAdapter(carrier),
      )
      expect(extracted).toBeInstanceOf(MockSpanContext)
      if (!(extracted instanceof MockSpanContext)) return
      expect(extracted.traceId).toBe('1')
      expect(extracted.spanId).toBe('2')
      expect([...extracted.baggageItems()]).toEqual([['user', 'alice smith']])
    })

    it('extracts nothing from a carrier without context', () => {
      expect(
        tracer.extract(
          Builtin.TEXT_MAP,
          new TextMapExtractAdapter({ 'content-type': 'text/plain' }),
        ),
      ).toBeUndefined()
    })

    it('rejects a half-present context', () => {
      expect(() =>
        tracer.extract(
          Builtin.TEXT_MAP,
          new TextMapExtractAdapter({ 'trace-id': '42' }),
        ),
      ).toThrow(InvalidArgumentError)
    })

    it('refuses to inject span contexts it did not create', () => {
      expect(() =>
        tracer.inject(
          NoopSpanContext,
          Builtin.TEXT_MAP,
          new TextMapInjectAdapter({}),
        ),
      ).toThrow(UnsupportedOperationError)
    })
  })

  describe('HTTP_HEADERS propagation', () => {
    it('encodes baggage values and reads keys case-insensitively', () => {
      const span = tracer.buildSpan('client').start()
      span.setBaggageItem('note', 'a b/c')
      const headers: Record<string, string> = {}

      tracer.inject(
        span.context(),
        Builtin.HTTP_HEADERS,
        new TextMapInjectAdapter(headers),
      )
      expect(headers['baggage-note']).toBe('a%20b%2Fc')

      const extracted = tracer.extract(
        Builtin.HTTP_HEADERS,
        new TextMapExtractAdapter({
          'Trace-Id': headers['trace-id'] ?? '',
          'Span-Id': headers['span-id'] ?? '',
          'Baggage-note': headers['baggage-note'] ?? '',
        }),
      )
      expect(extracted).toBeInstanceOf(MockSpanContext)
      if (!(extracted instanceof MockSpanContext)) return
      expect(extracted.spanId).toBe('2')
      expect(extracted.getBaggageItem('note')).toBe('a b/c')
    })

    it('keeps the case of baggage keys', () => {
      const span = tracer.buildSpan('client').start()
      span.setBaggageItem('Tenant', 'acme')
      const headers: Record<string, string> = {}

      tracer.inject(
        span.context(),
        Builtin.HTTP_HEADERS,
        new TextMapInjectAdapter(headers),
      )
      expect(headers['baggage-Tenant']).toBe('acme')

      const extracted = tracer.extract(
        Builtin.HTTP_HEADERS,
        new TextMapExtractAdapter(headers),
      )
      expect(extracted).toBeInstanceOf(MockSpanContext)
      if (!(extracted instanceof MockSpanContext)) return
      expect(extracted.getBaggageItem('Tenant')).toBe('acme')
      expect(extracted.getBaggageItem('tenant')).toBeUndefined()
    })

    it('rejects malformed encoded values', () => {
      expect(() =>
        tracer.extract(
          Builtin.HTTP_HEADERS,
          new TextMapExtractAdapter({
            'trace-id': '1',
            'span-id': '2',
            'baggage-bad': '%E0%A4%A',
          }),
        ),
      ).toThrow(InvalidArgumentError)
    })
  })

  describe('BINARY propagation', () => {
    it('round-trips ids and baggage behind a version byte', () => {
      const span = tracer.buildSpan('producer').start()
      span.setBaggageItem('region', 'eu')
      const carrier = createBinaryCarrier()

      tracer.inject(span.context(), Builtin.BINARY, carrier)

      expect(carrier.buffer[0]).toBe(0x01)
      const extracted = tracer.extract(Builtin.BINARY, carrier)
      expect(extracted).toBeInstanceOf(MockSpanContext)
      if (!(extracted instanceof MockSpanContext)) return
      expect(extracted.traceId).toBe('1')
      expect(extracted.spanId).toBe('2')
      expect(extracted.getBaggageItem('region')).toBe('eu')
    })

    it('extracts nothing from an empty buffer', () => {
      expect(tracer.extract(Builtin.BINARY, createBinaryCarrier())).toBeUndefined()
    })

    it('rejects an unknown version', () => {
      expect(() =>
        tracer.extract(
          Builtin.BINARY,
          createBinaryCarrier(new Uint8Array([0x02, 0x7b, 0x7d])),
        ),
      ).toThrow('Unsupported binary span context version: 2')
    })

    it('rejects a corrupt body', () => {
      const garbage = new TextEncoder().encode('{not json')
      const buffer = new Uint8Array(garbage.length + 1)
      buffer[0] = 0x01
      buffer.set(garbage, 1)

      expect(() =>
        tracer.extract(Builtin.BINARY, createBinaryCarrier(buffer)),
      ).toThrow(InvalidArgumentError)
    })

    it('rejects a body that is not valid UTF-8', () => {
      const encoder = new TextEncoder()
      const buffer = new Uint8Array([
        0x01,
        ...encoder.encode('{"traceId":"'),
        0xff,
        0xfe,
        ...encoder.encode('","spanId":"2","baggage":{}}'),
      ])

      expect(() =>
        tracer.extract(Builtin.BINARY, createBinaryCarrier(buffer)),
      ).toThrow('Corrupt binary span context')
    })

    it('rejects a body with the wrong shape', () => {
      const body = new TextEncoder().encode(JSON.stringify({ traceId: '1' }))
      const buffer = new Uint8Array(body.length + 1)
      buffer[0] = 0x01
      buffer.set(body, 1)

      expect(() =>
        tracer.extract(Builtin.BINARY, createBinaryCarrier(buffer)),
      ).toThrow(InvalidArgumentError)
    })
  })

  it('rejects formats it does not know', () => {
    const custom: Format<Map<string, string>> = { name: 'CUSTOM' }

    expect(() => tracer.extract(custom, new Map())).toThrow(
      UnsupportedOperationError,
    )
  })
})
