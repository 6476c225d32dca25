import { z } from 'zod'
import { InvalidArgumentError } from '../errors'
import type { BinaryCarrier, TextMap } from '../Format'
import { MockSpanContext } from './MockSpan'

export const TRACE_ID_KEY = 'trace-id'
export const SPAN_ID_KEY = 'span-id'
export const BAGGAGE_KEY_PREFIX = 'baggage-'
export const BINARY_VERSION = 0x01

export interface TextMapCodecOptions {
  /**
   * URI-encode baggage values, and match the id keys and the baggage prefix
   * case-insensitively. Baggage keys themselves keep their case.
   */
  urlEncoding: boolean
}

const decodeValue = (value: string, { urlEncoding }: TextMapCodecOptions) => {
  if (!urlEncoding) return value
  try {
    return decodeURIComponent(value)
  } catch (error) {
    throw new InvalidArgumentError(`Malformed baggage value: ${value}`, {
      cause: error,
    })
  }
}

export function injectTextMap(
  context: MockSpanContext,
  carrier: TextMap,
  options: TextMapCodecOptions,
): void {
  carrier.put(TRACE_ID_KEY, context.traceId)
  carrier.put(SPAN_ID_KEY, context.spanId)
  for (const [key, value] of context.baggageItems()) {
    carrier.put(
      `${BAGGAGE_KEY_PREFIX}${key}`,
      options.urlEncoding ? encodeURIComponent(value) : value,
    )
  }
}

/**
 * @returns undefined when neither id is present
 * @throws InvalidArgumentError when only one of the ids is present
 */
export function extractTextMap(
  carrier: TextMap,
  options: TextMapCodecOptions,
): MockSpanContext | undefined {
  let traceId: string | undefined
  let spanId: string | undefined
  const baggage = new Map<string, string>()

  for (const [key, value] of carrier) {
    const matchKey = options.urlEncoding ? key.toLowerCase() : key
    if (matchKey === TRACE_ID_KEY) {
      traceId = value
    } else if (matchKey === SPAN_ID_KEY) {
      spanId = value
    } else if (matchKey.startsWith(BAGGAGE_KEY_PREFIX)) {
      baggage.set(
        key.slice(BAGGAGE_KEY_PREFIX.length),
        decodeValue(value, options),
      )
    }
  }

  if (traceId === undefined && spanId === undefined) return undefined
  if (!traceId || !spanId) {
    throw new InvalidArgumentError(
      `Incomplete span context: both ${TRACE_ID_KEY} and ${SPAN_ID_KEY} are required`,
    )
  }
  return new MockSpanContext(traceId, spanId, baggage)
}

const binaryPayloadSchema = z.object({
  traceId: z.string().min(1),
  spanId: z.string().min(1),
  baggage: z.record(z.string()),
})

export function injectBinary(
  context: MockSpanContext,
  carrier: BinaryCarrier,
): void {
  const body = new TextEncoder().encode(
    JSON.stringify({
      traceId: context.traceId,
      spanId: context.spanId,
      baggage: Object.fromEntries(context.baggageItems()),
    }),
  )
  const buffer = new Uint8Array(body.length + 1)
  buffer[0] = BINARY_VERSION
  buffer.set(body, 1)
  // eslint-disable-next-line no-param-reassign
  carrier.buffer = buffer
}

/**
 * @returns undefined for an empty buffer
 * @throws InvalidArgumentError on an unknown version byte or a corrupt body
 */
export function extractBinary(
  carrier: BinaryCarrier,
): MockSpanContext | undefined {
  const { buffer } = carrier
  if (buffer.length === 0) return undefined
  if (buffer[0] !== BINARY_VERSION) {
    throw new InvalidArgumentError(
      `Unsupported binary span context version: ${buffer[0]}`,
    )
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(
      new TextDecoder('utf-8', { fatal: true }).decode(buffer.subarray(1)),
    )
  } catch (error) {
    throw new InvalidArgumentError('Corrupt binary span context', {
      cause: error,
    })
  }

  const result = binaryPayloadSchema.safeParse(decoded)
  if (!result.success) {
    throw new InvalidArgumentError(
      `Corrupt binary span context: ${result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    )
  }

  const { traceId, spanId, baggage } = result.data
  return new MockSpanContext(traceId, spanId, Object.entries(baggage))
}
