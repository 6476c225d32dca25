/** reference types a span builder understands */
export const References = {
  CHILD_OF: 'child_of',
  FOLLOWS_FROM: 'follows_from',
} as const

export type ReferenceType = (typeof References)[keyof typeof References]

/**
 * Well-known keys for the fields passed to `Span.log`.
 */
export const LogFields = {
  /** type or "kind" of an error, e.g. `Exception` or `OSError` */
  ERROR_KIND: 'error.kind',
  /** the actual Error instance */
  ERROR_OBJECT: 'error.object',
  /** stable identifier for a moment in the span's lifecycle */
  EVENT: 'event',
  /** concise, human-readable, one-line message */
  MESSAGE: 'message',
  /** stack trace in platform-conventional format */
  STACK: 'stack',
} as const

export const MICROS_PER_MILLISECOND = 1000
