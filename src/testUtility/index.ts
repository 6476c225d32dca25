export * from './MockSpan'
export * from './MockTracer'
export {
  BAGGAGE_KEY_PREFIX,
  BINARY_VERSION,
  SPAN_ID_KEY,
  TRACE_ID_KEY,
} from './mockPropagation'
