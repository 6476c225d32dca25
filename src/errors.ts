/**
 * Thrown when a carrier is used in a direction it does not support,
 * e.g. writing to an extract-only adapter, or when a tracer is handed
 * a propagation format it does not implement.
 */
export class UnsupportedOperationError extends Error {
  override name = 'UnsupportedOperationError'
}

/**
 * Thrown by the global registry when it is asked to do something its
 * current state forbids, such as replacing an already registered tracer.
 */
export class IllegalStateError extends Error {
  override name = 'IllegalStateError'
}

/**
 * Thrown by `Tracer.extract` when propagated state is present in the carrier
 * but can not be read (unknown version, corrupt payload, half a context).
 * Missing state is not an error: extract returns `undefined` instead.
 */
export class InvalidArgumentError extends Error {
  override name = 'InvalidArgumentError'
}
