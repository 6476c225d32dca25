import type { Span, TagValue } from './spanTypes'

abstract class AbstractTag<ValueT extends TagValue> {
  constructor(readonly key: string) {}

  set(span: Span, value: ValueT): Span {
    return span.setTag(this.key, value)
  }
}

export class StringTag extends AbstractTag<string> {}
export class NumberTag extends AbstractTag<number> {}
export class BooleanTag extends AbstractTag<boolean> {}
export class NumberOrStringTag extends AbstractTag<number | string> {}

/**
 * Standard span tags.
 *
 * @example
 * ```ts
 * Tags.SPAN_KIND.set(span, Tags.SPAN_KIND_SERVER)
 * Tags.HTTP_STATUS.set(span, 200)
 * ```
 */
export const Tags = {
  /** the server side of an RPC or other remote request */
  SPAN_KIND_SERVER: 'server',
  /** the client side of an RPC or other remote request */
  SPAN_KIND_CLIENT: 'client',
  /** the producer side of a message bus */
  SPAN_KIND_PRODUCER: 'producer',
  /** the consumer side of a message bus */
  SPAN_KIND_CONSUMER: 'consumer',

  SPAN_KIND: new StringTag('span.kind'),
  /** name of the service this span belongs to */
  SERVICE: new StringTag('service'),
  /** the software package, framework, library or module that generated the span */
  COMPONENT: new StringTag('component'),
  /** whether the span's operation failed */
  ERROR: new BooleanTag('error'),

  HTTP_URL: new StringTag('http.url'),
  HTTP_METHOD: new StringTag('http.method'),
  HTTP_STATUS: new NumberTag('http.status_code'),

  /** IPv4 as a string ("127.0.0.1") or packed into a number */
  PEER_HOST_IPV4: new NumberOrStringTag('peer.ipv4'),
  PEER_HOST_IPV6: new StringTag('peer.ipv6'),
  PEER_SERVICE: new StringTag('peer.service'),
  PEER_HOSTNAME: new StringTag('peer.hostname'),
  PEER_PORT: new NumberTag('peer.port'),

  /** a hint to the tracer: > 0 asks for the trace to be kept, 0 for it to be dropped */
  SAMPLING_PRIORITY: new NumberTag('sampling.priority'),

  DB_TYPE: new StringTag('db.type'),
  DB_INSTANCE: new StringTag('db.instance'),
  DB_USER: new StringTag('db.user'),
  DB_STATEMENT: new StringTag('db.statement'),

  /** the topic, queue or exchange a message was sent to or received from */
  MESSAGE_BUS_DESTINATION: new StringTag('message_bus.destination'),
} as const
