export * from './AsyncLocalScope'
export * from './AsyncLocalScopeManager'
export * from './ConsoleTracerLogger'
export * from './constants'
export * from './errors'
export type * from './eventTypes'
export * from './Format'
export * from './ForwardingTracer'
export * from './GlobalTracer'
export * from './NoopTracer'
export * from './spanTypes'
export * from './tags'
export * from './TextMapExtractAdapter'
export * from './TextMapInjectAdapter'
export type * from './types'
export * from './withActiveSpan'
