import type { Scope, Tracer } from './types'

export interface ScopeActivatedEvent {
  scope: Scope
  /** the scope that was active before, and will be restored when `scope` closes */
  previous: Scope | undefined
}

export interface ScopeClosedEvent {
  scope: Scope
  restored: Scope | undefined
  finishedSpan: boolean
}

/** a scope was closed while another one was active in its context */
export interface ScopeCloseIgnoredEvent {
  scope: Scope
  active: Scope | undefined
}

export interface ScopeManagerEvents {
  'scope-activated': ScopeActivatedEvent
  'scope-closed': ScopeClosedEvent
  'scope-close-ignored': ScopeCloseIgnoredEvent
}

export interface TracerRegisteredEvent {
  tracer: Tracer
}

/** `register()` was called with a tracer that differs from the registered one */
export interface RegistrationRejectedEvent {
  registered: Tracer
  rejected: Tracer
}

export interface RegistryEvents {
  'tracer-registered': TracerRegisteredEvent
  'registration-rejected': RegistrationRejectedEvent
}
