import type { Subscription } from 'rxjs'
import type { AsyncLocalScopeManager } from './AsyncLocalScopeManager'
import type {
  RegistrationRejectedEvent,
  ScopeActivatedEvent,
  ScopeCloseIgnoredEvent,
  ScopeClosedEvent,
  TracerRegisteredEvent,
} from './eventTypes'
import type { GlobalTracerRegistry } from './GlobalTracer'
import type { Scope } from './types'

// --- Basic ANSI Color Codes ---
const RESET = '\u001B[0m'
const YELLOW = '\u001B[33m' // Registry
const CYAN = '\u001B[36m' // Activation
const GREEN = '\u001B[32m' // Close
const RED = '\u001B[31m' // Misuse, conflicts
const GRAY = '\u001B[90m' // Verbose details

type SimpleLoggerFn = (message: string) => void

interface ConsoleLike {
  log: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
}

/**
 * Options for configuring the ConsoleTracerLogger
 */
export interface ConsoleTracerLoggerOptions {
  /**
   * The logging mechanism. Can be a console-like object (supporting .log and .warn)
   * or a simple function that accepts a string message.
   * Defaults to the global `console` object.
   */
  logger?: ConsoleLike | SimpleLoggerFn
  /**
   * Whether to also log every activation and close, not just registry changes and misuse.
   * Defaults to false.
   */
  verbose?: boolean
  /**
   * Prefix added to all log messages.
   * Defaults to '[scopetrace]'.
   */
  prefix?: string
  /**
   * Enable ANSI color codes in the output.
   * Only effective if the logger is a console-like object.
   * Defaults to true.
   */
  enableColors?: boolean
}

export interface ConsoleTracerLoggerSources {
  registry?: GlobalTracerRegistry
  scopeManager?: AsyncLocalScopeManager
}

const describeScope = (scope: Scope | undefined): string =>
  scope ? String(scope.span()) : '<none>'

/**
 * Logs registry transitions and scope lifecycle events to the console, or to a custom logger.
 */
export function createConsoleTracerLogger(
  { registry, scopeManager }: ConsoleTracerLoggerSources,
  optionsInput: ConsoleTracerLoggerOptions = {},
) {
  let options: Required<ConsoleTracerLoggerOptions> = {
    logger: console,
    verbose: false,
    prefix: '[scopetrace]',
    enableColors: true,
    ...optionsInput,
  }

  const subscriptions: Subscription[] = []

  const colorize = (str: string, color: string): string =>
    options.enableColors && typeof options.logger !== 'function'
      ? `${color}${str}${RESET}`
      : str

  const log = (message: string, level: 'log' | 'warn' = 'log') => {
    const fullMessage = `${options.prefix} ${message}`
    const { logger } = options
    if (typeof logger === 'function') {
      logger(fullMessage)
      return
    }
    logger[level](fullMessage)
  }

  // Event handlers
  // --------------

  const handleTracerRegistered = ({ tracer }: TracerRegisteredEvent) => {
    log(`${colorize('Global tracer registered', YELLOW)}: ${String(tracer)}`)
  }

  const handleRegistrationRejected = ({
    registered,
    rejected,
  }: RegistrationRejectedEvent) => {
    log(
      `${colorize('Global tracer registration rejected', RED)}: ${String(
        rejected,
      )} (already registered: ${String(registered)})`,
      'warn',
    )
  }

  const handleScopeActivated = ({ scope, previous }: ScopeActivatedEvent) => {
    if (!options.verbose) return
    log(
      `${colorize('Activated', CYAN)} ${describeScope(scope)} ${colorize(
        `(previous: ${describeScope(previous)})`,
        GRAY,
      )}`,
    )
  }

  const handleScopeClosed = ({
    scope,
    restored,
    finishedSpan,
  }: ScopeClosedEvent) => {
    if (!options.verbose) return
    log(
      `${colorize('Closed', GREEN)} ${describeScope(scope)}${
        finishedSpan ? ' and finished its span' : ''
      } ${colorize(`(restored: ${describeScope(restored)})`, GRAY)}`,
    )
  }

  const handleScopeCloseIgnored = ({ scope, active }: ScopeCloseIgnoredEvent) => {
    log(
      `${colorize('Ignored out-of-order close', RED)} of ${describeScope(
        scope,
      )} (active: ${describeScope(active)})`,
      'warn',
    )
  }

  // Set up event subscriptions
  // --------------------------

  if (registry) {
    subscriptions.push(
      registry.when('tracer-registered').subscribe(handleTracerRegistered),
      registry
        .when('registration-rejected')
        .subscribe(handleRegistrationRejected),
    )
  }

  if (scopeManager) {
    subscriptions.push(
      scopeManager.when('scope-activated').subscribe(handleScopeActivated),
      scopeManager.when('scope-closed').subscribe(handleScopeClosed),
      scopeManager
        .when('scope-close-ignored')
        .subscribe(handleScopeCloseIgnored),
    )
  }

  return {
    setOptions: (newOptions: Partial<ConsoleTracerLoggerOptions>) => {
      options = { ...options, ...newOptions }
    },

    // Cleanup method to unsubscribe from all events
    cleanup: () => {
      subscriptions.forEach((subscription) => void subscription.unsubscribe())
      subscriptions.length = 0
    },
  }
}
