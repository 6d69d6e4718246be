export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

/**
 * Writes `[scope] message` lines through `console`. Debug output is off
 * unless `debug: true` is passed.
 */
export function consoleLogger(
  scope = 'chat',
  options: { debug?: boolean } = {},
): Logger {
  const prefix = `[${scope}]`
  const write =
    (fn: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext) => {
      if (context) fn(prefix, message, context)
      else fn(prefix, message)
    }

  return {
    debug: options.debug ? write(console.debug) : () => {},
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

/** Flatten an unknown thrown value into something loggable. */
export function describeError(err: unknown): LogContext {
  if (err instanceof Error) {
    return 'code' in err && typeof err.code === 'string'
      ? { error: err.message, code: err.code }
      : { error: err.message }
  }
  return { error: String(err) }
}
