/**
 * Logger interface accepted by services; defaults to a tagged console logger.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

/**
 * Console logger that prefixes every line with `[Pika][<scope>]`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[Pika][${scope}]`
  return {
    debug: (message, ...args) => {
      if (process.env.LOG_LEVEL === 'debug') console.debug(tag, message, ...args)
    },
    info: (message, ...args) => console.info(tag, message, ...args),
    warn: (message, ...args) => console.warn(tag, message, ...args),
    error: (message, ...args) => console.error(tag, message, ...args),
  }
}

/**
 * Logger that discards everything; handy for tests and quiet tooling.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
