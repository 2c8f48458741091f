/**
 * Logger Utility
 *
 * pino with pretty-print in development, silent under the test runner
 * unless LOG_LEVEL asks otherwise.
 */

import { pino, type Logger } from 'pino'

const isDev = process.env.NODE_ENV !== 'production'
const isTest = process.env.VITEST !== undefined

const level = process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info')

/**
 * Base logger instance
 */
const baseLogger = pino({
  level,
  transport:
    isDev && level !== 'silent'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return baseLogger.child({ component, ...bindings })
}
