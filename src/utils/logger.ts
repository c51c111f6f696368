/**
 * Structured logging for taskgate.
 *
 * Every module gets a named pino logger writing JSON to stderr, so stdout stays
 * reserved for command output (tables, NDJSON events, exported documents).
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

interface LoggerSettings {
  level: string
  pretty: boolean
}

/**
 * LOG_LEVEL wins; otherwise NODE_ENV picks between info (production),
 * debug (development) and warn (interactive CLI use).
 * LOG_PRETTY=true opts into pino-pretty, which is otherwise only used in development.
 */
export function resolveLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const level =
    env['LOG_LEVEL'] ??
    (env['NODE_ENV'] === 'production' ? 'info' : env['NODE_ENV'] === 'development' ? 'debug' : 'warn')
  const pretty = env['LOG_PRETTY'] !== undefined ? env['LOG_PRETTY'] === 'true' : env['NODE_ENV'] === 'development'
  return { level, pretty }
}

/**
 * Create a named logger.
 * @param name - module identifier, e.g. `gate-controller`
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const settings = resolveLoggerSettings()
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level: options.level ?? settings.level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  if (options.pretty ?? settings.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname', destination: 2 },
      },
    })
  }

  return pino(pinoOptions, pino.destination(2))
}

export const logger = createLogger('taskgate')

/** Bind task or gate context onto a module logger */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
