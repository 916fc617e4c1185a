/**
 * Logger utility for Shipline
 *
 * One pino root per output style; every module logs through a child bound
 * to `module: <name>`. Levels come from LOG_LEVEL, then NODE_ENV.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

export interface LoggerOptions {
  level?: string
  pretty?: boolean
}

function defaultLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  switch (env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      // Plain CLI use: only warnings and errors reach the terminal
      return 'warn'
  }
}

function defaultPretty(env: NodeJS.ProcessEnv): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development' || env.NODE_ENV === 'test'
}

const roots = new Map<boolean, pino.Logger>()

function rootLogger(pretty: boolean): pino.Logger {
  const existing = roots.get(pretty)
  if (existing !== undefined) return existing

  const options: pino.LoggerOptions = {
    name: 'shipline',
    level: 'trace',
    redact: PINO_REDACT_PATHS,
    serializers: { err: pino.stdSerializers.err },
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }
  // pino-pretty is a devDependency; never loaded in production
  const root = pretty
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        },
      })
    : pino(options)
  roots.set(pretty, root)
  return root
}

/**
 * Create a named module logger.
 * @param name - Module identifier, logged as `module`
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? defaultLevel(process.env)
  const pretty = options.pretty ?? defaultPretty(process.env)
  return rootLogger(pretty).child({ module: name }, { level })
}

/** Root application logger */
export const logger = createLogger('shipline')

/** Bind per-issue or per-command context onto a module logger */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
