import process from 'node:process'
import pino, {type Logger} from 'pino'

export type {Logger} from 'pino'

/**
 * Structured JSON logger. The level defaults to `HOIST_LOG_LEVEL`, then `info`.
 */
export function createLogger(options?: {level?: string}): Logger {
  return pino({
    level: options?.level ?? process.env.HOIST_LOG_LEVEL ?? 'info',
    base: {name: 'hoist'}
  })
}
