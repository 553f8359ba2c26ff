import pino from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

/**
 * Observability - structured logging via Pino
 *
 * The mapper only ever logs: nothing here feeds back into control flow.
 */

export interface LoggerOptions {
  level?: LevelWithSilent
  pretty?: boolean
}

/**
 * Create a root logger with optional pretty printing for dev
 */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: options?.level || 'info',
    ...(options?.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Observability singleton - global logger
 */
export class Observability {
  private static instance: Observability

  public logger: Logger

  private constructor(options?: LoggerOptions) {
    this.logger = createLogger(options)
  }

  static getInstance(options?: LoggerOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  /**
   * Create a child logger tagged with a component name and context
   */
  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }
}

/**
 * Global logger instance
 */
export const obs = Observability.getInstance()
export const logger = obs.logger
