import pino from 'pino'
import { BusConfig, type LogLevel } from './config.js'

export type LogMeta = Record<string, unknown>

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

export class PinoLogger implements Logger {
  private static rootLogger: pino.Logger | undefined
  private static readonly rootsByLevel = new Map<LogLevel, pino.Logger>()
  private static destination: pino.DestinationStream | undefined
  private readonly logger: pino.Logger

  constructor(name: string, parent?: pino.Logger) {
    this.logger = (parent ?? PinoLogger.root()).child({ name })
  }

  /** The shared root, created on first use at the environment's level. */
  static root(): pino.Logger {
    if (!this.rootLogger) {
      this.rootLogger = this.build(BusConfig.fromEnv().logLevel)
    }
    return this.rootLogger
  }

  /** A root fixed at `level`, shared by every logger that asks for that level. */
  static rootAt(level: LogLevel): pino.Logger {
    let logger = this.rootsByLevel.get(level)
    if (!logger) {
      logger = this.build(level)
      this.rootsByLevel.set(level, logger)
    }
    return logger
  }

  /**
   * Replace the shared root, optionally writing somewhere other than stdout.
   * Loggers created after this call use the new level and destination.
   */
  static configure(level: LogLevel, destination?: pino.DestinationStream): void {
    this.destination = destination
    this.rootsByLevel.clear()
    this.rootLogger = this.build(level)
  }

  private static build(level: LogLevel): pino.Logger {
    return this.destination ? pino({ level }, this.destination) : pino({ level })
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(meta ?? {}, message)
  }
}

/** A named child of the shared root, or of a root at `level` when one is given. */
export function createLogger(name: string, level?: LogLevel): Logger {
  return new PinoLogger(name, level === undefined ? undefined : PinoLogger.rootAt(level))
}
