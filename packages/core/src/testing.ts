/**
 * @typebus/core/testing — Stubs for exercising buses and resolvers.
 */

import type { Logger, LogMeta } from "./logger.js"

// -- recorder -----------------------------------------------------------------

export interface Recorder<M> {
  /** Subscribe this; every message it receives is appended to `calls`. */
  readonly callback: (message: M) => void
  readonly calls: M[]
}

export function recorder<M>(): Recorder<M> {
  const calls: M[] = []
  return { callback: (message) => { calls.push(message) }, calls }
}

// -- RecordingLogger ----------------------------------------------------------

export interface LogEntry {
  readonly level: "debug" | "info" | "warn" | "error"
  readonly message: string
  readonly meta?: LogMeta
}

/** A Logger that keeps what it is given instead of writing it anywhere. */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = []

  debug(message: string, meta?: LogMeta): void { this.entries.push({ level: "debug", message, meta }) }
  info(message: string, meta?: LogMeta): void { this.entries.push({ level: "info", message, meta }) }
  warn(message: string, meta?: LogMeta): void { this.entries.push({ level: "warn", message, meta }) }
  error(message: string, meta?: LogMeta): void { this.entries.push({ level: "error", message, meta }) }

  /** Messages logged at `level`, in order. */
  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message)
  }
}
