import {ErrInvalidConfig} from "./errors/errors.js";

export const RESOLVER_KINDS = ['map', 'sparse', 'shared'] as const
export type ResolverKind = typeof RESOLVER_KINDS[number]

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = typeof LOG_LEVELS[number]

type Env = Record<string, string | undefined>

export class BusConfig {
  readonly resolver: ResolverKind // Which strategy new buses resolve handlers with
  readonly logLevel: LogLevel

  constructor(opts: {
    resolver?: ResolverKind
    logLevel?: LogLevel
    env?: Env
  } = {}) {
    const env = opts.env ?? process.env

    this.resolver = opts.resolver ?? parseResolverKind(env.TYPEBUS_RESOLVER) ?? 'map'

    this.logLevel = opts.logLevel ?? parseLogLevel(env.TYPEBUS_LOG_LEVEL) ?? (env.NODE_ENV === 'test' ? 'silent' : 'info')
  }

  static fromEnv(env: Env = process.env): BusConfig {
    return new BusConfig({ env })
  }
}

export function isResolverKind(value: string): value is ResolverKind {
  return RESOLVER_KINDS.some((k) => k === value)
}

function parseResolverKind(raw: string | undefined): ResolverKind | undefined {
  if (raw === undefined || raw === '') return undefined
  const value = raw.trim().toLowerCase()
  if (!isResolverKind(value)) {
    throw ErrInvalidConfig.create({ option: 'TYPEBUS_RESOLVER', value: raw })
  }
  return value
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined || raw === '') return undefined
  const value = raw.trim().toLowerCase()
  const level = LOG_LEVELS.find((l) => l === value)
  if (!level) {
    throw ErrInvalidConfig.create({ option: 'TYPEBUS_LOG_LEVEL', value: raw })
  }
  return level
}
