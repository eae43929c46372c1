/**
 * Workloads behind the CLI commands. Pure apart from the clock, so they can
 * be driven from tests with isolated pools and stores.
 */

import {
  createLogger,
  type Logger,
  MessageBus,
  MessageDef,
  Resolver,
  type ResolverDeps,
  type ResolverKind,
  SparseResolver,
  SparseResolverPool,
} from "@typebus/core";

export interface BenchMessage {
  seq: number
}

export interface BenchOptions {
  /** Distinct message types to publish. */
  types: number
  /** Rounds; each round publishes once per type. */
  iterations: number
  /** Callbacks subscribed to every type. */
  subscribers: number
  now?: () => number
}

export interface BenchResult {
  resolver: ResolverKind
  types: number
  publishes: number
  deliveries: number
  elapsedMs: number
  publishesPerSec: number
}

export function runBenchmark(kind: ResolverKind, opts: BenchOptions, deps: ResolverDeps = {}): BenchResult {
  const now = opts.now ?? (() => performance.now())
  const logger = deps.logger ?? createLogger("bench")
  const defs = Array.from({length: opts.types}, (_, i) => MessageDef.create<BenchMessage>(`Bench${i}`))
  const bus = new MessageBus({resolver: Resolver.create(kind, {...deps, logger}), logger})

  let sink = 0
  const unsubscribes: (() => boolean)[] = []
  try {
    for (const def of defs) {
      for (let s = 0; s < opts.subscribers; s++) {
        unsubscribes.push(bus.subscribe(def, (m) => { sink += m.seq }))
      }
    }

    let deliveries = 0
    const start = now()
    for (let i = 0; i < opts.iterations; i++) {
      for (const def of defs) {
        deliveries += bus.publish(def, {seq: i})
      }
    }
    const elapsedMs = now() - start
    unsubscribes.forEach((off) => off())

    const publishes = opts.iterations * opts.types
    logger.debug("benchmark finished", {resolver: kind, publishes, deliveries, sink})
    return {
      resolver: kind,
      types: opts.types,
      publishes,
      deliveries,
      elapsedMs,
      publishesPerSec: elapsedMs > 0 ? Math.round(publishes / (elapsedMs / 1000)) : 0,
    }
  } finally {
    bus.dispose()
  }
}

export interface ChurnOptions {
  /** Sparse resolvers to construct in total. */
  resolvers: number
  /** Message types each resolver touches. */
  types: number
  /** Resolvers kept alive at once; past this the oldest is disposed. */
  live?: number
}

export interface ChurnResult {
  constructed: number
  types: number
  survivors: number
  highestIndex: number
  staleRegistries: number
  leaked: boolean
}

/**
 * Construct, touch and dispose sparse resolvers through a sliding window.
 *
 * Disposing the oldest live resolver moves the newest one in the pool's
 * index set, which is the case that could hand a new resolver a slot that
 * is still in use. A registry that already has subscribers when a new
 * resolver first resolves it, or a survivor whose registries do not hold
 * exactly its own subscription, counts as stale.
 */
export function runChurn(opts: ChurnOptions, deps: { pool?: SparseResolverPool; logger?: Logger } = {}): ChurnResult {
  const logger = deps.logger ?? createLogger("churn")
  const pool = deps.pool ?? new SparseResolverPool({logger})
  const window = opts.live ?? 4
  const defs = Array.from({length: opts.types}, (_, i) => MessageDef.create<BenchMessage>(`Churn${i}`))

  const live: SparseResolver[] = []
  let highestIndex = 0
  let staleRegistries = 0

  for (let i = 0; i < opts.resolvers; i++) {
    const resolver = new SparseResolver({pool, logger})
    highestIndex = Math.max(highestIndex, resolver.resolverIndex)
    for (const def of defs) {
      const handler = resolver.getHandler(def)
      if (handler.size !== 0) staleRegistries++
      handler.subscribe(() => {})
    }
    live.push(resolver)
    if (live.length > window) live.shift()?.dispose()
  }

  for (const resolver of live) {
    for (const def of defs) {
      if (resolver.getHandler(def).size !== 1) staleRegistries++
    }
  }
  const survivors = pool.liveResolvers
  live.forEach((r) => r.dispose())

  logger.debug("churn finished", {constructed: opts.resolvers, survivors, highestIndex, staleRegistries})
  return {
    constructed: opts.resolvers,
    types: opts.types,
    survivors,
    highestIndex,
    staleRegistries,
    leaked: staleRegistries > 0,
  }
}
