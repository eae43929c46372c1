/**
 * Resolver — locates or lazily creates the HandlerRegistry of a message type.
 *
 * Three strategies, interchangeable behind one interface:
 *   - map:    per-instance Map keyed by type identity. Only touched types cost memory.
 *   - sparse: per-type arrays indexed by a per-instance slot. No hashing; needs dispose().
 *   - shared: one registry per type for the whole process. No isolation at all.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {ResolverKind} from "./config.js";
import {ErrUnknownResolver} from "./errors/errors.js";
import type {HandlerRegistry} from "./handler-registry.js";
import type {Logger} from "./logger.js";
import type {MessageDef} from "./message-def.js";
import type {MessageTypeRegistry} from "./message-type-registry.js";
import {MapResolver} from "./resolvers/map-resolver.js";
import {SharedHandlerStore, SharedResolver} from "./resolvers/shared-resolver.js";
import {SparseResolver, SparseResolverPool} from "./resolvers/sparse-resolver.js";

export interface Resolver {
  readonly kind: ResolverKind

  /** The registry for `def`. Idempotent per (resolver, message type). */
  getHandler<M>(def: MessageDef<M>): HandlerRegistry<M>

  /** Release instance-scoped state. Safe to call more than once. */
  dispose(): void
}

/** Shared collaborators a resolver can be built against. All default to the process-wide ones. */
export interface ResolverDeps {
  readonly logger?: Logger
  /** Used by the map strategy. */
  readonly types?: MessageTypeRegistry
  /** Used by the sparse strategy. */
  readonly pool?: SparseResolverPool
  /** Used by the shared strategy. Registry creation is logged by the store, not the resolver. */
  readonly store?: SharedHandlerStore
}

export const Resolver = StaticTypeCompanion({
  /** Build a resolver by strategy name. Names come from config and argv, so any string is accepted. */
  create(kind: ResolverKind | (string & {}), deps: ResolverDeps = {}): Resolver {
    switch (kind) {
      case "map":
        return new MapResolver({types: deps.types, logger: deps.logger});
      case "sparse":
        return new SparseResolver({pool: deps.pool, logger: deps.logger});
      case "shared":
        return new SharedResolver({store: deps.store});
      default:
        throw ErrUnknownResolver.create({kind});
    }
  },
})
