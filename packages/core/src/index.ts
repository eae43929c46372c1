/**
 * @typebus/core - In-process typed message bus
 */

// Branding utilities
export { hardBrand } from "./brand.js";
export type { HardBrand, MessageTypeId, ResolverCount, ResolverIndex } from "./brand.js";

// Type-level utilities
export { StaticTypeCompanion } from "./companion.js";
export type { ClassOf } from "./type-system-utils.js";
export { Inspect } from "./inspect.js";

// Message types
export { MessageDef } from "./message-def.js";
export type { MessageDefAny, MessageOf } from "./message-def.js";
export { MessageTypeRegistry } from "./message-type-registry.js";

// Sparse set
export { SparseSet, ABSENT } from "./sparse-set.js";

// Handler registries
export { HandlerRegistry, isRegistryFor, expectRegistryFor } from "./handler-registry.js";
export type { MessageCallback, Subscription, AnyHandlerRegistry } from "./handler-registry.js";

// Resolvers
export { Resolver } from "./resolver.js";
export type { ResolverDeps } from "./resolver.js";
export { MapResolver } from "./resolvers/map-resolver.js";
export { SparseResolver, SparseResolverPool } from "./resolvers/sparse-resolver.js";
export type { SlotLease } from "./resolvers/sparse-resolver.js";
export { SharedResolver, SharedHandlerStore } from "./resolvers/shared-resolver.js";

// Bus
export { MessageBus } from "./message-bus.js";
export type { MessageBusOptions } from "./message-bus.js";
export { SyncMutex } from "./sync-mutex.js";

// Configuration & logging
export { BusConfig, RESOLVER_KINDS, LOG_LEVELS, isResolverKind } from "./config.js";
export type { ResolverKind, LogLevel } from "./config.js";
export { PinoLogger, createLogger } from "./logger.js";
export type { Logger, LogMeta } from "./logger.js";

// Errors
export { BusError, ErrFacet } from "./bus-error.js";
export type {
  ErrorDef,
  ErrorBoundary,
  ErrorData,
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
} from "./bus-error.js";
export * as Errors from "./errors/errors.js";
