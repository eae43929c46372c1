/**
 * Standard facets and domain-owned error definitions for the bus boundary.
 *
 * The CLI maps BadInput to a usage exit code; the rest are failures.
 */

import {ErrFacet, BusError} from "../bus-error.js";

// ============================================================================
// Bus Boundary
// ============================================================================

export const Bus = BusError.boundary("bus");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal invariant violated, or an object used outside its lifetime */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Carries the name of the message type involved */
export const HasMessageType = ErrFacet.data<{ messageType: string }>("HasMessageType");

// ============================================================================
// Standard Error Definitions
// ============================================================================

/** getHandler called on a resolver after dispose() */
export const ErrResolverDisposed = Bus.define("resolver_disposed", {
  customProps: ErrFacet.props<{ kind: string }>(),
  facets: [InvariantViolated],
  message: (d) => `${d.kind} resolver used after dispose`,
});

/** A sparse resolver pool has handed out every construction number it can track */
export const ErrResolverLimit = Bus.define("resolver_limit", {
  customProps: ErrFacet.props<{ limit: number }>(),
  facets: [],
  message: (d) => `Sparse resolver pool exhausted after ${d.limit} resolvers`,
});

/** Any bus operation after dispose() */
export const ErrBusDisposed = Bus.define("bus_disposed", {
  customProps: ErrFacet.props<{ operation: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Cannot ${d.operation}: bus has been disposed`,
});

/** One or more callbacks threw while a message was being dispatched. Each failure is a cause. */
export const ErrHandlerFailed = Bus.define("handler_failed", {
  customProps: ErrFacet.props<{ failures: number }>(),
  facets: [HasMessageType],
  message: (d) => `${d.failures} handler(s) failed while dispatching ${d.messageType}`,
});

/** Published value rejected by the message type's guard */
export const ErrInvalidMessage = Bus.define("invalid_message", {
  facets: [BadInput, HasMessageType],
  message: (d) => `Value is not a valid ${d.messageType} message`,
});

/** A resolver slot holds a registry created for another message type */
export const ErrRegistryMismatch = Bus.define("registry_mismatch", {
  customProps: ErrFacet.props<{ found: string }>(),
  facets: [InvariantViolated, HasMessageType],
  message: (d) => `Registry for ${d.messageType} resolved to one owned by ${d.found}`,
});

/** SyncMutex entered while already held */
export const ErrReentrantResolution = Bus.define("reentrant_resolution", {
  facets: [InvariantViolated],
  message: () => "Handler resolution re-entered while already in progress",
});

/** Resolver.create called with a kind it does not know */
export const ErrUnknownResolver = Bus.define("unknown_resolver", {
  customProps: ErrFacet.props<{ kind: string }>(),
  facets: [BadInput, NotFound],
  message: (d) => `Unknown resolver kind: ${d.kind}`,
});

/** A BusConfig option or environment variable has an unusable value */
export const ErrInvalidConfig = Bus.define("invalid_config", {
  customProps: ErrFacet.props<{ option: string; value: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid value for ${d.option}: "${d.value}"`,
});
