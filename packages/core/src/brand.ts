/**
 * Branding utilities for type-safe nominal typing.
 *
 * Brands create distinct types from primitives without runtime overhead.
 * The bus uses them to keep the three integer spaces it juggles apart:
 * message type identities, resolver counters, and resolver slot indices.
 */

declare const HardBrandTag: unique symbol;

/**
 * HardBrand<U, Name> - A branded type that demands explicit construction.
 *
 * @example
 * type MessageTypeId = HardBrand<number, 'message-type-id'>;
 * const id: MessageTypeId = 3;                 // ❌ must go through the registry
 * const id = registry.identityOf(Ping);        // ✅
 */
export type HardBrand<U, Name extends string> = U & { [HardBrandTag]: Name, __t?: U };

/** Pulls the brand target U out of a hard brand */
type ExtractBrandTarget<T extends HardBrand<unknown, string>> = T extends HardBrand<infer U, string> ? U : never

/**
 * Helper to create a hard-branded value.
 * Only the owners of an integer space should call this.
 */
export function hardBrand<T extends HardBrand<unknown, string>>(value: ExtractBrandTarget<T>): T {
  return value as T;
}

/** Process-lifetime integer assigned to a message type on first use. Dense, from 0. */
export type MessageTypeId = HardBrand<number, "message-type-id">;

/** Monotonic count of sparse resolvers ever constructed in a pool. */
export type ResolverCount = HardBrand<number, "resolver-count">;

/** A sparse resolver's slot in every per-type handler array. Reused after disposal. */
export type ResolverIndex = HardBrand<number, "resolver-index">;
