import type {MessageTypeId} from "../brand.js";
import {type AnyHandlerRegistry, expectRegistryFor, HandlerRegistry} from "../handler-registry.js";
import {createLogger, type Logger} from "../logger.js";
import type {MessageDef} from "../message-def.js";
import {MessageTypeRegistry} from "../message-type-registry.js";
import type {Resolver} from "../resolver.js";

/**
 * Resolves through a per-instance Map keyed by message type identity.
 *
 * Optimized for space: only types that were actually published or
 * subscribed to hold an entry. Entries live as long as the resolver.
 */
export class MapResolver implements Resolver {
  readonly kind = "map" as const

  private readonly handlers = new Map<MessageTypeId, AnyHandlerRegistry>()
  private readonly types: MessageTypeRegistry
  private readonly logger: Logger

  constructor(opts: { types?: MessageTypeRegistry; logger?: Logger } = {}) {
    this.types = opts.types ?? MessageTypeRegistry.global
    this.logger = opts.logger ?? createLogger("map-resolver")
  }

  getHandler<M>(def: MessageDef<M>): HandlerRegistry<M> {
    const id = this.types.identityOf(def)
    const existing = this.handlers.get(id)
    if (existing) return expectRegistryFor(existing, def)

    const created = new HandlerRegistry(def)
    this.handlers.set(id, created)
    this.logger.debug("registry created", {resolver: this.kind, messageType: def.name, typeId: id})
    return created
  }

  /** Number of message types this resolver has a registry for. */
  get size(): number {
    return this.handlers.size
  }

  /** Nothing is shared, so there is nothing to release. */
  dispose(): void {}
}
