import {type AnyHandlerRegistry, expectRegistryFor, HandlerRegistry} from "../handler-registry.js";
import {createLogger, type Logger} from "../logger.js";
import type {MessageDef} from "../message-def.js";
import {MessageTypeRegistry} from "../message-type-registry.js";
import type {Resolver} from "../resolver.js";

/**
 * One registry per message type, shared by every SharedResolver built on
 * the same store. Entries are never removed.
 */
export class SharedHandlerStore {
  private static instance: SharedHandlerStore | undefined

  /** The process-wide store. */
  static get global(): SharedHandlerStore {
    if (!this.instance) this.instance = new SharedHandlerStore()
    return this.instance
  }

  /** Registries indexed by message type identity. */
  private readonly handlers: (AnyHandlerRegistry | undefined)[] = []
  readonly types: MessageTypeRegistry
  private readonly logger: Logger

  constructor(opts: { types?: MessageTypeRegistry; logger?: Logger } = {}) {
    this.types = opts.types ?? MessageTypeRegistry.global
    this.logger = opts.logger ?? createLogger("shared-store")
  }

  handlerFor<M>(def: MessageDef<M>): HandlerRegistry<M> {
    const id = this.types.identityOf(def)
    const existing = this.handlers[id]
    if (existing) return expectRegistryFor(existing, def)

    const created = new HandlerRegistry(def)
    this.handlers[id] = created
    this.logger.debug("registry created", {resolver: "shared", messageType: def.name, typeId: id})
    return created
  }

  /** Number of message types with a shared registry. */
  get size(): number {
    return this.handlers.filter((h) => h !== undefined).length
  }
}

/**
 * Resolves every message type to its process-wide registry.
 *
 * Subscribing through any bus on this strategy is visible to every other
 * bus on the same store. Meant for cross-cutting events where isolation
 * is unwanted. Holds no state of its own.
 */
export class SharedResolver implements Resolver {
  readonly kind = "shared" as const

  readonly store: SharedHandlerStore

  constructor(opts: { store?: SharedHandlerStore } = {}) {
    this.store = opts.store ?? SharedHandlerStore.global
  }

  getHandler<M>(def: MessageDef<M>): HandlerRegistry<M> {
    return this.store.handlerFor(def)
  }

  dispose(): void {}
}
