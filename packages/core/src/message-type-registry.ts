/**
 * MessageTypeRegistry — assigns each message type a dense integer identity.
 *
 * The identity is handed out the first time any code path asks for it,
 * counting up from zero, and never changes or gets reused for the lifetime of
 * the registry. Resolvers use it as an array index or map key.
 *
 * Most code uses `MessageTypeRegistry.global`. Tests and embedders that want
 * isolated numbering construct their own and pass it to the resolvers.
 */

import {hardBrand, type MessageTypeId} from "./brand.js";
import type {MessageDefAny} from "./message-def.js";

export class MessageTypeRegistry {
  /** The process-wide registry. */
  static readonly global = new MessageTypeRegistry()

  private readonly ids = new Map<MessageDefAny, MessageTypeId>()
  private readonly defs: MessageDefAny[] = []

  /** Identity of `def`, allocating the next one on first use. */
  identityOf(def: MessageDefAny): MessageTypeId {
    const existing = this.ids.get(def)
    if (existing !== undefined) return existing
    const id = hardBrand<MessageTypeId>(this.defs.length)
    this.ids.set(def, id)
    this.defs.push(def)
    return id
  }

  /** True once `def` has been assigned an identity. Does not allocate. */
  has(def: MessageDefAny): boolean {
    return this.ids.has(def)
  }

  /** The descriptor that owns `id`, if any. */
  defOf(id: MessageTypeId): MessageDefAny | undefined {
    return this.defs[id]
  }

  /** Number of identities handed out so far. */
  get size(): number {
    return this.defs.length
  }

  /** Message type names, indexed by identity. */
  names(): string[] {
    return this.defs.map((d) => d.name)
  }
}
