/**
 * SparseResolver — registries live in per-type arrays indexed by a slot
 * every resolver instance is given when it is constructed.
 *
 * Lookup is two array reads with no hashing, and instances stay isolated
 * from each other. The cost: each touched type keeps an array as wide as the
 * highest slot in use, and an instance that is never disposed keeps its
 * slots (and their registries) until the process exits.
 */

import {hardBrand, type MessageTypeId, type ResolverCount, type ResolverIndex} from "../brand.js";
import {ErrResolverDisposed, ErrResolverLimit} from "../errors/errors.js";
import {type AnyHandlerRegistry, expectRegistryFor, HandlerRegistry} from "../handler-registry.js";
import {Inspect} from "../inspect.js";
import {createLogger, type Logger} from "../logger.js";
import type {MessageDef} from "../message-def.js";
import {MessageTypeRegistry} from "../message-type-registry.js";
import type {Resolver} from "../resolver.js";
import {SparseSet} from "../sparse-set.js";

type Slots = (AnyHandlerRegistry | undefined)[];

export interface SlotLease {
  readonly count: ResolverCount;
  readonly index: ResolverIndex;
}

/**
 * The state every SparseResolver on the same pool shares.
 *
 * `resolverIndices` tracks live resolvers by their construction number.
 * Removing one moves the last member into the freed dense position, so a
 * survivor's dense position can change after it has cached its slot.
 * `heldSlots` records the slots actually owned by live resolvers; a new
 * resolver takes the dense position it was added at unless that slot is
 * still held, in which case it takes the lowest free one.
 *
 * Construction numbers index `resolverIndices` directly, so a pool can
 * construct at most `maxResolvers` instances over its lifetime.
 */
export class SparseResolverPool {
  private static instance: SparseResolverPool | undefined;

  /** The process-wide pool. */
  static get global(): SparseResolverPool {
    if (!this.instance) this.instance = new SparseResolverPool();
    return this.instance;
  }

  readonly resolverIndices: SparseSet;
  readonly types: MessageTypeRegistry;

  private readonly heldSlots = new SparseSet(1);
  private readonly slotsByType: (Slots | undefined)[] = [];
  private resolverCounter = 0;
  private readonly logger: Logger;

  static {
    Inspect(this, (self) => ({
      format: "SparseResolverPool(%d live, %d constructed, %d type(s))",
      params: [self.liveResolvers, self.constructed, self.slotsByType.length],
    }));
  }

  constructor(opts: { types?: MessageTypeRegistry; logger?: Logger; maxResolvers?: number } = {}) {
    this.resolverIndices = new SparseSet(1, (opts.maxResolvers ?? SparseSet.MAX_VALUE + 1) - 1);
    this.types = opts.types ?? MessageTypeRegistry.global;
    this.logger = opts.logger ?? createLogger("sparse-pool");
  }

  /** Number of resolvers constructed on this pool so far. */
  get constructed(): number {
    return this.resolverCounter;
  }

  /** Number of resolvers constructed and not yet disposed. */
  get liveResolvers(): number {
    return this.resolverIndices.size;
  }

  /** Claim a construction number and a slot for a new resolver. */
  acquire(): SlotLease {
    if (this.resolverCounter > this.resolverIndices.maxValue) {
      throw ErrResolverLimit.create({limit: this.resolverIndices.maxValue + 1});
    }
    const count = hardBrand<ResolverCount>(this.resolverCounter++);
    const capacityBefore = this.resolverIndices.capacity;
    const dense = this.resolverIndices.add(count);
    if (this.resolverIndices.capacity !== capacityBefore) {
      this.logger.debug("resolver index set grew", {from: capacityBefore, to: this.resolverIndices.capacity});
    }

    const index = hardBrand<ResolverIndex>(this.heldSlots.contains(dense) ? this.lowestFreeSlot() : dense);
    this.heldSlots.add(index);
    return {count, index};
  }

  /** Give a lease back. Its slot becomes available to the next resolver. */
  release(lease: SlotLease): void {
    this.resolverIndices.remove(lease.count);
    this.heldSlots.remove(lease.index);
  }

  /** Slots of one message type, widened to hold at least `index`. */
  slotsFor(typeId: MessageTypeId, index: ResolverIndex): Slots {
    let slots = this.slotsByType[typeId];
    if (!slots) {
      slots = [];
      this.slotsByType[typeId] = slots;
    }
    while (slots.length <= index) {
      slots.push(undefined);
    }
    return slots;
  }

  /** Empty one slot of one message type, dropping any subscriptions left in it. */
  clearSlot(typeId: MessageTypeId, index: ResolverIndex): void {
    const slots = this.slotsByType[typeId];
    const registry = slots?.[index];
    if (!slots || !registry) return;
    registry.clear();
    slots[index] = undefined;
  }

  /** Width of a message type's slot array. 0 for types no resolver touched. */
  slotCount(typeId: MessageTypeId): number {
    return this.slotsByType[typeId]?.length ?? 0;
  }

  private lowestFreeSlot(): number {
    let slot = 0;
    while (this.heldSlots.contains(slot)) slot++;
    return slot;
  }
}

/**
 * Resolves through the pool's per-type slot arrays at this instance's slot.
 * Call dispose() when done; see the module comment for what skipping it costs.
 */
export class SparseResolver implements Resolver {
  readonly kind = "sparse" as const;

  readonly pool: SparseResolverPool;
  private readonly lease: SlotLease;
  private readonly logger: Logger;
  /** One per message type this instance created a registry for. */
  private clearCallbacks: ((index: ResolverIndex) => void)[] = [];
  private disposed = false;

  static {
    Inspect(this, (self) => ({
      format: "SparseResolver(#%d @ slot %d%s)",
      params: [self.resolverCount, self.resolverIndex, self.isDisposed ? ", disposed" : ""],
    }));
  }

  constructor(opts: { pool?: SparseResolverPool; logger?: Logger } = {}) {
    this.pool = opts.pool ?? SparseResolverPool.global;
    this.logger = opts.logger ?? createLogger("sparse-resolver");
    this.lease = this.pool.acquire();
    this.logger.debug("resolver constructed", {resolverCount: this.lease.count, resolverIndex: this.lease.index});
  }

  /** Construction number of this instance within its pool. */
  get resolverCount(): ResolverCount {
    return this.lease.count;
  }

  /** The slot this instance owns in every per-type array. */
  get resolverIndex(): ResolverIndex {
    return this.lease.index;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getHandler<M>(def: MessageDef<M>): HandlerRegistry<M> {
    if (this.disposed) throw ErrResolverDisposed.create({kind: this.kind});

    const index = this.lease.index;
    const typeId = this.pool.types.identityOf(def);
    const slots = this.pool.slotsFor(typeId, index);
    const existing = slots[index];
    if (existing) return expectRegistryFor(existing, def);

    const created = new HandlerRegistry(def);
    slots[index] = created;
    this.clearCallbacks.push((i) => this.pool.clearSlot(typeId, i));
    this.logger.debug("registry created", {resolver: this.kind, messageType: def.name, typeId, resolverIndex: index});
    return created;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.pool.release(this.lease);
    const callbacks = this.clearCallbacks;
    this.clearCallbacks = [];
    for (const clear of callbacks) {
      clear(this.lease.index);
    }
    this.logger.debug("resolver disposed", {
      resolverCount: this.lease.count,
      resolverIndex: this.lease.index,
      typesCleared: callbacks.length,
    });
  }
}
