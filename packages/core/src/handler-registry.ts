/**
 * HandlerRegistry — the subscriptions of one message type, and their dispatch.
 *
 * Dispatch walks a snapshot taken when publishing starts. Subscribing or
 * unsubscribing from inside a callback is allowed: the change applies from
 * the next publish on.
 *
 * A throwing callback does not stop the fan-out. Once every callback has run,
 * the failures are rethrown together as `bus.handler_failed`.
 */

import type {ClassOf} from "./type-system-utils.js";
import type {MessageDef, MessageDefAny} from "./message-def.js";
import {BusError} from "./bus-error.js";
import {ErrHandlerFailed, ErrRegistryMismatch} from "./errors/errors.js";
import {Inspect} from "./inspect.js";

export type MessageCallback<M> = (message: M) => void;

export interface Subscription<M> {
  readonly callback: MessageCallback<M>;
  /** The object this callback acts for. Used by targeted publishes. */
  readonly target?: object;
}

/** The parts of a registry that do not depend on its message type. */
export interface AnyHandlerRegistry {
  readonly def: MessageDefAny;
  readonly size: number;
  clear(): void;
}

export class HandlerRegistry<M> implements AnyHandlerRegistry {
  /** Replaced, never mutated, so an in-flight publish keeps its view. */
  private subscriptions: readonly Subscription<M>[] = [];

  static {
    Inspect(this, (self) => ({
      format: "HandlerRegistry(%s, %d subscriber(s))",
      params: [self.def.name, self.size],
    }));
  }

  constructor(readonly def: MessageDef<M>) {}

  get size(): number {
    return this.subscriptions.length;
  }

  /**
   * Register a callback, optionally on behalf of a target object.
   * A callback that is already subscribed stays as it is.
   * Returns a function that removes the subscription.
   */
  subscribe(callback: MessageCallback<M>, target?: object): () => boolean {
    if (!this.isSubscribed(callback)) {
      this.subscriptions = [...this.subscriptions, target === undefined ? {callback} : {callback, target}];
    }
    return () => this.unsubscribe(callback);
  }

  /** Remove a callback. Returns false when it was not subscribed. */
  unsubscribe(callback: MessageCallback<M>): boolean {
    const next = this.subscriptions.filter((s) => s.callback !== callback);
    if (next.length === this.subscriptions.length) return false;
    this.subscriptions = next;
    return true;
  }

  isSubscribed(callback: MessageCallback<M>): boolean {
    return this.subscriptions.some((s) => s.callback === callback);
  }

  /** Deliver to every subscription. Returns how many callbacks ran. */
  publish(message: M): number {
    return this.dispatch(message, this.subscriptions);
  }

  /** Deliver only to subscriptions whose target is an instance of `targetClass`. */
  publishToTargetType<T extends object>(message: M, targetClass: ClassOf<T>): number {
    return this.dispatch(message, this.subscriptions.filter((s) => s.target instanceof targetClass));
  }

  /** Deliver only to subscriptions made on behalf of exactly `target`. */
  publishToTarget(message: M, target: object): number {
    return this.dispatch(message, this.subscriptions.filter((s) => s.target === target));
  }

  /** Drop every subscription. */
  clear(): void {
    this.subscriptions = [];
  }

  private dispatch(message: M, snapshot: readonly Subscription<M>[]): number {
    const failures: unknown[] = [];
    for (const sub of snapshot) {
      try {
        sub.callback(message);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw ErrHandlerFailed.create(
        {messageType: this.def.name, failures: failures.length},
        failures.map((f) => BusError.wrap(f)),
      );
    }
    return snapshot.length;
  }
}

/** Narrow a type-erased registry back to the message type it was created for. */
export function isRegistryFor<M>(registry: AnyHandlerRegistry, def: MessageDef<M>): registry is HandlerRegistry<M> {
  return registry instanceof HandlerRegistry && registry.def === def;
}

/**
 * Like isRegistryFor, but a mismatch is an invariant violation.
 * Every slot is keyed by the identity of the descriptor that created it, so
 * this only fails if two type registries were mixed over the same storage.
 */
export function expectRegistryFor<M>(registry: AnyHandlerRegistry, def: MessageDef<M>): HandlerRegistry<M> {
  if (isRegistryFor(registry, def)) return registry;
  throw ErrRegistryMismatch.create({messageType: def.name, found: registry.def.name});
}
