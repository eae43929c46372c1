/**
 * MessageBus — the facade callers publish and subscribe through.
 *
 * Resolution goes through the bus's resolver under its mutex; dispatch then
 * runs on the returned registry outside it, so a callback may publish again.
 */

import {BusConfig} from "./config.js";
import {ErrBusDisposed, ErrInvalidMessage} from "./errors/errors.js";
import type {HandlerRegistry, MessageCallback} from "./handler-registry.js";
import {Inspect} from "./inspect.js";
import {createLogger, type Logger} from "./logger.js";
import type {MessageDef} from "./message-def.js";
import {Resolver, type ResolverDeps} from "./resolver.js";
import {SyncMutex} from "./sync-mutex.js";
import type {ClassOf} from "./type-system-utils.js";

export interface MessageBusOptions {
  /** Use this resolver instead of building one from config. The bus takes ownership. */
  readonly resolver?: Resolver
  /**
   * Resolver kind and log level. Without it both come from the environment,
   * and the bus logs through the shared root logger.
   */
  readonly config?: BusConfig
  readonly logger?: Logger
  /** Shared stores for the resolver built from config. */
  readonly deps?: Omit<ResolverDeps, "logger">
}

export class MessageBus {
  readonly resolver: Resolver

  private readonly mutex = new SyncMutex()
  private readonly logger: Logger
  private disposed = false

  static {
    Inspect(this, (self) => ({
      format: "MessageBus(%s%s)",
      params: [self.resolver.kind, self.disposed ? ", disposed" : ""],
    }))
  }

  constructor(opts: MessageBusOptions = {}) {
    this.logger = opts.logger ?? createLogger("bus", opts.config?.logLevel)
    if (opts.resolver) {
      this.resolver = opts.resolver
    } else {
      const kind = (opts.config ?? BusConfig.fromEnv()).resolver
      this.resolver = Resolver.create(kind, {...opts.deps, logger: this.logger})
    }
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  /** The registry of `def` on this bus, created on first use. */
  getHandler<M>(def: MessageDef<M>): HandlerRegistry<M> {
    this.ensureLive("resolve handlers")
    return this.mutex.runExclusive(() => this.resolver.getHandler(def))
  }

  /** Deliver to every subscriber of `def`. Returns how many callbacks ran. */
  publish<M>(def: MessageDef<M>, message: M): number {
    this.ensureLive("publish")
    this.validate(def, message)
    return this.getHandler(def).publish(message)
  }

  /** Deliver to subscribers whose target is an instance of `targetClass`. */
  publishToTargetType<M, T extends object>(def: MessageDef<M>, message: M, targetClass: ClassOf<T>): number {
    this.ensureLive("publish")
    this.validate(def, message)
    return this.getHandler(def).publishToTargetType(message, targetClass)
  }

  /** Deliver to subscribers registered on behalf of exactly `target`. */
  publishToTarget<M>(def: MessageDef<M>, message: M, target: object): number {
    this.ensureLive("publish")
    this.validate(def, message)
    return this.getHandler(def).publishToTarget(message, target)
  }

  /** Returns a function that undoes the subscription. */
  subscribe<M>(def: MessageDef<M>, callback: MessageCallback<M>, target?: object): () => boolean {
    this.ensureLive("subscribe")
    return this.getHandler(def).subscribe(callback, target)
  }

  unsubscribe<M>(def: MessageDef<M>, callback: MessageCallback<M>): boolean {
    this.ensureLive("unsubscribe")
    return this.getHandler(def).unsubscribe(callback)
  }

  /** Dispose the resolver. Later calls on this bus throw; calling dispose again does nothing. */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.resolver.dispose()
    this.logger.debug("bus disposed", {resolver: this.resolver.kind})
  }

  private ensureLive(operation: string): void {
    if (!this.disposed) return
    this.logger.warn("bus used after dispose", {operation, resolver: this.resolver.kind})
    throw ErrBusDisposed.create({operation})
  }

  private validate<M>(def: MessageDef<M>, message: M): void {
    if (def.validate && !def.validate(message)) {
      throw ErrInvalidMessage.create({messageType: def.name})
    }
  }
}
