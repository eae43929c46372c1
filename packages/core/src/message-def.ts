/**
 * Message type descriptor.
 */

import {StaticTypeCompanion} from "./companion.js";
import {Inspect} from "./inspect.js";

/**
 * MessageDef<M> - The runtime handle for the message type M.
 *
 * Types are erased at runtime, so every message type is declared once as a
 * descriptor and passed wherever a type argument would go:
 *
 *   interface Ping { seq: number }
 *   const Ping = MessageDef.create<Ping>("Ping");
 *   bus.publish(Ping, { seq: 1 });
 *
 * Identity is object identity. Two descriptors with the same name are two
 * distinct message types.
 */
export interface MessageDef<M> {
  readonly name: string;

  /** Returns true when `value` is a well-formed M. Absent means "trust the compiler". */
  readonly validate?: (value: unknown) => value is M;

  /** Phantom carrier for M; never set. */
  readonly _message?: M;
}

export type MessageDefAny = MessageDef<unknown>;

/** Extract M from a MessageDef<M> */
export type MessageOf<D> = D extends MessageDef<infer M> ? M : never;

class MessageDefImpl<M> implements MessageDef<M> {
  static {
    Inspect(this, (self) => ({
      format: "MessageDef(%s)",
      params: [self.name],
    }));
  }

  constructor(
    readonly name: string,
    readonly validate?: (value: unknown) => value is M,
  ) {}
}

/** Static methods for creating MessageDefs */
export const MessageDef = StaticTypeCompanion({
  /** Declare a new message type */
  create<M>(name: string, opts?: { validate?: (value: unknown) => value is M }): MessageDef<M> {
    return Object.freeze(new MessageDefImpl<M>(name, opts?.validate));
  },

  isMessageDef(value: unknown): value is MessageDefAny {
    return value instanceof MessageDefImpl;
  },
})
