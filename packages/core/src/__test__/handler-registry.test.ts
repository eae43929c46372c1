import { describe, test, expect } from "vitest"
import { inspect } from "node:util"
import { BusError } from "../bus-error.js"
import { ErrHandlerFailed, ErrRegistryMismatch } from "../errors/errors.js"
import { expectRegistryFor, HandlerRegistry, isRegistryFor } from "../handler-registry.js"
import { MessageDef } from "../message-def.js"
import { recorder } from "../testing.js"

interface Ping { seq: number }
const Ping = MessageDef.create<Ping>("Ping")

class Widget {}
class Button extends Widget {}
class Panel {}

describe("HandlerRegistry.subscribe / unsubscribe", () => {
  test("subscribe registers, the returned function removes", () => {
    const registry = new HandlerRegistry(Ping)
    const rec = recorder<Ping>()

    const off = registry.subscribe(rec.callback)
    expect(registry.isSubscribed(rec.callback)).toBe(true)
    expect(registry.size).toBe(1)

    expect(off()).toBe(true)
    expect(registry.size).toBe(0)
    expect(off()).toBe(false)
  })

  test("subscribing twice is a no-op", () => {
    const registry = new HandlerRegistry(Ping)
    const rec = recorder<Ping>()
    registry.subscribe(rec.callback)
    registry.subscribe(rec.callback)

    expect(registry.size).toBe(1)
    expect(registry.publish({ seq: 1 })).toBe(1)
    expect(rec.calls).toEqual([{ seq: 1 }])
  })

  test("unsubscribe of an unknown callback returns false", () => {
    const registry = new HandlerRegistry(Ping)
    expect(registry.unsubscribe(() => {})).toBe(false)
  })
})

describe("HandlerRegistry.publish", () => {
  test("invokes callbacks in registration order and returns the count", () => {
    const registry = new HandlerRegistry(Ping)
    const order: string[] = []
    registry.subscribe(() => order.push("a"))
    registry.subscribe(() => order.push("b"))
    registry.subscribe(() => order.push("c"))

    expect(registry.publish({ seq: 1 })).toBe(3)
    expect(order).toEqual(["a", "b", "c"])
  })

  test("no subscribers returns 0", () => {
    expect(new HandlerRegistry(Ping).publish({ seq: 1 })).toBe(0)
  })

  test("a callback added during dispatch runs from the next publish", () => {
    const registry = new HandlerRegistry(Ping)
    const late = recorder<Ping>()
    registry.subscribe(() => { registry.subscribe(late.callback) })

    expect(registry.publish({ seq: 1 })).toBe(1)
    expect(late.calls).toEqual([])

    expect(registry.publish({ seq: 2 })).toBe(2)
    expect(late.calls).toEqual([{ seq: 2 }])
  })

  test("a callback removed during dispatch still runs in that dispatch", () => {
    const registry = new HandlerRegistry(Ping)
    const second = recorder<Ping>()
    registry.subscribe(() => { registry.unsubscribe(second.callback) })
    registry.subscribe(second.callback)

    expect(registry.publish({ seq: 1 })).toBe(2)
    expect(second.calls).toEqual([{ seq: 1 }])
    expect(registry.publish({ seq: 2 })).toBe(1)
    expect(second.calls).toEqual([{ seq: 1 }])
  })

  test("a throwing callback does not stop the others", () => {
    const registry = new HandlerRegistry(Ping)
    const after = recorder<Ping>()
    registry.subscribe(() => { throw new Error("first") })
    registry.subscribe(() => { throw new Error("second") })
    registry.subscribe(after.callback)

    let caught: unknown
    try {
      registry.publish({ seq: 1 })
    } catch (err) {
      caught = err
    }

    expect(after.calls).toEqual([{ seq: 1 }])
    expect(ErrHandlerFailed.is(caught)).toBe(true)
    if (ErrHandlerFailed.is(caught)) {
      expect(caught.data).toEqual({ messageType: "Ping", failures: 2 })
      expect(caught.cause?.message).toBe("first")
      expect(caught.causes.map((c) => c.message)).toEqual(["first", "second"])
    }
  })

  test("a thrown BusError becomes the cause as-is", () => {
    const registry = new HandlerRegistry(Ping)
    const inner = BusError.wrap("inner")
    registry.subscribe(() => { throw inner })

    let caught: unknown
    try {
      registry.publish({ seq: 1 })
    } catch (err) {
      caught = err
    }
    expect(BusError.isBusError(caught) && caught.cause).toBe(inner)
  })
})

describe("HandlerRegistry targeted publish", () => {
  test("publishToTargetType filters by instanceof", () => {
    const registry = new HandlerRegistry(Ping)
    const onButton = recorder<Ping>()
    const onPanel = recorder<Ping>()
    const untargeted = recorder<Ping>()
    registry.subscribe(onButton.callback, new Button())
    registry.subscribe(onPanel.callback, new Panel())
    registry.subscribe(untargeted.callback)

    expect(registry.publishToTargetType({ seq: 1 }, Widget)).toBe(1)
    expect(onButton.calls).toEqual([{ seq: 1 }])
    expect(onPanel.calls).toEqual([])
    expect(untargeted.calls).toEqual([])
  })

  test("publishToTarget filters by identity", () => {
    const registry = new HandlerRegistry(Ping)
    const a = new Button()
    const b = new Button()
    const onA = recorder<Ping>()
    const onB = recorder<Ping>()
    registry.subscribe(onA.callback, a)
    registry.subscribe(onB.callback, b)

    expect(registry.publishToTarget({ seq: 7 }, b)).toBe(1)
    expect(onA.calls).toEqual([])
    expect(onB.calls).toEqual([{ seq: 7 }])
  })
})

describe("HandlerRegistry.clear / inspect", () => {
  test("clear drops every subscription", () => {
    const registry = new HandlerRegistry(Ping)
    registry.subscribe(() => {})
    registry.subscribe(() => {})
    registry.clear()
    expect(registry.size).toBe(0)
    expect(registry.publish({ seq: 1 })).toBe(0)
  })

  test("inspect shows type and subscriber count", () => {
    const registry = new HandlerRegistry(Ping)
    registry.subscribe(() => {})
    expect(inspect(registry)).toBe("HandlerRegistry(Ping, 1 subscriber(s))")
  })
})

describe("isRegistryFor / expectRegistryFor", () => {
  test("match on descriptor identity", () => {
    const registry = new HandlerRegistry(Ping)
    const OtherPing = MessageDef.create<Ping>("Ping")

    expect(isRegistryFor(registry, Ping)).toBe(true)
    expect(isRegistryFor(registry, OtherPing)).toBe(false)
    expect(expectRegistryFor(registry, Ping)).toBe(registry)
  })

  test("mismatch is an invariant violation", () => {
    const Pong = MessageDef.create<Ping>("Pong")
    let caught: unknown
    try {
      expectRegistryFor(new HandlerRegistry(Ping), Pong)
    } catch (err) {
      caught = err
    }
    expect(ErrRegistryMismatch.is(caught)).toBe(true)
    if (ErrRegistryMismatch.is(caught)) {
      expect(caught.data).toEqual({ messageType: "Pong", found: "Ping" })
    }
  })
})
