import util, { type InspectOptions } from 'node-inspect-extracted'

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block so it is assigned once, to the prototype.
 *
 * The `fn` receives the instance and returns a format string with params;
 * specifiers (%s, %O, %d, ...) are handled by `util.formatWithOptions`.
 *
 * ```typescript
 * class SparseSet {
 *   static {
 *     Inspect(this, (self) => ({
 *       format: "SparseSet( %d/%d )",
 *       params: [self.size, self.capacity],
 *     }));
 *   }
 * }
 * ```
 */
export function Inspect<T>(
  cls: { prototype: T },
  fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] },
): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function (this: T, depth: number, options: InspectOptions) {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
