/** Any class whose instances are T, abstract or not. Usable on the right of `instanceof`. */
export type ClassOf<T> = abstract new (...args: never[]) => T

/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;
