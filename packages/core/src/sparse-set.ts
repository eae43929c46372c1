/**
 * SparseSet — integer set with O(1) add, remove, contains and lookup.
 *
 * `dense` holds members packed at 0..size-1. `sparse` maps a member to its
 * position in `dense` and is indexed by the value itself, so members must be
 * small non-negative integers. For every member v:
 *
 *   dense[sparse[v]] === v  &&  sparse[v] < size
 *
 * Stale entries are never zeroed; the invariant above is what makes a slot
 * live. Every operation is total: bad input yields -1, false, or nothing.
 *
 * Values are capped at `maxValue` (default `SparseSet.MAX_VALUE`, 2^24 - 1):
 * storage is as wide as the largest value, and `add` refuses anything above
 * the cap with ABSENT instead of allocating for it.
 */

import {Inspect} from "./inspect.js";

export const ABSENT = -1;

export class SparseSet {
  static readonly MAX_VALUE = 2 ** 24 - 1;

  readonly maxValue: number;
  private _capacity: number;
  private _count = 0;
  private _dense: Int32Array;
  private _sparse: Int32Array;

  static {
    Inspect(this, (self) => ({
      format: "SparseSet(%d/%d) [%s]",
      params: [self.size, self.capacity, [...self].join(", ")],
    }));
  }

  constructor(capacity: number, maxValue: number = SparseSet.MAX_VALUE) {
    this.maxValue = Math.min(Math.max(0, Math.floor(maxValue)), SparseSet.MAX_VALUE);
    this._capacity = Math.min(Math.max(0, Math.floor(capacity)), this.maxValue + 1);
    this._dense = new Int32Array(this._capacity);
    this._sparse = new Int32Array(this._capacity);
  }

  get size(): number {
    return this._count;
  }

  get capacity(): number {
    return this._capacity;
  }

  /**
   * Add a value, growing storage when it does not fit.
   * Returns its dense index; the existing one if it was already a member,
   * ABSENT for a negative value or one above `maxValue`.
   */
  add(value: number): number {
    if (!isIndex(value) || value > this.maxValue) return ABSENT;
    while (value >= this._capacity) {
      this.grow();
    }
    const existing = this.get(value);
    if (existing !== ABSENT) return existing;

    this._dense[this._count] = value;
    this._sparse[value] = this._count;
    this._count++;
    return this._count - 1;
  }

  /** Dense index of a value, or ABSENT. */
  get(value: number): number {
    return this.contains(value) ? this._sparse[value] : ABSENT;
  }

  /** Remove a value by moving the last member into its slot. No-op when absent. */
  remove(value: number): void {
    if (!this.contains(value)) return;
    const row = this._sparse[value];
    const last = this._dense[this._count - 1];
    this._dense[row] = last;
    this._sparse[last] = row;
    this._count--;
  }

  contains(value: number): boolean {
    if (!isIndex(value) || value >= this._capacity) return false;
    const row = this._sparse[value];
    return row < this._count && this._dense[row] === value;
  }

  /** Forget every member. Storage is kept as-is. */
  clear(): void {
    this._count = 0;
  }

  /** The member stored at a dense index, or ABSENT. */
  at(denseIndex: number): number {
    if (!isIndex(denseIndex) || denseIndex >= this._count) return ABSENT;
    return this._dense[denseIndex];
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this._count; i++) {
      yield this._dense[i];
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(): void {
    this._capacity = Math.min((this._capacity + 1) * 2 + 1, this.maxValue + 1);
    const dense = new Int32Array(this._capacity);
    const sparse = new Int32Array(this._capacity);
    dense.set(this._dense);
    sparse.set(this._sparse);
    this._dense = dense;
    this._sparse = sparse;
  }
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
