import {ErrReentrantResolution} from "./errors/errors.js";

/**
 * SyncMutex — guards a synchronous critical section.
 *
 * JavaScript runs a bus on one thread, so two callers can never be inside
 * the section at once. What can happen is re-entry from within `fn` itself;
 * that is refused rather than allowed to observe a half-finished update.
 */
export class SyncMutex {
  private held = false

  get isLocked(): boolean {
    return this.held
  }

  runExclusive<T>(fn: () => T): T {
    if (this.held) throw ErrReentrantResolution.create({})
    this.held = true
    try {
      return fn()
    } finally {
      this.held = false
    }
  }
}
