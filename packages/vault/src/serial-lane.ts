/**
 * SerialLane — Runs vault operations one at a time, in arrival order.
 *
 * A task that calls back into the lane while it is running (a transfer
 * hook re-entering the vault, a pool calling a vault method) runs inline
 * instead of queueing behind itself. Reentrant calls therefore see the
 * state the outer task has already committed and never deadlock. Callers
 * that must not re-enter check `isInside()` first.
 *
 * The reentrancy flag lives in AsyncLocalStorage, so it follows the
 * outer task's call chain across awaits and no other caller inherits it.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class SerialLane {
  private readonly _inside = new AsyncLocalStorage<boolean>();
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this._inside.getStore() === true) {
      return task();
    }

    this._pending++;
    const result = this._tail.then(() => this._inside.run(true, task));
    this._tail = result.then(
      () => {
        this._pending--;
      },
      () => {
        this._pending--;
      },
    );
    return result;
  }

  /** True while the caller is executing inside a lane task. */
  isInside(): boolean {
    return this._inside.getStore() === true;
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this._pending;
  }
}
