/**
 * FIFO async lock, one per spreadsheet path. Module-private to the ledger:
 * callers never see or hold it, they just go through the ledger's methods.
 */

import { resolve } from 'node:path';

export class PathLock {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquires the lock. If already locked, waits for release.
   */
  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolveWaiter) => {
      this.waitQueue.push(() => {
        this.locked = true;
        resolveWaiter();
      });
    });
  }

  /**
   * Releases the lock, letting the next waiting caller through.
   */
  private release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

const locks = new Map<string, PathLock>();

/** The lock guarding `filePath`; the same instance for every spelling of the path. */
export function lockFor(filePath: string): PathLock {
  const key = resolve(filePath);
  let lock = locks.get(key);
  if (!lock) {
    lock = new PathLock();
    locks.set(key, lock);
  }
  return lock;
}
