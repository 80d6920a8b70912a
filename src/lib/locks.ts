/**
 * In-process locks
 *
 * - PathLockManager: exclusive write locks on target subtrees. Two paths in
 *   the same repository contend when one equals or contains the other.
 * - KeyedMutex: serializes read-modify-write cycles per key (used by stores).
 */

export interface LockStatus {
  locked: boolean
  holder?: string
  target?: string
  path?: string
  since?: string
}

interface HeldLock {
  holder: string
  target: string
  path: string
  since: string
}

interface Waiter {
  holder: string
  target: string
  path: string
  grant: (release: () => void) => void
}

/**
 * True when one slash-separated path equals or contains the other
 */
export function pathsOverlap(a: string, b: string): boolean {
  if (a === b) return true
  return a.startsWith(`${b}/`) || b.startsWith(`${a}/`)
}

export class PathLockManager {
  private readonly held = new Map<string, HeldLock>()
  private waiters: Waiter[] = []

  /**
   * Wait until no overlapping path in `target` is held, then take the lock.
   * Resolves to the release function.
   */
  acquire(holder: string, target: string, path: string): Promise<() => void> {
    if (this.held.has(holder)) {
      return Promise.reject(new Error(`Lock holder "${holder}" already holds a lock`))
    }

    return new Promise(resolve => {
      const waiter: Waiter = { holder, target, path, grant: resolve }
      if (this.isFree(target, path)) {
        this.grant(waiter)
      } else {
        this.waiters.push(waiter)
      }
    })
  }

  async withLock<T>(holder: string, target: string, path: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(holder, target, path)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  checkLock(target: string, path: string): LockStatus {
    for (const lock of this.held.values()) {
      if (lock.target === target && pathsOverlap(lock.path, path)) {
        return { locked: true, holder: lock.holder, target: lock.target, path: lock.path, since: lock.since }
      }
    }
    return { locked: false }
  }

  get size(): number {
    return this.held.size
  }

  get pending(): number {
    return this.waiters.length
  }

  private isFree(target: string, path: string): boolean {
    return !this.checkLock(target, path).locked
  }

  private grant(waiter: Waiter): void {
    this.held.set(waiter.holder, {
      holder: waiter.holder,
      target: waiter.target,
      path: waiter.path,
      since: new Date().toISOString()
    })

    let released = false
    waiter.grant(() => {
      if (released) return
      released = true
      this.held.delete(waiter.holder)
      this.drain()
    })
  }

  // FIFO, but a waiter blocked by a held lock does not stop later waiters on disjoint paths
  private drain(): void {
    const remaining: Waiter[] = []
    for (const waiter of this.waiters) {
      if (this.isFree(waiter.target, waiter.path)) {
        this.grant(waiter)
      } else {
        remaining.push(waiter)
      }
    }
    this.waiters = remaining
  }
}

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(() => fn())
    const tail = run.then(() => undefined, () => undefined)
    this.tails.set(key, tail)

    try {
      return await run
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
