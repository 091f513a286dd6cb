/**
 * Keyed mutual exclusion for entity mutations
 */

export interface LockHandle {
  readonly id: number;
  readonly key: string;
  release(): void;
}

interface QueuedLockRequest {
  id: number;
  resolve: (handle: LockHandle) => void;
}

/**
 * Serializes work per key (one entity id) without a repository-wide lock.
 * Waiters are served first come, first served.
 *
 * @example
 * ```typescript
 * const handle = await locks.acquireLock(entity.id);
 * try {
 *   entity.addComment(author, now, 'hello');
 *   await cache.flushIfDirty(entity);
 * } finally {
 *   handle.release();
 * }
 * ```
 */
export class EntityLockManager {
  private locks = new Map<string, LockHandle>();
  private queues = new Map<string, QueuedLockRequest[]>();
  private lockIdCounter = 0;

  async acquireLock(key: string): Promise<LockHandle> {
    const id = ++this.lockIdCounter;

    if (!this.locks.has(key)) {
      return this.createLockHandle(key, id);
    }

    return new Promise((resolve) => {
      const queue = this.queues.get(key) ?? [];
      queue.push({ id, resolve });
      this.queues.set(key, queue);
    });
  }

  /**
   * Run `fn` while holding the lock for `key`
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquireLock(key);
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  private releaseLock(handle: LockHandle): void {
    const current = this.locks.get(handle.key);

    // Only the owner may release, and only once
    if (!current || current.id !== handle.id) {
      return;
    }

    this.locks.delete(handle.key);
    this.processQueue(handle.key);
  }

  private createLockHandle(key: string, id: number): LockHandle {
    const handle: LockHandle = {
      id,
      key,
      release: () => this.releaseLock(handle),
    };
    this.locks.set(key, handle);
    return handle;
  }

  private processQueue(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (!queue || !next) {
      return;
    }

    if (queue.length === 0) {
      this.queues.delete(key);
    }
    next.resolve(this.createLockHandle(key, next.id));
  }
}
