/**
 * In-process mutex for serializing per-scope index mutations
 *
 * Lookups await the store between reading and pruning an alias bucket, so two
 * lookups on one scope could otherwise interleave with a rebuild.
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.#locked;
  }
}

/**
 * Lazily created mutexes keyed by name
 */
export class MutexMap {
  #mutexes = new Map<string, Mutex>();

  get(key: string): Mutex {
    let mutex = this.#mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(key, mutex);
    }
    return mutex;
  }
}
