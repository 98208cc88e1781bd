/**
 * Promise-based lock primitives for the sync engine.
 */

type Waiter = () => void;

/**
 * Readers share, writers are exclusive. A queued writer blocks readers that
 * arrive after it, so a steady stream of queries cannot starve a commit.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly writeQueue: Waiter[] = [];
  private readonly readQueue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.writeQueue.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.readQueue.push(() => {
        this.readers++;
        resolve();
      });
    });
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.writeQueue.push(() => {
        this.writing = true;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) this.drain();
  }

  private releaseWrite(): void {
    this.writing = false;
    this.drain();
  }

  private drain(): void {
    if (this.writing || this.readers > 0) return;
    const writer = this.writeQueue.shift();
    if (writer) {
      writer();
      return;
    }
    const readers = this.readQueue.splice(0);
    for (const reader of readers) reader();
  }
}

/**
 * Serialises work per key; different keys run independently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  get pending(): number {
    return this.tails.size;
  }

  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Waiter = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
