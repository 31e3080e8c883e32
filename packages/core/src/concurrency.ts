/**
 * Serialises async work per key. Work for different keys never waits on each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(work);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

interface Waiter {
  rank: number;
  seq: number;
  resolve: () => void;
}

/**
 * Bounded pool whose waiters are admitted lowest rank first, FIFO within a rank.
 * Admission never preempts work that already holds a slot.
 */
export class PriorityPool {
  private active = 0;
  private seq = 0;
  private waiting: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Pool capacity must be a positive integer, got ${capacity}`);
    }
  }

  async run<T>(rank: number, work: () => Promise<T>): Promise<T> {
    await this.acquire(rank);
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  getStats(): { active: number; waiting: number; capacity: number } {
    return { active: this.active, waiting: this.waiting.length, capacity: this.capacity };
  }

  private acquire(rank: number): Promise<void> {
    if (this.active < this.capacity && this.waiting.length === 0) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const waiter: Waiter = { rank, seq: this.seq++, resolve };
      const index = this.waiting.findIndex(
        (w) => w.rank > waiter.rank || (w.rank === waiter.rank && w.seq > waiter.seq),
      );
      if (index === -1) {
        this.waiting.push(waiter);
      } else {
        this.waiting.splice(index, 0, waiter);
      }
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // hand the slot straight to the next waiter
      next.resolve();
      return;
    }
    this.active--;
  }
}
