type Entry<T> = { value: T; touchedAt: number };

export type SessionManagerOptions = {
  ttlMs: number;
  now?: () => number;
};

/**
 * Per-user drafts keyed by user id. Entries idle longer than `ttlMs` are
 * dropped on access and by `sweep()`.
 */
export class SessionManager<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: SessionManagerOptions) {
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.expired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, touchedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Removes expired entries and returns how many were dropped. */
  sweep(): number {
    let dropped = 0;
    for (const [key, entry] of this.entries) {
      if (this.expired(entry)) {
        this.entries.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  /** Runs `fn` after every earlier call for the same key has settled. */
  runExclusive<R>(key: string, fn: () => Promise<R>): Promise<R> {
    const prev = this.queues.get(key) ?? Promise.resolve();
    const run = prev.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) this.queues.delete(key);
    });
    return run;
  }

  private expired(entry: Entry<T>): boolean {
    return this.now() - entry.touchedAt > this.ttlMs;
  }
}
