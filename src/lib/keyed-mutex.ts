/**
 * Per-key mutual exclusion. Work for one key runs strictly one at a time;
 * different keys never wait on each other.
 */
export class KeyedMutex {
  // key → promise that settles when the last queued holder releases
  private tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Queue behind any current holder of `key`, then run `fn`. */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => { release = resolve; });
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

  /** Run `fn` only if nobody holds `key`; otherwise return `{ ran: false }` immediately. */
  async tryRunExclusive<T>(
    key: string,
    fn: () => Promise<T>,
  ): Promise<{ ran: true; value: T } | { ran: false }> {
    if (this.isLocked(key)) return { ran: false };
    const value = await this.runExclusive(key, fn);
    return { ran: true, value };
  }
}
