type Waiter = (url: string | null) => void;

/**
 * In-memory FIFO of URLs believed fetchable right now. It is a cache, not an
 * authority: entries may be stale or duplicated, and workers re-check the
 * frontier before fetching anything they take from here.
 */
export class WorkQueue {
  private items: string[] = [];
  private waiters: Waiter[] = [];
  private timers = new Set<NodeJS.Timeout>();
  private closed = false;

  push(url: string): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(url);
      return;
    }
    this.items.push(url);
  }

  /** Re-push after a delay (retry backoff). Cancelled by close(). */
  pushLater(url: string, delayMs: number): void {
    if (this.closed) return;
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.push(url);
    }, delayMs);
    this.timers.add(timer);
  }

  /** Next URL, or null once the timeout elapses or the signal aborts. */
  take(timeoutMs: number, signal?: AbortSignal): Promise<string | null> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      const timer = setTimeout(() => settle(null), timeoutMs);
      const onAbort = () => settle(null);
      const waiter: Waiter = (url) => settle(url);
      const settle = (url: string | null) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const i = this.waiters.indexOf(waiter);
        if (i >= 0) this.waiters.splice(i, 1);
        resolve(url);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  remove(url: string): number {
    return this.removeWhere((u) => u === url);
  }

  // Best effort: a worker may already hold a matching URL.
  removeByPrefix(prefix: string): number {
    return this.removeWhere((u) => u.startsWith(prefix));
  }

  private removeWhere(match: (url: string) => boolean): number {
    const before = this.items.length;
    this.items = this.items.filter((u) => !match(u));
    return before - this.items.length;
  }

  size(): number {
    return this.items.length;
  }

  snapshot(): string[] {
    return [...this.items];
  }

  close(): void {
    this.closed = true;
    for (const t of this.timers) clearTimeout(t);
    this.timers.clear();
    this.items = [];
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
