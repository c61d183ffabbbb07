export type RedrawListener = () => void;

/**
 * Single-slot wake-up channel from background tasks to the UI. Any number of `notify()` calls
 * made in the same turn collapse into one listener call on the next macrotask.
 */
export class RedrawSignal {
  private readonly listeners = new Set<RedrawListener>();
  private pending = false;
  private closed = false;

  subscribe(listener: RedrawListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notify(): void {
    if (this.closed || this.pending) return;
    this.pending = true;
    setImmediate(() => this.flush());
  }

  /** Stops delivery for good; later notifications are dropped. */
  close(): void {
    this.closed = true;
    this.listeners.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private flush(): void {
    this.pending = false;
    if (this.closed) return;
    for (const listener of [...this.listeners]) listener();
  }
}
