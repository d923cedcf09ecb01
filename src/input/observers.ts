/**
 * Ordered, synchronous multi-subscriber list.
 * Observers run in subscription order; an observer added or removed during a
 * notification takes effect from the next notification.
 */
export class ObserverList<TArgs extends ReadonlyArray<unknown> = []> {
  private observers: Array<(...args: TArgs) => void> = [];

  get size(): number {
    return this.observers.length;
  }

  /** @returns Unsubscribe function; calling it twice is a no-op */
  subscribe(observer: (...args: TArgs) => void): () => void {
    this.observers.push(observer);
    let subscribed = true;
    return () => {
      if (!subscribed) return;
      subscribed = false;
      const index = this.observers.indexOf(observer);
      if (index !== -1) this.observers.splice(index, 1);
    };
  }

  notify(...args: TArgs): void {
    for (const observer of [...this.observers]) {
      observer(...args);
    }
  }

  clear(): void {
    this.observers = [];
  }
}
