/**
 * Serializes async work per key. Work for different keys runs concurrently;
 * work for the same key runs in submission order.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly depth = new Map<string, number>();

  isHeld(key: string): boolean {
    return (this.depth.get(key) ?? 0) > 0;
  }

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.depth.set(key, (this.depth.get(key) ?? 0) + 1);

    try {
      await previous;
      return await work();
    } finally {
      release();
      const remaining = (this.depth.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.depth.delete(key);
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      } else {
        this.depth.set(key, remaining);
      }
    }
  }
}
