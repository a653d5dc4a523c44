type Release = () => void;

/**
 * FIFO async mutex. Waiters are admitted in arrival order and the holder
 * keeps the lock across awaits inside the critical section.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.releaser());
        return;
      }
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.releaser());
      } else {
        this.locked = false;
      }
    };
  }
}
