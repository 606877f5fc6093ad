/**
 * RwLock - Promise-based reader/writer lock
 *
 * Many readers or one writer. Waiters are served in arrival order, so a
 * queued writer blocks readers that arrive after it and cannot be starved.
 *
 * @example
 * ```ts
 * const lock = new RwLock();
 * const user = await lock.read(() => db.findByDiscordId(id));
 * await lock.write(async () => { db.upsertUser(user); });
 * ```
 */

type Waiter = { kind: "read" | "write"; grant: () => void };

export type Release = () => void;

export class RwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  /**
   * Run fn while holding a shared lock
   */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run fn while holding the exclusive lock
   */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  acquireRead(): Promise<Release> {
    return new Promise((resolve) => {
      const grant = () => {
        this.readers++;
        resolve(this.once(() => {
          this.readers--;
          this.drain();
        }));
      };

      if (!this.writing && this.queue.length === 0) {
        grant();
      } else {
        this.queue.push({ kind: "read", grant });
      }
    });
  }

  acquireWrite(): Promise<Release> {
    return new Promise((resolve) => {
      const grant = () => {
        this.writing = true;
        resolve(this.once(() => {
          this.writing = false;
          this.drain();
        }));
      };

      if (!this.writing && this.readers === 0 && this.queue.length === 0) {
        grant();
      } else {
        this.queue.push({ kind: "write", grant });
      }
    });
  }

  get state(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private drain(): void {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (!next) break;

      if (next.kind === "write") {
        if (this.readers > 0) break;
        this.queue.shift();
        next.grant();
        break;
      }

      this.queue.shift();
      next.grant();
    }
  }

  private once(fn: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      fn();
    };
  }
}
