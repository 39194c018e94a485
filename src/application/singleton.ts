import { setImmediate as nextTurn } from 'node:timers/promises';

/**
 * One-time initialisation cell.
 *
 * Concurrent first callers share one construction. The scheduler is made
 * to complete one unit of work before the factory runs, and the instance is
 * published only once construction has finished. A failed construction is
 * forgotten so a later `get()` can try again.
 */
export class SingletonCell<T extends object> {
  private instance: T | undefined;
  private pending: Promise<T> | undefined;
  private readonly factory: () => T | Promise<T>;

  constructor(factory: () => T | Promise<T>) {
    this.factory = factory;
  }

  get(): Promise<T> {
    if (this.instance !== undefined) return Promise.resolve(this.instance);
    this.pending ??= this.initialize();
    return this.pending;
  }

  /** The published instance, if construction has completed. */
  peek(): T | undefined {
    return this.instance;
  }

  /** Forget the instance. For tests and orderly shutdown. */
  reset(): void {
    this.instance = undefined;
    this.pending = undefined;
  }

  private async initialize(): Promise<T> {
    try {
      await nextTurn();
      const created = await this.factory();
      this.instance = created;
      return created;
    } catch (err: unknown) {
      this.pending = undefined;
      throw err;
    }
  }
}
