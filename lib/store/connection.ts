import { StoreConnectionError, errorMessage } from "./errors";
import type { RecordStore } from "./types";

export type StoreFactory = () => Promise<RecordStore>;

/**
 * Owns one lazily opened store handle. The handle is reused until `ttlMs` has passed since it was
 * opened, then re-established on the next `get()`. A failed open leaves nothing cached.
 */
export class StoreConnection {
  private handle: { store: RecordStore; expiresAt: number } | null = null;
  private opening: Promise<RecordStore> | null = null;

  constructor(
    private readonly factory: StoreFactory,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(): Promise<RecordStore> {
    if (this.handle && this.now() < this.handle.expiresAt) return this.handle.store;
    this.release();
    // concurrent callers share one open
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  invalidate(): void {
    this.release();
  }

  private release(): void {
    this.handle?.store.close?.();
    this.handle = null;
  }

  private async open(): Promise<RecordStore> {
    const openedAt = this.now();
    try {
      const store = await this.factory();
      this.handle = { store, expiresAt: openedAt + this.ttlMs };
      return store;
    } catch (e) {
      if (e instanceof StoreConnectionError) throw e;
      throw new StoreConnectionError(`Could not connect to the backing store: ${errorMessage(e)}`, { cause: e });
    }
  }
}
