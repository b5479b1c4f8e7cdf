import { describe, it, expect, vi } from "vitest";
import { StoreConnection } from "@/lib/store/connection";
import { StoreConnectionError } from "@/lib/store/errors";
import { MemoryStore } from "@/lib/store/memory";

class ClosableStore extends MemoryStore {
  closed = 0;
  close(): void {
    this.closed += 1;
  }
}

describe("store connection", () => {
  it("reuses the handle until the ttl runs out", async () => {
    let t = 0;
    const stores: ClosableStore[] = [];
    const factory = vi.fn(async () => {
      const s = new ClosableStore();
      stores.push(s);
      return s;
    });
    const conn = new StoreConnection(factory, 1000, () => t);

    const first = await conn.get();
    t = 999;
    expect(await conn.get()).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);

    t = 1000;
    const second = await conn.get();
    expect(second).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(stores[0].closed).toBe(1);
  });

  it("shares one open between concurrent callers", async () => {
    const factory = vi.fn(async () => new MemoryStore());
    const conn = new StoreConnection(factory, 1000);
    const [a, b] = await Promise.all([conn.get(), conn.get()]);
    expect(a).toBe(b);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("caches nothing when opening fails", async () => {
    const factory = vi.fn(async () => new MemoryStore());
    factory.mockRejectedValueOnce(new Error("bad credentials"));
    const conn = new StoreConnection(factory, 1000);

    await expect(conn.get()).rejects.toBeInstanceOf(StoreConnectionError);
    await expect(conn.get()).resolves.toBeInstanceOf(MemoryStore);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("reopens after invalidate", async () => {
    const factory = vi.fn(async () => new MemoryStore());
    const conn = new StoreConnection(factory, 1000);
    await conn.get();
    conn.invalidate();
    await conn.get();
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
