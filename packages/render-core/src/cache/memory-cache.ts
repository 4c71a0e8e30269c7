import type { CacheEntry, KeyValueCache } from "./types";

export class MemoryCache implements KeyValueCache {
  private store = new Map<string, CacheEntry>();

  get(key: string): Promise<Uint8Array | null> {
    const entry = this.store.get(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: Uint8Array): Promise<void> {
    this.store.set(key, { key, value, storedAt: new Date().toISOString() });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  clear(prefix: string): Promise<void> {
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
    return Promise.resolve();
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  get size(): number {
    return this.store.size;
  }
}

export const createMemoryCache = (): MemoryCache => new MemoryCache();
