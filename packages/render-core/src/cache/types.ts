/**
 * Distributed key-value cache shared by every render process (Redis in
 * production, memory or files locally). Values are opaque bytes.
 */
export interface KeyValueCache {
  get(key: string): Promise<Uint8Array | null>;
  set(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Drops every key starting with `prefix`.
   */
  clear(prefix: string): Promise<void>;
}

export interface CacheEntry {
  key: string;
  value: Uint8Array;
  storedAt: string;
}
