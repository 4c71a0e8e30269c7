import type { KeyValueCache } from "../cache/types";
import type { BlobStorage } from "../storage/types";
import { OperationAbortedError } from "../errors";
import { withDeadline, type CallOptions } from "../util/deadline";
import { createLogger, type Logger } from "../util/logger";
import { getCacheKey, getStoragePath } from "./cache-keys";
import type { ComponentPath } from "./paths";

export type SourceTier = "memory" | "cache" | "storage" | "filesystem";

export interface ResolvedSource {
  source: string;
  path: ComponentPath;
  tier: SourceTier;
}

export interface TieredSourceCacheOptions {
  cache?: KeyValueCache;
  storage?: BlobStorage;
  cacheNamespace?: string;
  storagePrefix?: string;
  cacheTimeoutMs?: number;
  storageTimeoutMs?: number;
  logger?: Logger;
}

const decoder = new TextDecoder();
const encoder = new TextEncoder();

/**
 * Source lookup chain: process memory, then the distributed cache, then a
 * storage sync of the local file, then the local file itself. Collaborator
 * failures are logged and fall through to the next tier; only an abort or a
 * missing local file ends the lookup.
 */
export class TieredSourceCache {
  private readonly memory = new Map<string, string>();
  private readonly cache?: KeyValueCache;
  private readonly storage?: BlobStorage;
  private readonly cacheNamespace?: string;
  private readonly storagePrefix: string;
  private readonly cacheTimeoutMs?: number;
  private readonly storageTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: TieredSourceCacheOptions = {}) {
    this.cache = options.cache;
    this.storage = options.storage;
    this.cacheNamespace = options.cacheNamespace;
    this.storagePrefix = options.storagePrefix ?? "";
    this.cacheTimeoutMs = options.cacheTimeoutMs;
    this.storageTimeoutMs = options.storageTimeoutMs;
    this.logger = options.logger ?? createLogger("source-cache");
  }

  /**
   * Returns null only when the local file does not exist.
   */
  async resolve(componentPath: ComponentPath, signal?: AbortSignal): Promise<ResolvedSource | null> {
    const memoryKey = String(componentPath);
    const inMemory = this.memory.get(memoryKey);
    if (inMemory !== undefined) {
      return { source: inMemory, path: componentPath, tier: "memory" };
    }

    const cached = await this.readCachedSource(componentPath, signal);
    if (cached !== null) {
      this.memory.set(memoryKey, cached);
      return { source: cached, path: componentPath, tier: "cache" };
    }

    const synced = await this.syncFromStorage(componentPath, signal);
    const source = synced ?? (await componentPath.readTextIfPresent());
    if (source === null) {
      return null;
    }

    this.memory.set(memoryKey, source);
    await this.writeCachedSource(componentPath, source, signal);
    return { source, path: componentPath, tier: synced !== null ? "storage" : "filesystem" };
  }

  forget(componentPath: ComponentPath): void {
    this.memory.delete(String(componentPath));
  }

  clear(): void {
    this.memory.clear();
  }

  has(componentPath: ComponentPath): boolean {
    return this.memory.has(String(componentPath));
  }

  get size(): number {
    return this.memory.size;
  }

  private async readCachedSource(componentPath: ComponentPath, signal?: AbortSignal): Promise<string | null> {
    const cache = this.cache;
    if (!cache) return null;
    const key = getCacheKey(componentPath, "source", this.cacheNamespace);
    try {
      const value = await withDeadline(`cache get ${key}`, () => cache.get(key), this.cacheCall(signal));
      return value && value.byteLength > 0 ? decoder.decode(value) : null;
    } catch (error) {
      this.rethrowAbort(error);
      this.logger.warn("Distributed cache read failed, falling back", { key, error });
      return null;
    }
  }

  private async writeCachedSource(componentPath: ComponentPath, source: string, signal?: AbortSignal): Promise<void> {
    const cache = this.cache;
    if (!cache) return;
    const key = getCacheKey(componentPath, "source", this.cacheNamespace);
    try {
      await withDeadline(`cache set ${key}`, () => cache.set(key, encoder.encode(source)), this.cacheCall(signal));
    } catch (error) {
      this.rethrowAbort(error);
      this.logger.warn("Distributed cache write failed", { key, error });
    }
  }

  /**
   * Pulls the storage copy over the local file when the local file is strictly
   * older and a different size. Same-size remote edits are not pulled.
   * Returns the pulled text, or null when the local copy stands.
   */
  private async syncFromStorage(componentPath: ComponentPath, signal?: AbortSignal): Promise<string | null> {
    const storage = this.storage;
    if (!storage) return null;
    const storagePath = getStoragePath(componentPath, this.storagePrefix);
    try {
      const local = await componentPath.stat();
      const remote = await withDeadline(`storage stat ${storagePath}`, () => storage.stat(storagePath), this.storageCall(signal));
      const localMtime = Math.trunc(local.mtime);
      const remoteMtime = Math.round(remote.mtime);
      if (localMtime < remoteMtime && local.size !== remote.size) {
        const data = await withDeadline(`storage open ${storagePath}`, () => storage.open(storagePath), this.storageCall(signal));
        await componentPath.writeBytes(data);
        this.logger.debug("Pulled newer component source from storage", { storagePath, localMtime, remoteMtime });
        return decoder.decode(data);
      }
    } catch (error) {
      this.rethrowAbort(error);
      this.logger.warn("Storage sync failed, using local file", { storagePath, error });
    }
    return null;
  }

  private cacheCall(signal?: AbortSignal): CallOptions {
    return { timeoutMs: this.cacheTimeoutMs, signal };
  }

  private storageCall(signal?: AbortSignal): CallOptions {
    return { timeoutMs: this.storageTimeoutMs, signal };
  }

  private rethrowAbort(error: unknown): void {
    if (error instanceof OperationAbortedError) {
      throw error;
    }
  }
}
