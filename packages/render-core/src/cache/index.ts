export type { CacheEntry, KeyValueCache } from "./types";
export { MemoryCache, createMemoryCache } from "./memory-cache";
export { FileCache, createFileCache, type FileCacheOptions } from "./file-cache";
