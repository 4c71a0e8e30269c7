export type { BlobStorage, StorageStat } from "./types";
export { MemoryStorage, createMemoryStorage } from "./memory-storage";
export { DirectoryStorage, createDirectoryStorage, type DirectoryStorageOptions } from "./directory-storage";
