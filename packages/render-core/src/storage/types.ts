export interface StorageStat {
  /**
   * Last modification, in seconds since the epoch.
   */
  mtime: number;
  size: number;
}

/**
 * Durable blob storage holding the canonical copy of template and component
 * sources (a cloud bucket in deployments). Paths are POSIX-style keys.
 */
export interface BlobStorage {
  stat(path: string): Promise<StorageStat>;
  open(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
  exists(path: string): Promise<boolean>;
}
