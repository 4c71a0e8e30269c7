import { promises as fs } from "node:fs";
import path from "node:path";
import { isMissing } from "../util/fs";
import type { BlobStorage, StorageStat } from "./types";

export interface DirectoryStorageOptions {
  rootDir: string;
}

/**
 * A local directory standing in for a storage bucket.
 */
export class DirectoryStorage implements BlobStorage {
  private readonly rootDir: string;

  constructor(options: DirectoryStorageOptions) {
    this.rootDir = path.resolve(options.rootDir);
  }

  async stat(key: string): Promise<StorageStat> {
    const stat = await fs.stat(this.resolve(key));
    return { mtime: stat.mtimeMs / 1000, size: stat.size };
  }

  async open(key: string): Promise<Uint8Array> {
    return new Uint8Array(await fs.readFile(this.resolve(key)));
  }

  async write(key: string, data: Uint8Array): Promise<void> {
    const fullPath = this.resolve(key);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, data);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(key));
      return stat.isFile();
    } catch (error: unknown) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  private resolve(key: string): string {
    const fullPath = path.resolve(this.rootDir, ...key.split("/"));
    if (fullPath !== this.rootDir && !fullPath.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return fullPath;
  }
}

export const createDirectoryStorage = (options: DirectoryStorageOptions): DirectoryStorage =>
  new DirectoryStorage(options);
