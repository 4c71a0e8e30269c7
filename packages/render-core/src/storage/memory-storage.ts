import type { BlobStorage, StorageStat } from "./types";

interface StoredBlob {
  data: Uint8Array;
  mtime: number;
}

export class MemoryStorage implements BlobStorage {
  private readonly store = new Map<string, StoredBlob>();

  constructor(private readonly clock: () => number = () => Date.now() / 1000) {}

  async stat(path: string): Promise<StorageStat> {
    const blob = this.require(path);
    return { mtime: blob.mtime, size: blob.data.byteLength };
  }

  async open(path: string): Promise<Uint8Array> {
    return this.require(path).data;
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    this.store.set(path, { data, mtime: this.clock() });
  }

  async exists(path: string): Promise<boolean> {
    return this.store.has(path);
  }

  /**
   * Seeds a blob with an explicit modification time.
   */
  put(path: string, data: Uint8Array | string, mtime: number): void {
    const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
    this.store.set(path, { data: bytes, mtime });
  }

  private require(path: string): StoredBlob {
    const blob = this.store.get(path);
    if (!blob) {
      throw new Error(`Blob not found: ${path}`);
    }
    return blob;
  }
}

export const createMemoryStorage = (clock?: () => number): MemoryStorage => new MemoryStorage(clock);
