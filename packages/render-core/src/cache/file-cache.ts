import { promises as fs, constants as fsConstants } from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { z } from "zod";
import { isMissing } from "../util/fs";
import type { KeyValueCache } from "./types";

export interface FileCacheOptions {
  rootDir: string;
  namespace?: string;
  /**
   * Use human-readable file names instead of hashes. Keys will be sanitized.
   */
  readableNames?: boolean;
}

const StoredEntrySchema = z.object({
  key: z.string(),
  value: z.string(),
  storedAt: z.string()
});

type StoredEntry = z.infer<typeof StoredEntrySchema>;

/**
 * One JSON file per key. Values are stored base64-encoded next to their key so
 * `clear(prefix)` can match on the original key, whatever the file name is.
 */
export class FileCache implements KeyValueCache {
  private readonly rootDir: string;
  private readonly namespace?: string;
  private readonly readableNames: boolean;

  constructor(options: FileCacheOptions) {
    this.rootDir = options.rootDir;
    this.namespace = options.namespace;
    this.readableNames = options.readableNames ?? false;
  }

  async get(key: string): Promise<Uint8Array | null> {
    const entry = await this.readEntry(this.keyToPath(key));
    if (!entry || entry.key !== key) {
      return null;
    }
    return new Uint8Array(Buffer.from(entry.value, "base64"));
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    const fullPath = this.keyToPath(key);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    const entry: StoredEntry = {
      key,
      value: Buffer.from(value).toString("base64"),
      storedAt: new Date().toISOString()
    };
    await fs.writeFile(fullPath, JSON.stringify(entry, null, 2), "utf8");
  }

  async delete(key: string): Promise<void> {
    await this.unlinkQuietly(this.keyToPath(key));
  }

  async clear(prefix: string): Promise<void> {
    const dir = this.directory();
    const entries = await fs.readdir(dir).catch((error: unknown) => {
      if (isMissing(error)) return [];
      throw error;
    });
    for (const name of entries) {
      if (!name.endsWith(".json")) continue;
      const fullPath = path.join(dir, name);
      const entry = await this.readEntry(fullPath);
      if (entry && entry.key.startsWith(prefix)) {
        await this.unlinkQuietly(fullPath);
      }
    }
  }

  private async readEntry(fullPath: string): Promise<StoredEntry | null> {
    try {
      await fs.access(fullPath, fsConstants.R_OK);
    } catch {
      return null;
    }

    const raw = await fs.readFile(fullPath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = StoredEntrySchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  private async unlinkQuietly(fullPath: string): Promise<void> {
    try {
      await fs.unlink(fullPath);
    } catch (error: unknown) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }
  }

  private directory(): string {
    return path.join(this.rootDir, this.namespace ?? "");
  }

  private keyToPath(key: string): string {
    const safeKey = this.readableNames ? this.sanitizeKey(key) : this.hashKey(key);
    return path.join(this.directory(), `${safeKey}.json`);
  }

  private hashKey(key: string): string {
    return createHash("sha1").update(key).digest("hex");
  }

  private sanitizeKey(key: string): string {
    return key.replace(/[^a-zA-Z0-9._-]+/g, "_").slice(0, 120);
  }
}

export const createFileCache = (options: FileCacheOptions): FileCache => new FileCache(options);
