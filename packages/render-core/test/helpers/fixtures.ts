import { mkdtemp, mkdir, rm, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { KeyValueCache } from "../../src/cache/types";
import { MemoryCache } from "../../src/cache/memory-cache";
import type { BlobStorage } from "../../src/storage/types";
import { MemoryStorage } from "../../src/storage/memory-storage";

export async function makeTempDir(prefix = "render-core-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Writes `files` (root-relative POSIX paths) under `root`.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, ...relative.split("/"));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, "utf8");
  }
}

/** Sets both atime and mtime, in seconds since the epoch. */
export async function setMtime(filePath: string, seconds: number): Promise<void> {
  await utimes(filePath, seconds, seconds);
}

export function createSpyCache(inner: KeyValueCache = new MemoryCache()) {
  return {
    get: vi.fn((key: string) => inner.get(key)),
    set: vi.fn((key: string, value: Uint8Array) => inner.set(key, value)),
    delete: vi.fn((key: string) => inner.delete(key)),
    clear: vi.fn((prefix: string) => inner.clear(prefix))
  } satisfies KeyValueCache;
}

export function createSpyStorage(inner: MemoryStorage = new MemoryStorage()) {
  return {
    stat: vi.fn((key: string) => inner.stat(key)),
    open: vi.fn((key: string) => inner.open(key)),
    write: vi.fn((key: string, data: Uint8Array) => inner.write(key, data)),
    exists: vi.fn((key: string) => inner.exists(key))
  } satisfies BlobStorage;
}

export const never = <T>(): Promise<T> => new Promise<T>(() => undefined);

export const USER_CARD_SOURCE = `import { defineComponent, escapeHtml } from "@fastblocks/render-core";

export default defineComponent({
  displayName: "UserCard",
  render({ vars }) {
    return \`<div class="user-card"><h2>\${escapeHtml(vars.title)}</h2><p>\${escapeHtml(vars.name)}</p></div>\`;
  }
});
`;

export const THROWING_SOURCE = `throw new Error("boom during import");
`;
