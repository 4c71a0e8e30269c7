import { readFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ComponentPath } from "../src/components/paths";
import { TieredSourceCache } from "../src/components/source-cache";
import { MemoryStorage } from "../src/storage/memory-storage";
import { OperationAbortedError } from "../src/errors";
import { configureLogger, resetLogger } from "../src/util/logger";
import { createSpyCache, createSpyStorage, makeTempDir, never, removeDir, setMtime, writeFiles } from "./helpers/fixtures";

const KEY_PREFIX = "htmy_component_source:";
const encoder = new TextEncoder();

describe("TieredSourceCache", () => {
  let root: string;
  let componentPath: ComponentPath;

  beforeEach(async () => {
    configureLogger({ level: "silent" });
    root = await makeTempDir();
    await writeFiles(root, { "cards/user_card.ts": "local source" });
    componentPath = new ComponentPath(root, "cards/user_card.ts");
  });

  afterEach(async () => {
    resetLogger();
    await removeDir(root);
  });

  it("reads the filesystem and back-fills the distributed cache", async () => {
    const cache = createSpyCache();
    const sources = new TieredSourceCache({ cache });

    const resolved = await sources.resolve(componentPath);

    expect(resolved?.source).toBe("local source");
    expect(resolved?.tier).toBe("filesystem");
    expect(cache.set).toHaveBeenCalledTimes(1);
    expect(cache.set.mock.calls[0]?.[0]).toBe(`${KEY_PREFIX}${componentPath.absolute}`);
  });

  it("serves the memory tier after a distributed cache hit without further calls", async () => {
    const cache = createSpyCache();
    await cache.set(`${KEY_PREFIX}${componentPath.absolute}`, encoder.encode("cached source"));
    cache.set.mockClear();
    const storage = createSpyStorage();
    const sources = new TieredSourceCache({ cache, storage });

    const first = await sources.resolve(componentPath);
    const second = await sources.resolve(componentPath);

    expect(first?.tier).toBe("cache");
    expect(second?.tier).toBe("memory");
    expect(second?.source).toBe(first?.source);
    expect(cache.get).toHaveBeenCalledTimes(1);
    expect(cache.set).not.toHaveBeenCalled();
    expect(storage.stat).not.toHaveBeenCalled();
  });

  it("returns the same text whichever tier serves it", async () => {
    const sources = new TieredSourceCache({ cache: createSpyCache() });

    const first = await sources.resolve(componentPath);
    const second = await sources.resolve(componentPath);

    expect(first?.tier).toBe("filesystem");
    expect(second?.tier).toBe("memory");
    expect(second?.source).toBe(first?.source);
  });

  it("treats an empty cached value as a miss", async () => {
    const cache = createSpyCache();
    await cache.set(`${KEY_PREFIX}${componentPath.absolute}`, new Uint8Array());
    const sources = new TieredSourceCache({ cache });

    const resolved = await sources.resolve(componentPath);

    expect(resolved?.tier).toBe("filesystem");
  });

  describe("storage sync", () => {
    const LOCAL_MTIME = 1_700_000_000;

    beforeEach(async () => {
      await setMtime(componentPath.absolute, LOCAL_MTIME);
    });

    it("pulls a newer remote copy of a different size", async () => {
      const inner = new MemoryStorage();
      inner.put("templates/cards/user_card.ts", "remote source, longer", LOCAL_MTIME + 60);
      const storage = createSpyStorage(inner);
      const sources = new TieredSourceCache({ storage, storagePrefix: "templates" });

      const resolved = await sources.resolve(componentPath);

      expect(resolved?.tier).toBe("storage");
      expect(resolved?.source).toBe("remote source, longer");
      expect(storage.open).toHaveBeenCalledWith("templates/cards/user_card.ts");
      expect(await readFile(componentPath.absolute, "utf8")).toBe("remote source, longer");
    });

    it("does not pull a newer remote copy of the same size", async () => {
      const inner = new MemoryStorage();
      inner.put("cards/user_card.ts", "remote sourc", LOCAL_MTIME + 60);
      const storage = createSpyStorage(inner);
      const sources = new TieredSourceCache({ storage });

      const resolved = await sources.resolve(componentPath);

      expect(resolved?.tier).toBe("filesystem");
      expect(resolved?.source).toBe("local source");
      expect(storage.stat).toHaveBeenCalledTimes(1);
      expect(storage.open).not.toHaveBeenCalled();
    });

    it("does not pull an older remote copy", async () => {
      const inner = new MemoryStorage();
      inner.put("cards/user_card.ts", "older remote copy", LOCAL_MTIME - 60);
      const storage = createSpyStorage(inner);
      const sources = new TieredSourceCache({ storage });

      const resolved = await sources.resolve(componentPath);

      expect(resolved?.source).toBe("local source");
      expect(storage.open).not.toHaveBeenCalled();
    });

    it("falls back to the local file when storage fails", async () => {
      const storage = createSpyStorage();
      storage.stat.mockRejectedValueOnce(new Error("bucket unavailable"));
      const sources = new TieredSourceCache({ storage });

      const resolved = await sources.resolve(componentPath);

      expect(resolved?.tier).toBe("filesystem");
      expect(resolved?.source).toBe("local source");
    });
  });

  it("falls through when a cache read exceeds its deadline", async () => {
    const cache = createSpyCache();
    cache.get.mockImplementationOnce(() => never());
    const sources = new TieredSourceCache({ cache, cacheTimeoutMs: 20 });

    const resolved = await sources.resolve(componentPath);

    expect(resolved?.tier).toBe("filesystem");
    expect(resolved?.source).toBe("local source");
  });

  it("propagates an abort", async () => {
    const cache = createSpyCache();
    cache.get.mockImplementationOnce(() => never());
    const controller = new AbortController();
    const sources = new TieredSourceCache({ cache });

    const pending = sources.resolve(componentPath, controller.signal);
    controller.abort(new Error("request closed"));

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
  });

  it("logs collaborator failures as warnings", async () => {
    const handler = vi.fn();
    configureLogger({ level: "warn", handler });
    const cache = createSpyCache();
    cache.get.mockRejectedValueOnce(new Error("connection refused"));
    const sources = new TieredSourceCache({ cache });

    await sources.resolve(componentPath);

    expect(handler).toHaveBeenCalledWith(
      "warn",
      "[source-cache] Distributed cache read failed, falling back",
      expect.objectContaining({ key: `${KEY_PREFIX}${componentPath.absolute}` })
    );
  });

  it("returns null when the local file is gone", async () => {
    const sources = new TieredSourceCache();

    const resolved = await sources.resolve(new ComponentPath(root, "missing.ts"));

    expect(resolved).toBeNull();
  });

  it("forgets and clears memory entries", async () => {
    const sources = new TieredSourceCache();
    await sources.resolve(componentPath);
    expect(sources.has(componentPath)).toBe(true);

    sources.forget(componentPath);
    expect(sources.has(componentPath)).toBe(false);

    await sources.resolve(componentPath);
    sources.clear();
    expect(sources.size).toBe(0);
  });
});
