import { promises as fs } from "node:fs";
import path from "node:path";
import type { Renderable } from "../authoring";
import type { KeyValueCache } from "../cache/types";
import type { RenderSettings } from "../config";
import { ComponentNotFoundError, OperationAbortedError } from "../errors";
import type { BlobStorage } from "../storage/types";
import { withDeadline } from "../util/deadline";
import { createLogger, describeError, type Logger } from "../util/logger";
import { cacheKeyPrefix, getCacheKey } from "./cache-keys";
import { compileComponent, decodeBytecode, encodeBytecode, evaluateComponent, type EvaluateOptions } from "./compiler";
import { ComponentPath } from "./paths";
import { discoverComponents, type ComponentMap } from "./resolver";
import { TieredSourceCache, type ResolvedSource } from "./source-cache";

export interface ComponentRegistryOptions {
  searchPaths: readonly string[];
  cache?: KeyValueCache;
  storage?: BlobStorage;
  cacheNamespace?: string;
  storagePrefix?: string;
  cacheTimeoutMs?: number;
  storageTimeoutMs?: number;
  /** Write compiled modules to the distributed cache. Defaults to true. */
  bytecodeCache?: boolean;
  evaluationTimeoutMs?: number;
  /** Extra modules components may require. */
  modules?: Readonly<Record<string, unknown>>;
  logger?: Logger;
}

export interface RegistryCollaborators {
  cache?: KeyValueCache;
  storage?: BlobStorage;
  modules?: Readonly<Record<string, unknown>>;
  logger?: Logger;
}

export type ComponentStatus = "ready" | "error";

export interface ComponentMetadata {
  name: string;
  path: string;
  status: ComponentStatus;
  error?: string;
}

export interface ScaffoldOptions {
  props?: Readonly<Record<string, string>>;
  /** Target directory; defaults to the first search path. */
  root?: string;
}

/**
 * Maps component names to source files and compiled renderables. Sources go
 * through the tiered source cache; compiled objects are kept in memory by name
 * and, when enabled, shared with other processes through the bytecode cache.
 */
export class ComponentRegistry {
  private readonly searchPaths: readonly string[];
  private readonly cache?: KeyValueCache;
  private readonly cacheNamespace?: string;
  private readonly cacheTimeoutMs?: number;
  private readonly bytecodeCache: boolean;
  private readonly evaluateOptions: EvaluateOptions;
  private readonly logger: Logger;
  private readonly sources: TieredSourceCache;
  private readonly compiled = new Map<string, Renderable>();
  private components?: ComponentMap;

  constructor(options: ComponentRegistryOptions) {
    this.searchPaths = [...options.searchPaths];
    this.cache = options.cache;
    this.cacheNamespace = options.cacheNamespace;
    this.cacheTimeoutMs = options.cacheTimeoutMs;
    this.bytecodeCache = options.bytecodeCache ?? true;
    this.evaluateOptions = { modules: options.modules, timeoutMs: options.evaluationTimeoutMs };
    this.logger = options.logger ?? createLogger("components");
    this.sources = new TieredSourceCache({
      cache: options.cache,
      storage: options.storage,
      cacheNamespace: options.cacheNamespace,
      storagePrefix: options.storagePrefix,
      cacheTimeoutMs: options.cacheTimeoutMs,
      storageTimeoutMs: options.storageTimeoutMs,
      logger: this.logger
    });
  }

  static fromSettings(settings: RenderSettings, collaborators: RegistryCollaborators = {}): ComponentRegistry {
    return new ComponentRegistry({
      searchPaths: settings.searchPaths,
      cacheNamespace: settings.cacheNamespace,
      storagePrefix: settings.storagePrefix,
      cacheTimeoutMs: settings.cacheTimeoutMs,
      storageTimeoutMs: settings.storageTimeoutMs,
      bytecodeCache: settings.bytecodeCache,
      evaluationTimeoutMs: settings.evaluationTimeoutMs,
      ...collaborators
    });
  }

  /**
   * Rescans the search paths. Called on first lookup and whenever a name is
   * missing from the last scan.
   */
  async discover(): Promise<ComponentMap> {
    this.components = await discoverComponents(this.searchPaths);
    this.logger.debug(`Discovered ${this.components.size} components`);
    return this.components;
  }

  async getComponentPath(name: string): Promise<ComponentPath | undefined> {
    const known = this.components?.get(name);
    if (known) {
      return known;
    }
    // files added since the last scan
    const components = await this.discover();
    return components.get(name);
  }

  async getComponentSource(name: string, signal?: AbortSignal): Promise<ResolvedSource> {
    const componentPath = await this.getComponentPath(name);
    if (!componentPath) {
      throw new ComponentNotFoundError(name);
    }
    const resolved = await this.sources.resolve(componentPath, signal);
    if (!resolved) {
      throw new ComponentNotFoundError(name, `${componentPath.absolute} no longer exists`);
    }
    return resolved;
  }

  async getComponentClass(name: string, signal?: AbortSignal): Promise<Renderable> {
    const inMemory = this.compiled.get(name);
    if (inMemory) {
      return inMemory;
    }

    const componentPath = await this.getComponentPath(name);
    if (!componentPath) {
      throw new ComponentNotFoundError(name);
    }

    const fromBytecode = await this.loadBytecode(name, componentPath, signal);
    if (fromBytecode) {
      this.compiled.set(name, fromBytecode);
      return fromBytecode;
    }

    const { source } = await this.getComponentSource(name, signal);
    const { component, code } = await compileComponent(name, source, componentPath.absolute, this.evaluateOptions);
    this.compiled.set(name, component);
    await this.storeBytecode(name, componentPath, code, signal);
    return component;
  }

  async clearComponentCache(name?: string): Promise<void> {
    if (name === undefined) {
      this.compiled.clear();
      this.sources.clear();
      this.components = undefined;
      await this.clearDistributed(cacheKeyPrefix("source", this.cacheNamespace));
      await this.clearDistributed(cacheKeyPrefix("bytecode", this.cacheNamespace));
      return;
    }

    this.compiled.delete(name);
    const componentPath = await this.getComponentPath(name);
    if (!componentPath) return;
    this.sources.forget(componentPath);
    await this.deleteDistributed(getCacheKey(componentPath, "source", this.cacheNamespace));
    await this.deleteDistributed(getCacheKey(componentPath, "bytecode", this.cacheNamespace));
  }

  clearSourceCache(): void {
    this.sources.clear();
  }

  clearCompiledCache(): void {
    this.compiled.clear();
  }

  isCompiled(name: string): boolean {
    return this.compiled.has(name);
  }

  hasSource(componentPath: ComponentPath): boolean {
    return this.sources.has(componentPath);
  }

  async describeComponents(): Promise<ComponentMetadata[]> {
    const components = await this.discover();
    const metadata: ComponentMetadata[] = [];
    for (const [name, componentPath] of components) {
      try {
        await this.getComponentClass(name);
        metadata.push({ name, path: componentPath.absolute, status: "ready" });
      } catch (error) {
        if (error instanceof OperationAbortedError) throw error;
        metadata.push({ name, path: componentPath.absolute, status: "error", error: describeError(error) });
      }
    }
    return metadata;
  }

  /**
   * Writes a starter component module and rescans. Never overwrites.
   */
  async scaffoldComponent(name: string, options: ScaffoldOptions = {}): Promise<ComponentPath> {
    if (!/^[A-Za-z_][A-Za-z0-9_-]*$/.test(name)) {
      throw new Error(`Invalid component name '${name}'`);
    }
    const root = options.root ?? this.searchPaths[0];
    if (root === undefined) {
      throw new Error("No search path configured to scaffold into");
    }

    const componentPath = new ComponentPath(root, `${name}.ts`);
    if (await componentPath.exists()) {
      throw new Error(`Component file already exists: ${componentPath.absolute}`);
    }
    await fs.mkdir(path.dirname(componentPath.absolute), { recursive: true });
    await fs.writeFile(componentPath.absolute, scaffoldSource(name, options.props ?? {}), { flag: "wx" });
    await this.discover();
    return componentPath;
  }

  private async loadBytecode(
    name: string,
    componentPath: ComponentPath,
    signal?: AbortSignal
  ): Promise<Renderable | null> {
    const cache = this.cache;
    if (!cache || !this.bytecodeCache) return null;
    const key = getCacheKey(componentPath, "bytecode", this.cacheNamespace);

    let data: Uint8Array | null;
    try {
      data = await withDeadline(`cache get ${key}`, () => cache.get(key), { timeoutMs: this.cacheTimeoutMs, signal });
    } catch (error) {
      if (error instanceof OperationAbortedError) throw error;
      this.logger.warn("Bytecode cache read failed", { key, error });
      return null;
    }
    if (!data || data.byteLength === 0) return null;

    const envelope = decodeBytecode(data);
    if (!envelope) {
      this.logger.warn("Ignoring unreadable bytecode entry", { key });
      return null;
    }
    try {
      return evaluateComponent(name, envelope.code, componentPath.absolute, this.evaluateOptions);
    } catch (error) {
      this.logger.warn("Cached bytecode failed to load, recompiling", { key, error });
      return null;
    }
  }

  private async storeBytecode(name: string, componentPath: ComponentPath, code: string, signal?: AbortSignal): Promise<void> {
    const cache = this.cache;
    if (!cache || !this.bytecodeCache) return;
    const key = getCacheKey(componentPath, "bytecode", this.cacheNamespace);
    try {
      await withDeadline(`cache set ${key}`, () => cache.set(key, encodeBytecode(name, code)), {
        timeoutMs: this.cacheTimeoutMs,
        signal
      });
    } catch (error) {
      if (error instanceof OperationAbortedError) throw error;
      this.logger.warn("Bytecode cache write failed", { key, error });
    }
  }

  private async deleteDistributed(key: string): Promise<void> {
    const cache = this.cache;
    if (!cache) return;
    try {
      await withDeadline(`cache delete ${key}`, () => cache.delete(key), { timeoutMs: this.cacheTimeoutMs });
    } catch (error) {
      this.logger.warn("Distributed cache delete failed", { key, error });
    }
  }

  private async clearDistributed(prefix: string): Promise<void> {
    const cache = this.cache;
    if (!cache) return;
    try {
      await withDeadline(`cache clear ${prefix}`, () => cache.clear(prefix), { timeoutMs: this.cacheTimeoutMs });
    } catch (error) {
      this.logger.warn("Distributed cache clear failed", { prefix, error });
    }
  }
}

export const createComponentRegistry = (options: ComponentRegistryOptions): ComponentRegistry =>
  new ComponentRegistry(options);

function scaffoldSource(name: string, props: Readonly<Record<string, string>>): string {
  const propNames = Object.keys(props);
  const lines = [`import { defineComponent, escapeHtml } from "@fastblocks/render-core";`, ""];
  if (propNames.length > 0) {
    lines.push("/**", " * Props:");
    for (const prop of propNames) {
      lines.push(` * - ${prop}: ${props[prop]}`);
    }
    lines.push(" */");
  }
  const body = propNames.map((prop) => `<span data-prop="${prop}">\${escapeHtml(vars[${JSON.stringify(prop)}])}</span>`).join("");
  lines.push(
    "export default defineComponent({",
    `  displayName: ${JSON.stringify(name)},`,
    "  render({ vars }) {",
    `    return \`<div class="${name}">${body}</div>\`;`,
    "  }",
    "});",
    ""
  );
  return lines.join("\n");
}
