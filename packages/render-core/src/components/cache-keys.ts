import type { ComponentPath } from "./paths";

export type ArtifactKind = "source" | "bytecode";

export const DEFAULT_CACHE_NAMESPACE = "htmy";

/**
 * `<namespace>_component_<kind>:<absolute path>`. The layout is shared with
 * caches written by other FastBlocks processes and must stay bit-exact.
 */
export const getCacheKey = (
  componentPath: ComponentPath | string,
  kind: ArtifactKind = "source",
  namespace: string = DEFAULT_CACHE_NAMESPACE
): string => `${cacheKeyPrefix(kind, namespace)}${String(componentPath)}`;

export const cacheKeyPrefix = (kind: ArtifactKind, namespace: string = DEFAULT_CACHE_NAMESPACE): string =>
  `${namespace}_component_${kind}:`;

export const getStoragePath = (componentPath: ComponentPath, prefix = ""): string => {
  const trimmed = prefix.replace(/^\/+|\/+$/g, "");
  return trimmed ? `${trimmed}/${componentPath.relative}` : componentPath.relative;
};
