/**
 * Component discovery.
 *
 * Walks each search root recursively and maps component names (file base name
 * without extension) to their paths. Roots are visited in order and the first
 * file found for a name keeps it, so earlier roots override later ones.
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { isMissing } from "../util/fs";
import { ComponentPath, stripExtension } from "./paths";

export const COMPONENT_EXTENSIONS = [".ts", ".mts", ".js", ".mjs"] as const;

export type ComponentMap = Map<string, ComponentPath>;

export const isComponentFile = (fileName: string): boolean => {
  if (!COMPONENT_EXTENSIONS.some((ext) => fileName.endsWith(ext))) return false;
  if (fileName.endsWith(".d.ts") || fileName.endsWith(".d.mts")) return false;
  if (/\.(test|spec)\.[cm]?[jt]s$/.test(fileName)) return false;
  // package initializers re-export, they are not components
  return stripExtension(fileName) !== "index";
};

export async function discoverComponents(searchRoots: readonly string[]): Promise<ComponentMap> {
  const components: ComponentMap = new Map();
  for (const root of searchRoots) {
    const files = await findComponentFiles(root, "");
    for (const relative of files) {
      const componentPath = new ComponentPath(root, relative);
      if (!components.has(componentPath.stem)) {
        components.set(componentPath.stem, componentPath);
      }
    }
  }
  return components;
}

async function findComponentFiles(root: string, subDir: string): Promise<string[]> {
  const currentDir = subDir ? path.join(root, subDir) : root;
  let entries: Dirent[];
  try {
    entries = await readdir(currentDir, { withFileTypes: true });
  } catch (error: unknown) {
    // a missing root is not an error, it simply contributes nothing
    if (isMissing(error) || isNotDirectory(error)) return [];
    throw error;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  const directories: string[] = [];
  for (const entry of entries) {
    const relativePath = subDir ? `${subDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (entry.name === "node_modules" || entry.name.startsWith(".")) continue;
      directories.push(relativePath);
    } else if (entry.isFile() && isComponentFile(entry.name)) {
      files.push(relativePath);
    }
  }

  // files directly under a directory shadow same-named files nested deeper
  for (const directory of directories) {
    files.push(...(await findComponentFiles(root, directory)));
  }
  return files;
}

const isNotDirectory = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOTDIR";
