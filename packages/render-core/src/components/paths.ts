import { promises as fs } from "node:fs";
import path from "node:path";
import { isMissing } from "../util/fs";

export interface LocalStat {
  /** Seconds since the epoch, fractional. */
  mtime: number;
  size: number;
}

/**
 * Location of a component source file: the search root it was found under plus
 * its root-relative path. Stringifies to the absolute path.
 */
export class ComponentPath {
  readonly root: string;
  /** POSIX separators regardless of platform. */
  readonly relative: string;
  readonly absolute: string;

  constructor(root: string, relative: string) {
    this.root = path.resolve(root);
    this.relative = relative.split(path.sep).join("/");
    this.absolute = path.join(this.root, ...this.relative.split("/"));
  }

  get name(): string {
    return path.basename(this.absolute);
  }

  get stem(): string {
    return stripExtension(this.name);
  }

  get extension(): string {
    return path.extname(this.absolute);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.absolute);
      return true;
    } catch {
      return false;
    }
  }

  async stat(): Promise<LocalStat> {
    const stat = await fs.stat(this.absolute);
    return { mtime: stat.mtimeMs / 1000, size: stat.size };
  }

  async readText(): Promise<string> {
    return fs.readFile(this.absolute, "utf8");
  }

  /**
   * Returns null when the file is gone.
   */
  async readTextIfPresent(): Promise<string | null> {
    try {
      return await this.readText();
    } catch (error: unknown) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async writeBytes(data: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(this.absolute), { recursive: true });
    await fs.writeFile(this.absolute, data);
  }

  toString(): string {
    return this.absolute;
  }
}

export const stripExtension = (fileName: string): string => {
  const ext = path.extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
};
