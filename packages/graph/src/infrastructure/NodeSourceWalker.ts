import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "glob";
import pLimit from "p-limit";
import { toError } from "@depmap/core";
import type { SourceInput } from "../core/model.js";
import { computeDigest } from "./ChecksumIndex.js";

/** Directories never walked: dependencies, build output, caches, VCS metadata. */
export const DEFAULT_EXCLUDED_DIRS = [
  "node_modules",
  ".git",
  ".svn",
  ".hg",
  "dist",
  "build",
  "coverage",
  ".coverage",
  "htmlcov",
  "vendor",
  "target",
  "__pycache__",
  ".mypy_cache",
  ".pytest_cache",
  ".tox",
  "venv",
  ".venv",
  "env",
  ".env",
  ".next",
  ".nuxt",
  ".depmap",
];

export interface WalkOptions {
  root: string;
  /** With the dot: `.ts`, `.py`. */
  extensions: string[];
  excludedDirs?: string[];
  concurrency?: number;
}

/** Glob matching the extensions; a single one gets no braces, which glob would not expand. */
export function sourcePattern(extensions: string[]): string {
  const bare = [...new Set(extensions.map((ext) => ext.replace(/^\./, "")))].sort();
  return bare.length === 1 ? `**/*.${bare[0]}` : `**/*.{${bare.join(",")}}`;
}

/**
 * Reads every source file under a root. A file that cannot be read becomes
 * an `{ path, error }` input, so the sync still counts it as present.
 */
export class NodeSourceWalker {
  constructor(private readonly options: WalkOptions) {}

  async walk(): Promise<SourceInput[]> {
    const { root, extensions } = this.options;
    if (extensions.length === 0) return [];
    const excluded = this.options.excludedDirs ?? DEFAULT_EXCLUDED_DIRS;

    const paths = await glob(sourcePattern(extensions), {
      cwd: root,
      nodir: true,
      posix: true,
      ignore: excluded.map((dir) => `**/${dir}/**`),
    });
    paths.sort();

    const limit = pLimit(this.options.concurrency ?? 8);
    return Promise.all(paths.map((path) => limit(() => this.read(path))));
  }

  private async read(path: string): Promise<SourceInput> {
    try {
      const content = await readFile(join(this.options.root, path), "utf8");
      return { path, content, digest: computeDigest(content) };
    } catch (e) {
      return { path, error: toError(e) };
    }
  }
}
