import { posix } from "node:path";

const SOURCE_EXTENSION = /\.(?:[cm]?[jt]sx?|py|go|rs|java)$/;

/** Forward slashes, no `./` prefix, no `..` segments left inside. */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}

export function stripSourceExtension(path: string): string {
  return path.replace(SOURCE_EXTENSION, "");
}

export function extensionOf(path: string): string {
  const ext = posix.extname(path);
  return ext.toLowerCase();
}

/**
 * Module paths a specifier can stand for: the file itself or the
 * package entry inside a directory of that name.
 */
export function moduleCandidates(base: string): string[] {
  const stem = stripSourceExtension(base);
  return [stem, `${stem}/index`, `${stem}/__init__`, `${stem}/mod`];
}

/** Resolve `./util` against the directory of the importing file. */
export function resolveRelative(fromPath: string, specifier: string): string {
  return normalizePath(posix.join(posix.dirname(normalizePath(fromPath)), specifier));
}

/** `a/b/c.ts` matches suffix `b/c`; its directory `a/b` matches suffix `b`. */
export function matchesSuffix(path: string, suffix: string): boolean {
  const stem = stripSourceExtension(path);
  const dir = posix.dirname(path);
  for (const candidate of moduleCandidates(suffix)) {
    if (stem === candidate || stem.endsWith(`/${candidate}`)) return true;
  }
  return dir === suffix || dir.endsWith(`/${suffix}`);
}
