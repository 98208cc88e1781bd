/**
 * In-memory digest index that decides which files a sync must touch.
 */

import { createHash } from "node:crypto";
import type { ChangeKind } from "../core/model.js";

/**
 * Content digest: sha256 hex truncated to 16 characters.
 */
export function computeDigest(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex").slice(0, 16);
}

export class ChecksumIndex {
  private digests: Map<string, string>;

  constructor(seed: Iterable<readonly [path: string, digest: string]> = []) {
    this.digests = new Map(seed);
  }

  get size(): number {
    return this.digests.size;
  }

  get(path: string): string | null {
    return this.digests.get(path) ?? null;
  }

  /**
   * Compare a freshly read digest with the recorded one and store it.
   */
  record(path: string, digest: string): Exclude<ChangeKind, "removed"> {
    const previous = this.digests.get(path);
    this.digests.set(path, digest);
    if (previous === undefined) return "added";
    return previous === digest ? "unchanged" : "modified";
  }

  /**
   * Known paths missing from `seen`. Entries stay until `forget` confirms
   * the tombstone, so a failed removal is reported again next time.
   */
  sweep(seen: ReadonlySet<string>): string[] {
    const removed: string[] = [];
    for (const path of this.digests.keys()) {
      if (!seen.has(path)) removed.push(path);
    }
    return removed.sort();
  }

  forget(path: string): void {
    this.digests.delete(path);
  }

  /** Restore the entry that preceded `record` after a failed commit. */
  revert(path: string, previous: string | null): void {
    if (previous === null) this.digests.delete(path);
    else this.digests.set(path, previous);
  }
}
