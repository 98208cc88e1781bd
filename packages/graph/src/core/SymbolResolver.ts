/**
 * Name index used to resolve edge drafts to in-tree symbols.
 *
 * Lookup order for every reference: matches in the referencing file first,
 * then a unique match anywhere in the tree. More than one candidate at the
 * winning level is ambiguous.
 */

import { MODULE_SYMBOL, type RelationKind, type SymbolKind, type TargetHint } from "./model.js";
import type { Resolution } from "./confidence.js";
import { matchesSuffix, moduleCandidates, resolveRelative, stripSourceExtension } from "./paths.js";

export interface SymbolRef {
  id: string;
  path: string;
  name: string;
  kind: SymbolKind;
}

export interface ResolveRequest {
  sourcePath: string;
  /** Qualified name of the referencing symbol; supplies the owner for `self`. */
  sourceName: string;
  targetName: string;
  hint: TargetHint;
  kind: RelationKind;
}

export class SymbolResolver {
  private byName = new Map<string, SymbolRef[]>();
  private byPath = new Map<string, SymbolRef[]>();
  private modules = new Map<string, SymbolRef>();

  constructor(refs: Iterable<SymbolRef> = []) {
    for (const ref of refs) this.add(ref);
  }

  add(ref: SymbolRef): void {
    const inFile = this.byPath.get(ref.path);
    if (inFile) inFile.push(ref);
    else this.byPath.set(ref.path, [ref]);

    if (ref.kind === "module") {
      this.modules.set(ref.path, ref);
      return;
    }
    const named = this.byName.get(ref.name);
    if (named) named.push(ref);
    else this.byName.set(ref.name, [ref]);
  }

  /** Drop every symbol of a file, e.g. before adding its fresh drafts. */
  removePath(path: string): void {
    const refs = this.byPath.get(path);
    if (!refs) return;
    this.byPath.delete(path);
    this.modules.delete(path);
    for (const ref of refs) {
      const named = this.byName.get(ref.name);
      if (!named) continue;
      const remaining = named.filter((r) => r.path !== path);
      if (remaining.length > 0) this.byName.set(ref.name, remaining);
      else this.byName.delete(ref.name);
    }
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  resolve(request: ResolveRequest): Resolution {
    const { hint, targetName, sourcePath } = request;
    switch (hint.type) {
      case "opaque":
        return { type: "unresolved" };
      case "bare":
        return this.pick(this.byName.get(targetName) ?? [], sourcePath);
      case "self": {
        const owner = ownerOf(request.sourceName);
        if (owner === null) return { type: "unresolved" };
        return this.pick(this.byName.get(`${owner}.${targetName}`) ?? [], sourcePath);
      }
      case "member":
        return this.resolveMember(hint.receiver, targetName, sourcePath);
      case "module":
        return this.resolveModule(request, hint.specifier, hint.resolution);
    }
  }

  private resolveMember(receiver: string, name: string, sourcePath: string): Resolution {
    const direct = this.byName.get(`${receiver}.${name}`);
    if (direct) return this.pick(direct, sourcePath);
    const last = receiver.slice(receiver.lastIndexOf(".") + 1);
    if (last === receiver) return { type: "unresolved" };
    return this.pick(this.byName.get(`${last}.${name}`) ?? [], sourcePath);
  }

  private resolveModule(
    request: ResolveRequest,
    specifier: string,
    resolution: "relative" | "suffix" | "package"
  ): Resolution {
    if (resolution === "package") return { type: "unresolved" };

    const paths = this.matchingPaths(request.sourcePath, specifier, resolution);
    if (paths.length === 0) return { type: "unresolved" };

    if (request.targetName === MODULE_SYMBOL) {
      return this.pickModule(paths);
    }

    const named = (this.byName.get(request.targetName) ?? []).filter((ref) => paths.includes(ref.path));
    if (named.length === 1) return { type: "resolved", symbolId: named[0].id };
    if (named.length > 1) return { type: "ambiguous", candidates: named.map((ref) => ref.id) };

    // Importing a class, constant or type still depends on the module.
    if (request.kind === "import") return this.pickModule(paths);
    return { type: "unresolved" };
  }

  private matchingPaths(sourcePath: string, specifier: string, resolution: "relative" | "suffix"): string[] {
    if (resolution === "relative") {
      const stems = moduleCandidates(resolveRelative(sourcePath, specifier));
      return [...this.byPath.keys()].filter((path) => stems.includes(stripSourceExtension(path)));
    }
    return [...this.byPath.keys()].filter((path) => path !== sourcePath && matchesSuffix(path, specifier));
  }

  private pickModule(paths: string[]): Resolution {
    const modules = paths.flatMap((path) => {
      const ref = this.modules.get(path);
      return ref ? [ref] : [];
    });
    if (modules.length === 1) return { type: "resolved", symbolId: modules[0].id };
    if (modules.length > 1) return { type: "ambiguous", candidates: modules.map((ref) => ref.id) };
    return { type: "unresolved" };
  }

  private pick(candidates: SymbolRef[], sourcePath: string): Resolution {
    const local = candidates.filter((ref) => ref.path === sourcePath);
    const pool = local.length > 0 ? local : candidates;
    if (pool.length === 1) return { type: "resolved", symbolId: pool[0].id };
    if (pool.length > 1) return { type: "ambiguous", candidates: pool.map((ref) => ref.id) };
    return { type: "unresolved" };
  }
}

/** `Repo.save` → `Repo`; top-level names have no owner. */
export function ownerOf(qualifiedName: string): string | null {
  const dot = qualifiedName.lastIndexOf(".");
  return dot > 0 ? qualifiedName.slice(0, dot) : null;
}
