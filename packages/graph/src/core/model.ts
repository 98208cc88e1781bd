/**
 * Core data model for the dependency graph.
 *
 * Files own symbols, symbols own outgoing edges. Nothing is ever hard-deleted:
 * files and symbols are tombstoned so historical ids stay meaningful, edges
 * are derived facts regenerated on every scan.
 */

export type Language = "typescript" | "javascript" | "python" | "go" | "rust" | "java";

export type SymbolKind = "function" | "method" | "module";

export type RelationKind = "call" | "import" | "compose";

/** What the scanner saw at the reference site. */
export type Reach = "direct" | "conditional" | "indirect";

/**
 * Certainty of an edge, strongest first:
 * resolved > conditional > dynamic > external.
 */
export type Confidence = "resolved" | "conditional" | "dynamic" | "external";

export type ChangeKind = "unchanged" | "added" | "modified" | "removed";

export type SyncState = "idle" | "scanning" | "diffing" | "committing";

/** Name of the synthetic symbol that owns top-level code and imports. */
export const MODULE_SYMBOL = "<module>";

export interface SourceFile {
  id: string;
  path: string;
  language: Language;
  digest: string;
  lastSyncedAt: string;
  tombstonedAt: string | null;
  /** Message of the last failed scan; null once a scan succeeds. */
  lastError: string | null;
}

export interface GraphSymbol {
  id: string;
  fileId: string;
  /** Qualified for members: `Class.method`. */
  name: string;
  kind: SymbolKind;
  arity: number;
  signature: string | null;
  line: number;
  endLine: number;
  /** True iff the symbol has no outgoing `resolved` edge. */
  isLeaf: boolean;
  tombstonedAt: string | null;
}

/**
 * How a reference names its target. Kept with the edge so an unresolved
 * edge can be re-resolved when new symbols appear.
 */
export type TargetHint =
  /** `helper()` */
  | { type: "bare" }
  /** `this.save()`, `self.save()` */
  | { type: "self" }
  /** `Repo.find()`, `fmt.Println()` */
  | { type: "member"; receiver: string }
  /** A binding imported from another module. */
  | { type: "module"; specifier: string; resolution: ModuleResolution }
  /** Computed at run time; never resolvable. */
  | { type: "opaque" };

/**
 * `relative`: `./util`, resolved against the importing file.
 * `suffix`: `pkg/util`, matched against the end of in-tree paths.
 * `package`: a third-party package, always external.
 */
export type ModuleResolution = "relative" | "suffix" | "package";

export interface GraphEdge {
  id: string;
  sourceId: string;
  targetId: string | null;
  /** Name looked up at resolution time; present even when unresolved. */
  targetName: string;
  hint: TargetHint;
  kind: RelationKind;
  confidence: Confidence;
  reach: Reach;
  observations: number;
  line: number;
}

// ============================================================================
// Scanner output
// ============================================================================

export interface SymbolDraft {
  name: string;
  kind: SymbolKind;
  arity: number;
  signature: string | null;
  line: number;
  endLine: number;
}

export interface EdgeDraft {
  /** `symbolKey()` of the enclosing draft. */
  sourceKey: string;
  targetName: string;
  hint: TargetHint;
  kind: RelationKind;
  reach: Reach;
  line: number;
}

export interface ScanDrafts {
  symbols: SymbolDraft[];
  edges: EdgeDraft[];
}

/** Identity of a symbol within its file. */
export function symbolKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}

/** Human-readable form of an edge target, e.g. `./util#helper`. */
export function describeTarget(name: string, hint: TargetHint): string {
  switch (hint.type) {
    case "bare":
      return name;
    case "self":
      return `this.${name}`;
    case "member":
      return `${hint.receiver}.${name}`;
    case "module":
      return `${hint.specifier}#${name}`;
    case "opaque":
      return `?${name}`;
  }
}

/** The target half of an edge's identity: its symbol id or `external:<descriptor>`. */
export function targetKey(edge: Pick<GraphEdge, "targetId" | "targetName" | "hint">): string {
  return edge.targetId ?? `external:${describeTarget(edge.targetName, edge.hint)}`;
}

/** Dedupe key: one edge per (source, target, kind). */
export function edgeKey(edge: Pick<GraphEdge, "sourceId" | "targetId" | "targetName" | "hint" | "kind">): string {
  return `${edge.sourceId}\u0000${targetKey(edge)}\u0000${edge.kind}`;
}

// ============================================================================
// Inputs and reports
// ============================================================================

/** One file handed to `sync`, either read or failed to read. */
export type SourceInput =
  | { path: string; content: string; digest?: string }
  | { path: string; error: Error };

export interface FileError {
  path: string;
  kind: "scan" | "commit";
  message: string;
}

/** A symbol that appeared or was tombstoned during a sync run. */
export interface SymbolChange {
  id: string;
  name: string;
  path: string;
}

export interface SyncReport {
  added: number;
  modified: number;
  removed: number;
  unchanged: number;
  failed: number;
  succeeded: number;
  errors: FileError[];
  createdSymbols: SymbolChange[];
  tombstonedSymbols: SymbolChange[];
  promotedEdges: number;
  cancelled: boolean;
  durationMs: number;
}

export interface SyncOptions {
  /** Tombstone known files missing from the input. Default true. */
  prune?: boolean;
  signal?: AbortSignal;
}

export interface Cycle {
  symbolIds: string[];
  names: string[];
  /** Weakest edge on the walk. */
  confidence: "resolved" | "conditional";
}

export type Certainty = "certain" | "possible";

export interface ImpactEntry {
  symbol: GraphSymbol;
  depth: number;
  certainty: Certainty;
  /** Strongest edge confidence by which the entry was reached. */
  via: Confidence;
}

export interface ImpactOptions {
  maxDepth?: number;
  /** Dependents followed per node, strongest first. */
  maxFanOut?: number;
  /** Total entries returned. */
  limit?: number;
}

export interface ImpactResult {
  entries: ImpactEntry[];
  truncated: boolean;
}

export interface GraphStats {
  files: number;
  symbols: number;
  edges: number;
  byConfidence: Record<Confidence, number>;
  byKind: Record<RelationKind, number>;
}
