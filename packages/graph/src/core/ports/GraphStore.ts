/**
 * Persistence port for the dependency graph.
 *
 * Adapters are synchronous: every write of a file unit runs inside one
 * `transaction` call and a thrown error rolls all of it back. Adapters
 * enforce the graph invariants and throw ConsistencyError on violation.
 */

import type {
  Confidence,
  GraphEdge,
  GraphStats,
  GraphSymbol,
  Language,
  Reach,
  RelationKind,
  SourceFile,
  SymbolKind,
  TargetHint,
} from "../model.js";

export interface FileUpsert {
  path: string;
  language: Language;
  digest: string;
  lastSyncedAt: string;
  lastError: string | null;
}

export interface SymbolUpsert {
  id: string;
  name: string;
  kind: SymbolKind;
  arity: number;
  signature: string | null;
  line: number;
  endLine: number;
}

export interface EdgeUpsert {
  id: string;
  sourceId: string;
  targetId: string | null;
  targetName: string;
  hint: TargetHint;
  kind: RelationKind;
  confidence: Confidence;
  reach: Reach;
  observations: number;
  line: number;
}

export interface TombstoneOutcome {
  /** Symbols tombstoned by this call. */
  symbolIds: string[];
  /** Edges deleted because their source was tombstoned. */
  deletedEdges: number;
  /** Live symbols whose outgoing edges were re-tagged `external`. */
  retaggedSources: string[];
}

export interface ListOptions {
  includeTombstoned?: boolean;
}

export interface GraphStore {
  transaction<T>(fn: () => T): T;

  // Files
  /** Insert or update by path; revives a tombstoned file under its old id. */
  upsertFile(file: FileUpsert): SourceFile;
  getFile(id: string): SourceFile | null;
  getFileByPath(path: string): SourceFile | null;
  listFiles(options?: ListOptions): SourceFile[];
  /** Tombstone the file and all its live symbols. */
  tombstoneFile(fileId: string, at: string): TombstoneOutcome;

  // Symbols
  /** Insert or update by id; new symbols start as leaves. */
  upsertSymbols(fileId: string, symbols: SymbolUpsert[]): GraphSymbol[];
  /**
   * Tombstone symbols, delete the edges they source and re-tag edges that
   * target them as `external`.
   */
  tombstoneSymbols(ids: string[], at: string): TombstoneOutcome;
  getSymbol(id: string, options?: ListOptions): GraphSymbol | null;
  /** Live symbols of a file, ordered by line. */
  symbolsIn(fileId: string): GraphSymbol[];
  findSymbolsByName(name: string): GraphSymbol[];
  listSymbols(): GraphSymbol[];
  setLeaf(symbolId: string, isLeaf: boolean): void;

  // Edges
  upsertEdges(edges: EdgeUpsert[]): GraphEdge[];
  deleteEdges(ids: string[]): void;
  edgesFrom(symbolId: string): GraphEdge[];
  edgesTo(symbolId: string): GraphEdge[];
  listEdges(): GraphEdge[];
  /** Edges without a target, candidates for promotion. */
  unresolvedEdges(): GraphEdge[];

  stats(): GraphStats;
  close(): void;
}
