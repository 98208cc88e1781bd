/**
 * In-memory GraphStore for tests and throwaway sessions.
 * Transactions keep an undo journal and replay it backwards on failure.
 */

import { nanoid } from "nanoid";
import { ConsistencyError } from "../../core/errors.js";
import {
  edgeKey,
  type Confidence,
  type GraphEdge,
  type GraphStats,
  type GraphSymbol,
  type RelationKind,
  type SourceFile,
} from "../../core/model.js";
import type {
  EdgeUpsert,
  FileUpsert,
  GraphStore,
  ListOptions,
  SymbolUpsert,
  TombstoneOutcome,
} from "../../core/ports/GraphStore.js";

function addTo<K, V>(index: Map<K, Set<V>>, key: K, value: V): void {
  const bucket = index.get(key);
  if (bucket) bucket.add(value);
  else index.set(key, new Set([value]));
}

function removeFrom<K, V>(index: Map<K, Set<V>>, key: K, value: V): void {
  const bucket = index.get(key);
  if (!bucket) return;
  bucket.delete(value);
  if (bucket.size === 0) index.delete(key);
}

function byLine(a: GraphSymbol, b: GraphSymbol): number {
  return a.line - b.line || a.name.localeCompare(b.name);
}

export class InMemoryGraphStore implements GraphStore {
  private files = new Map<string, SourceFile>();
  private fileByPath = new Map<string, string>();
  private symbols = new Map<string, GraphSymbol>();
  private symbolsByFile = new Map<string, Set<string>>();
  private symbolsByName = new Map<string, Set<string>>();
  private edges = new Map<string, GraphEdge>();
  private edgesBySource = new Map<string, Set<string>>();
  private edgesByTarget = new Map<string, Set<string>>();
  private edgeByKey = new Map<string, string>();
  private journal: Array<() => void> | null = null;

  transaction<T>(fn: () => T): T {
    if (this.journal !== null) return fn();
    const journal: Array<() => void> = [];
    this.journal = journal;
    try {
      const result = fn();
      this.journal = null;
      return result;
    } catch (error) {
      this.journal = null;
      for (let i = journal.length - 1; i >= 0; i--) journal[i]();
      throw error;
    }
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  upsertFile(file: FileUpsert): SourceFile {
    const existingId = this.fileByPath.get(file.path);
    const next: SourceFile = {
      id: existingId ?? nanoid(12),
      path: file.path,
      language: file.language,
      digest: file.digest,
      lastSyncedAt: file.lastSyncedAt,
      tombstonedAt: null,
      lastError: file.lastError,
    };
    this.setFile(next.id, next);
    return next;
  }

  getFile(id: string): SourceFile | null {
    return this.files.get(id) ?? null;
  }

  getFileByPath(path: string): SourceFile | null {
    const id = this.fileByPath.get(path);
    return id === undefined ? null : this.getFile(id);
  }

  listFiles(options: ListOptions = {}): SourceFile[] {
    return [...this.files.values()]
      .filter((file) => options.includeTombstoned || file.tombstonedAt === null)
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  tombstoneFile(fileId: string, at: string): TombstoneOutcome {
    const file = this.files.get(fileId);
    if (!file) throw new ConsistencyError(`Unknown file ${fileId}`);
    const symbolIds = [...(this.symbolsByFile.get(fileId) ?? [])];
    const outcome = this.tombstoneSymbols(symbolIds, at);
    if (file.tombstonedAt === null) this.setFile(fileId, { ...file, tombstonedAt: at });
    return outcome;
  }

  // ==========================================================================
  // Symbols
  // ==========================================================================

  upsertSymbols(fileId: string, symbols: SymbolUpsert[]): GraphSymbol[] {
    const file = this.files.get(fileId);
    if (!file || file.tombstonedAt !== null) {
      throw new ConsistencyError(`Cannot add symbols to missing or tombstoned file ${fileId}`);
    }
    return symbols.map((symbol) => {
      const existing = this.symbols.get(symbol.id);
      if (existing && existing.fileId !== fileId) {
        throw new ConsistencyError(`Symbol ${symbol.id} belongs to file ${existing.fileId}`);
      }
      const next: GraphSymbol = {
        ...symbol,
        fileId,
        isLeaf: existing?.isLeaf ?? true,
        tombstonedAt: null,
      };
      this.setSymbol(symbol.id, next);
      return next;
    });
  }

  tombstoneSymbols(ids: string[], at: string): TombstoneOutcome {
    const tombstoned = new Set<string>();
    for (const id of ids) {
      const symbol = this.symbols.get(id);
      if (!symbol || symbol.tombstonedAt !== null) continue;
      this.setSymbol(id, { ...symbol, tombstonedAt: at });
      tombstoned.add(id);
    }

    let deletedEdges = 0;
    for (const id of tombstoned) {
      for (const edgeId of [...(this.edgesBySource.get(id) ?? [])]) {
        this.setEdge(edgeId, null);
        deletedEdges++;
      }
    }

    const retagged = new Set<string>();
    for (const id of tombstoned) {
      for (const edgeId of [...(this.edgesByTarget.get(id) ?? [])]) {
        const edge = this.edges.get(edgeId);
        if (!edge) continue;
        this.retag(edge);
        retagged.add(edge.sourceId);
      }
    }

    return { symbolIds: [...tombstoned], deletedEdges, retaggedSources: [...retagged] };
  }

  getSymbol(id: string, options: ListOptions = {}): GraphSymbol | null {
    const symbol = this.symbols.get(id);
    if (!symbol) return null;
    if (symbol.tombstonedAt !== null && !options.includeTombstoned) return null;
    return symbol;
  }

  symbolsIn(fileId: string): GraphSymbol[] {
    return this.liveSymbols(this.symbolsByFile.get(fileId)).sort(byLine);
  }

  findSymbolsByName(name: string): GraphSymbol[] {
    const matches = this.liveSymbols(this.symbolsByName.get(name));
    for (const symbol of this.symbols.values()) {
      if (symbol.tombstonedAt === null && symbol.name.endsWith(`.${name}`)) matches.push(symbol);
    }
    return matches;
  }

  listSymbols(): GraphSymbol[] {
    return this.liveSymbols(this.symbols.keys());
  }

  setLeaf(symbolId: string, isLeaf: boolean): void {
    const symbol = this.symbols.get(symbolId);
    if (!symbol || symbol.isLeaf === isLeaf) return;
    this.setSymbol(symbolId, { ...symbol, isLeaf });
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  upsertEdges(edges: EdgeUpsert[]): GraphEdge[] {
    return edges.map((edge) => {
      this.assertLive(edge.sourceId, "source");
      if (edge.targetId !== null) this.assertLive(edge.targetId, "target");
      const key = edgeKey(edge);
      const holder = this.edgeByKey.get(key);
      if (holder !== undefined && holder !== edge.id) {
        throw new ConsistencyError(`Duplicate edge ${edge.sourceId} -> ${edge.targetId ?? edge.targetName} (${edge.kind})`);
      }
      const next: GraphEdge = { ...edge };
      this.setEdge(edge.id, next);
      return next;
    });
  }

  deleteEdges(ids: string[]): void {
    for (const id of ids) this.setEdge(id, null);
  }

  edgesFrom(symbolId: string): GraphEdge[] {
    return this.edgeList(this.edgesBySource.get(symbolId));
  }

  edgesTo(symbolId: string): GraphEdge[] {
    return this.edgeList(this.edgesByTarget.get(symbolId));
  }

  listEdges(): GraphEdge[] {
    return [...this.edges.values()];
  }

  unresolvedEdges(): GraphEdge[] {
    return this.listEdges().filter((edge) => edge.targetId === null);
  }

  stats(): GraphStats {
    const byConfidence: Record<Confidence, number> = { resolved: 0, conditional: 0, dynamic: 0, external: 0 };
    const byKind: Record<RelationKind, number> = { call: 0, import: 0, compose: 0 };
    for (const edge of this.edges.values()) {
      byConfidence[edge.confidence]++;
      byKind[edge.kind]++;
    }
    return {
      files: this.listFiles().length,
      symbols: this.listSymbols().length,
      edges: this.edges.size,
      byConfidence,
      byKind,
    };
  }

  close(): void {
    this.files.clear();
    this.fileByPath.clear();
    this.symbols.clear();
    this.symbolsByFile.clear();
    this.symbolsByName.clear();
    this.edges.clear();
    this.edgesBySource.clear();
    this.edgesByTarget.clear();
    this.edgeByKey.clear();
  }

  // ==========================================================================
  // Journaled primitives
  // ==========================================================================

  private record(undo: () => void): void {
    this.journal?.push(undo);
  }

  private setFile(id: string, next: SourceFile | null): void {
    const previous = this.files.get(id) ?? null;
    if (previous) this.fileByPath.delete(previous.path);
    if (next) {
      this.files.set(id, next);
      this.fileByPath.set(next.path, id);
    } else {
      this.files.delete(id);
    }
    this.record(() => this.setFile(id, previous));
  }

  private setSymbol(id: string, next: GraphSymbol | null): void {
    const previous = this.symbols.get(id) ?? null;
    if (previous) {
      removeFrom(this.symbolsByFile, previous.fileId, id);
      removeFrom(this.symbolsByName, previous.name, id);
    }
    if (next) {
      this.symbols.set(id, next);
      addTo(this.symbolsByFile, next.fileId, id);
      addTo(this.symbolsByName, next.name, id);
    } else {
      this.symbols.delete(id);
    }
    this.record(() => this.setSymbol(id, previous));
  }

  private setEdge(id: string, next: GraphEdge | null): void {
    const previous = this.edges.get(id) ?? null;
    if (previous) {
      removeFrom(this.edgesBySource, previous.sourceId, id);
      if (previous.targetId !== null) removeFrom(this.edgesByTarget, previous.targetId, id);
      this.edgeByKey.delete(edgeKey(previous));
    }
    if (next) {
      this.edges.set(id, next);
      addTo(this.edgesBySource, next.sourceId, id);
      if (next.targetId !== null) addTo(this.edgesByTarget, next.targetId, id);
      this.edgeByKey.set(edgeKey(next), id);
    } else {
      this.edges.delete(id);
    }
    this.record(() => this.setEdge(id, previous));
  }

  /** Point an edge at nothing; fold it into an existing external twin. */
  private retag(edge: GraphEdge): void {
    const next: GraphEdge = { ...edge, targetId: null, confidence: "external" };
    const twinId = this.edgeByKey.get(edgeKey(next));
    const twin = twinId === undefined ? undefined : this.edges.get(twinId);
    if (twin && twin.id !== edge.id) {
      this.setEdge(edge.id, null);
      this.setEdge(twin.id, { ...twin, observations: twin.observations + edge.observations });
      return;
    }
    this.setEdge(edge.id, next);
  }

  private assertLive(symbolId: string, role: "source" | "target"): void {
    const symbol = this.symbols.get(symbolId);
    if (!symbol || symbol.tombstonedAt !== null) {
      throw new ConsistencyError(`Edge ${role} ${symbolId} is missing or tombstoned`);
    }
  }

  private liveSymbols(ids: Iterable<string> | undefined): GraphSymbol[] {
    const result: GraphSymbol[] = [];
    for (const id of ids ?? []) {
      const symbol = this.symbols.get(id);
      if (symbol && symbol.tombstonedAt === null) result.push(symbol);
    }
    return result;
  }

  private edgeList(ids: Set<string> | undefined): GraphEdge[] {
    const result: GraphEdge[] = [];
    for (const id of ids ?? []) {
      const edge = this.edges.get(id);
      if (edge) result.push(edge);
    }
    return result;
  }
}
