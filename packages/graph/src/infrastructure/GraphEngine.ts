/**
 * Query facade over the dependency graph.
 *
 * Owns the store, the sync engine and the analyzers, and puts every query
 * behind the shared read lock so it never sees a half-written file.
 */

import { Err, Ok, createLogger, map, type Logger, type Result } from "@depmap/core";
import type {
  Cycle,
  GraphEdge,
  GraphStats,
  GraphSymbol,
  ImpactEntry,
  ImpactOptions,
  ImpactResult,
  SourceFile,
  SourceInput,
  SyncOptions,
  SyncReport,
  SyncState,
} from "../core/model.js";
import { normalizePath } from "../core/paths.js";
import type { GraphStore } from "../core/ports/GraphStore.js";
import { ChecksumIndex } from "./ChecksumIndex.js";
import { CycleDetector, type CycleReport } from "./CycleDetector.js";
import { GraphBuilder } from "./GraphBuilder.js";
import { DEFAULT_MAX_DEPTH, ImpactAnalyzer } from "./ImpactAnalyzer.js";
import { KeyedMutex, ReadWriteLock } from "./locks.js";
import { createDefaultRegistry, type ScannerRegistry } from "./scanners/ScannerRegistry.js";

export interface GraphEngineOptions {
  store: GraphStore;
  registry?: ScannerRegistry;
  logger?: Logger;
  concurrency?: number;
  /** Default depth of `impactOf`. */
  maxDepth?: number;
  cycleStepsPerNode?: number;
  onStateChange?: (state: SyncState) => void;
  clock?: () => Date;
}

/** A symbol with its file and both edge directions. */
export interface SymbolDetail {
  symbol: GraphSymbol;
  file: SourceFile | null;
  incoming: GraphEdge[];
  outgoing: GraphEdge[];
  /** Names of the symbols at the other end of each edge, by id. */
  names: Map<string, string>;
}

/** An edge together with the symbol and file it starts from. */
export interface EdgeView {
  edge: GraphEdge;
  source: GraphSymbol;
  path: string;
}

export class GraphEngine {
  private readonly lock = new ReadWriteLock();
  private readonly builder: GraphBuilder;
  private readonly cycles: CycleDetector;
  private readonly impact: ImpactAnalyzer;
  readonly registry: ScannerRegistry;

  private constructor(
    private readonly store: GraphStore,
    options: GraphEngineOptions,
    index: ChecksumIndex,
    logger: Logger
  ) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.builder = new GraphBuilder({
      store,
      registry: this.registry,
      index,
      lock: this.lock,
      mutex: new KeyedMutex(),
      logger: logger.child("sync"),
      concurrency: options.concurrency,
      onStateChange: options.onStateChange,
      clock: options.clock,
    });
    this.cycles = new CycleDetector(store, {
      stepsPerNode: options.cycleStepsPerNode,
      logger: logger.child("cycles"),
    });
    this.impact = new ImpactAnalyzer(store, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  }

  /** Build an engine whose checksum index starts from the stored files. */
  static create(options: GraphEngineOptions): GraphEngine {
    const logger = options.logger ?? createLogger("graph");
    const seed = options.store.listFiles().map((file) => [file.path, file.digest] as const);
    const index = new ChecksumIndex(seed);
    logger.debug("Engine ready", { files: index.size });
    return new GraphEngine(options.store, options, index, logger);
  }

  get syncState(): SyncState {
    return this.builder.state;
  }

  sync(files: Iterable<SourceInput>, options: SyncOptions = {}): Promise<SyncReport> {
    return this.builder.sync(files, options);
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  async findCycles(): Promise<Cycle[]> {
    const report = await this.cycleReport();
    return report.cycles;
  }

  cycleReport(): Promise<CycleReport> {
    return this.lock.read(() => this.cycles.findCycles());
  }

  /** Live functions and methods nothing refers to. */
  findOrphans(): Promise<GraphSymbol[]> {
    return this.lock.read(() =>
      this.store
        .listSymbols()
        .filter((symbol) => symbol.kind !== "module" && this.store.edgesTo(symbol.id).length === 0)
        .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id))
    );
  }

  /** Edges classified `dynamic`: reflection, computed dispatch, ambiguous names. */
  uncertainEdges(): Promise<EdgeView[]> {
    return this.lock.read(() => {
      const paths = new Map(this.store.listFiles().map((file) => [file.id, file.path]));
      const views: EdgeView[] = [];
      for (const edge of this.store.listEdges()) {
        if (edge.confidence !== "dynamic") continue;
        const source = this.store.getSymbol(edge.sourceId);
        if (!source) continue;
        views.push({ edge, source, path: paths.get(source.fileId) ?? "" });
      }
      return views.sort((a, b) => a.path.localeCompare(b.path) || a.edge.line - b.edge.line);
    });
  }

  // ==========================================================================
  // Impact
  // ==========================================================================

  async impactOf(symbolId: string, depth?: number | ImpactOptions): Promise<Result<ImpactEntry[], Error>> {
    return map(await this.impactReport(symbolId, depth), (impact) => impact.entries);
  }

  /**
   * Dependents of a symbol. Err for an id the graph never had; a tombstoned
   * symbol has no dependents left and yields an empty result.
   */
  impactReport(symbolId: string, depth?: number | ImpactOptions): Promise<Result<ImpactResult, Error>> {
    const options: ImpactOptions = typeof depth === "number" ? { maxDepth: depth } : (depth ?? {});
    return this.lock.read(() => {
      const symbol = this.store.getSymbol(symbolId, { includeTombstoned: true });
      if (!symbol) return Err(new Error(`Unknown symbol: ${symbolId}`));
      if (symbol.tombstonedAt !== null) return Ok({ entries: [], truncated: false });
      return Ok(this.impact.impactOf(symbolId, options));
    });
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /** Live symbols of a file, given its id or its path. */
  symbolsIn(fileIdOrPath: string): Promise<GraphSymbol[]> {
    return this.lock.read(() => {
      const file = this.store.getFile(fileIdOrPath) ?? this.store.getFileByPath(normalizePath(fileIdOrPath));
      return file ? this.store.symbolsIn(file.id) : [];
    });
  }

  getSymbol(symbolId: string): Promise<Result<SymbolDetail, Error>> {
    return this.lock.read(() => {
      const symbol = this.store.getSymbol(symbolId);
      if (!symbol) return Err(new Error(`Unknown symbol: ${symbolId}`));
      const incoming = this.store.edgesTo(symbolId);
      const outgoing = this.store.edgesFrom(symbolId);
      const names = new Map<string, string>();
      for (const id of [...incoming.map((e) => e.sourceId), ...outgoing.map((e) => e.targetId)]) {
        if (id === null || names.has(id)) continue;
        const other = this.store.getSymbol(id);
        if (other) names.set(id, other.name);
      }
      return Ok({ symbol, file: this.store.getFile(symbol.fileId), incoming, outgoing, names });
    });
  }

  /** Exact name, or the member part of a qualified name (`save` finds `Repo.save`). */
  findSymbols(name: string): Promise<GraphSymbol[]> {
    return this.lock.read(() =>
      this.store.findSymbolsByName(name).sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id))
    );
  }

  getFile(fileIdOrPath: string): Promise<SourceFile | null> {
    return this.lock.read(
      () => this.store.getFile(fileIdOrPath) ?? this.store.getFileByPath(normalizePath(fileIdOrPath))
    );
  }

  /** Path of every live file, by file id. */
  filePaths(): Promise<Map<string, string>> {
    return this.lock.read(() => new Map(this.store.listFiles().map((file) => [file.id, file.path])));
  }

  stats(): Promise<GraphStats> {
    return this.lock.read(() => this.store.stats());
  }

  close(): void {
    this.store.close();
  }
}
