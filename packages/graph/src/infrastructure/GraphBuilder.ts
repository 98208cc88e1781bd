/**
 * Incremental sync: turns a batch of source inputs into graph writes.
 *
 * A run moves through scanning, diffing and committing. Every file commits in
 * its own transaction, so a file that fails to scan or commit never blocks
 * the rest of the batch. Only a ConsistencyError ends a run early.
 */

import { nanoid } from "nanoid";
import pLimit from "p-limit";
import { Err, silentLogger, toError, type Logger, type Result } from "@depmap/core";
import { classify, strongest, strongestReach } from "../core/confidence.js";
import { CommitError, ConsistencyError, ScanError } from "../core/errors.js";
import {
  MODULE_SYMBOL,
  edgeKey,
  symbolKey,
  type FileError,
  type GraphSymbol,
  type Language,
  type ScanDrafts,
  type SourceInput,
  type SymbolChange,
  type SymbolDraft,
  type SyncOptions,
  type SyncReport,
  type SyncState,
} from "../core/model.js";
import { normalizePath } from "../core/paths.js";
import type { EdgeUpsert, GraphStore } from "../core/ports/GraphStore.js";
import type { SourceScanner } from "../core/ports/SourceScanner.js";
import { SymbolResolver } from "../core/SymbolResolver.js";
import { computeDigest, type ChecksumIndex } from "./ChecksumIndex.js";
import { KeyedMutex, type ReadWriteLock } from "./locks.js";
import type { ScannerRegistry } from "./scanners/ScannerRegistry.js";

const COMMIT_ATTEMPTS = 2;

export interface GraphBuilderOptions {
  store: GraphStore;
  registry: ScannerRegistry;
  index: ChecksumIndex;
  lock: ReadWriteLock;
  /** Serialises commits per path. */
  mutex: KeyedMutex;
  logger?: Logger;
  /** Files scanned in parallel. */
  concurrency?: number;
  onStateChange?: (state: SyncState) => void;
  clock?: () => Date;
}

/** An edge as planned, before it has an id or an observation count. */
type PlannedEdge = Omit<EdgeUpsert, "id" | "observations">;

interface ScanUnit {
  path: string;
  language: Language;
  digest: string;
  scanner: SourceScanner;
  content: string;
}

interface ScannedUnit {
  path: string;
  language: Language;
  digest: string;
  /** Null when the scan failed; stored symbols are then left alone. */
  drafts: ScanDrafts | null;
  error: ScanError | null;
}

interface PlannedSymbol extends SymbolDraft {
  id: string;
  key: string;
  created: boolean;
}

interface FilePlan {
  unit: ScannedUnit;
  symbols: PlannedSymbol[];
  /** Live symbols of the file that the new scan no longer declares. */
  removed: GraphSymbol[];
  /** Edges whose targets exist once this file's own symbols are written. */
  wave1: PlannedEdge[];
  /** Edges targeting symbols minted for another file in this run. */
  wave2: Array<{ edge: PlannedEdge; targetPath: string }>;
}

function emptyReport(): SyncReport {
  return {
    added: 0,
    modified: 0,
    removed: 0,
    unchanged: 0,
    failed: 0,
    succeeded: 0,
    errors: [],
    createdSymbols: [],
    tombstonedSymbols: [],
    promotedEdges: 0,
    cancelled: false,
    durationMs: 0,
  };
}

/** Collapse duplicate observations of one relation; the stronger class wins. */
export function mergeEdges(edges: PlannedEdge[]): PlannedEdge[] {
  const merged = new Map<string, PlannedEdge>();
  for (const edge of edges) {
    const key = edgeKey(edge);
    const seen = merged.get(key);
    merged.set(
      key,
      seen
        ? {
            ...seen,
            confidence: strongest(seen.confidence, edge.confidence),
            reach: strongestReach(seen.reach, edge.reach),
            line: Math.min(seen.line, edge.line),
          }
        : edge
    );
  }
  return [...merged.values()];
}

function groupBySource(edges: PlannedEdge[]): Map<string, PlannedEdge[]> {
  const groups = new Map<string, PlannedEdge[]>();
  for (const edge of edges) {
    const group = groups.get(edge.sourceId);
    if (group) group.push(edge);
    else groups.set(edge.sourceId, [edge]);
  }
  return groups;
}

export class GraphBuilder {
  private readonly store: GraphStore;
  private readonly registry: ScannerRegistry;
  private readonly index: ChecksumIndex;
  private readonly lock: ReadWriteLock;
  private readonly mutex: KeyedMutex;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly onStateChange?: (state: SyncState) => void;
  private readonly clock: () => Date;
  /** One run at a time. */
  private readonly runs = new KeyedMutex();
  private current: SyncState = "idle";

  constructor(options: GraphBuilderOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.index = options.index;
    this.lock = options.lock;
    this.mutex = options.mutex;
    this.logger = options.logger ?? silentLogger;
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.onStateChange = options.onStateChange;
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): SyncState {
    return this.current;
  }

  /**
   * Bring the graph in line with `inputs`. Resolves with a report even when
   * individual files fail; rejects only with a ConsistencyError.
   */
  sync(inputs: Iterable<SourceInput>, options: SyncOptions = {}): Promise<SyncReport> {
    const batch = [...inputs];
    return this.runs.run("sync", () => this.run(batch, options));
  }

  private async run(inputs: SourceInput[], options: SyncOptions): Promise<SyncReport> {
    const started = performance.now();
    const report = emptyReport();
    const { signal } = options;
    /** Digests recorded this run and what they replaced, until their file commits. */
    const pending = new Map<string, string | null>();
    this.logger.info("Sync started", { inputs: inputs.length, prune: options.prune ?? true });

    try {
      this.setState("scanning");
      const { units, seen } = this.triage(inputs, report, pending);
      const removedPaths = options.prune === false ? [] : this.index.sweep(seen);

      const scanned = await this.scanAll(units, signal);
      if (scanned.length < units.length) report.cancelled = true;
      for (const unit of scanned) {
        if (unit.error) this.fail(report, { path: unit.path, kind: "scan", message: unit.error.message });
      }

      this.setState("diffing");
      const plans = await this.lock.read(() => this.plan(scanned, removedPaths));

      this.setState("committing");
      const touched = new Set<string>();
      const failedPaths = new Set<string>();
      const committed: FilePlan[] = [];

      for (const plan of plans) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        const ok = await this.commit(plan.unit.path, report, () => this.writeFirstWave(plan, touched));
        if (ok) committed.push(plan);
        else failedPaths.add(plan.unit.path);
      }

      // Edges into a file that did not commit lose their target.
      const landed = new Set(committed.map((plan) => plan.unit.path));
      for (const plan of committed) {
        if (plan.wave2.length === 0) continue;
        const ok = await this.commit(plan.unit.path, report, () => this.writeSecondWave(plan, landed));
        if (!ok) failedPaths.add(plan.unit.path);
      }

      // A first wave that landed stays, even when the second one failed.
      for (const plan of committed) {
        const { path } = plan.unit;
        for (const symbol of plan.symbols) {
          touched.add(symbol.id);
          if (symbol.created) report.createdSymbols.push({ id: symbol.id, name: symbol.name, path });
        }
        for (const symbol of plan.removed) report.tombstonedSymbols.push({ id: symbol.id, name: symbol.name, path });
        if (failedPaths.has(path)) continue;
        pending.delete(path);
        if (!plan.unit.error) report.succeeded++;
      }

      if (!report.cancelled) {
        for (const path of removedPaths) {
          if (signal?.aborted) {
            report.cancelled = true;
            break;
          }
          await this.remove(path, report, touched);
        }
      }

      if (report.createdSymbols.length > 0 && !report.cancelled) {
        report.promotedEdges = await this.lock.write(() => this.promote(touched));
      }

      await this.lock.write(() => this.recomputeLeaves(touched));
    } catch (thrown) {
      if (thrown instanceof ConsistencyError) {
        this.logger.error("Sync aborted: graph consistency violated", { error: thrown.message });
      }
      throw thrown;
    } finally {
      for (const [path, previous] of pending) this.index.revert(path, previous);
      this.setState("idle");
    }

    report.errors.sort((a, b) => a.path.localeCompare(b.path));
    report.failed = new Set(report.errors.map((error) => error.path)).size;
    report.durationMs = Math.round(performance.now() - started);
    this.logger.info("Sync finished", {
      added: report.added,
      modified: report.modified,
      removed: report.removed,
      failed: report.failed,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
    });
    return report;
  }

  private setState(state: SyncState): void {
    if (state === this.current) return;
    this.current = state;
    this.onStateChange?.(state);
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================

  /** Pick the files that need a scan and record their digests. */
  private triage(
    inputs: SourceInput[],
    report: SyncReport,
    pending: Map<string, string | null>
  ): { units: ScanUnit[]; seen: Set<string> } {
    const units: ScanUnit[] = [];
    const seen = new Set<string>();

    for (const input of inputs) {
      const path = normalizePath(input.path);
      if (seen.has(path)) continue;
      seen.add(path);

      if ("error" in input) {
        const error = new ScanError(path, `Unreadable: ${input.error.message}`);
        this.fail(report, { path, kind: "scan", message: error.message });
        continue;
      }
      const match = this.registry.scannerFor(path);
      if (!match) {
        const error = new ScanError(path, "No scanner for this file type");
        this.fail(report, { path, kind: "scan", message: error.message });
        continue;
      }

      const digest = input.digest ?? computeDigest(input.content);
      const previous = this.index.get(path);
      const change = this.index.record(path, digest);
      if (change === "unchanged") {
        report.unchanged++;
        continue;
      }
      pending.set(path, previous);
      report[change]++;
      units.push({ path, language: match.language, digest, scanner: match.scanner, content: input.content });
    }
    return { units, seen };
  }

  /** Scan through the pool; units skipped after cancellation are left out. */
  private async scanAll(units: ScanUnit[], signal: AbortSignal | undefined): Promise<ScannedUnit[]> {
    const limit = pLimit(this.concurrency);
    const results = await Promise.all(
      units.map((unit) => limit(() => (signal?.aborted ? null : this.scan(unit))))
    );
    return results.filter((unit): unit is ScannedUnit => unit !== null);
  }

  private scan(unit: ScanUnit): ScannedUnit {
    let result: Result<ScanDrafts, ScanError>;
    try {
      result = unit.scanner.scan(unit.path, unit.content);
    } catch (thrown) {
      result = Err(new ScanError(unit.path, toError(thrown).message));
    }
    const { path, language, digest } = unit;
    if (result.ok) return { path, language, digest, drafts: result.value, error: null };
    return { path, language, digest, drafts: null, error: result.error };
  }

  // ==========================================================================
  // Diffing
  // ==========================================================================

  private plan(units: ScannedUnit[], removedPaths: string[]): FilePlan[] {
    const files = this.store.listFiles({ includeTombstoned: true });
    const pathById = new Map(files.map((file) => [file.id, file.path]));
    const fileByPath = new Map(files.map((file) => [file.path, file]));

    const resolver = new SymbolResolver();
    for (const symbol of this.store.listSymbols()) {
      const path = pathById.get(symbol.fileId);
      if (path !== undefined) resolver.add({ id: symbol.id, path, name: symbol.name, kind: symbol.kind });
    }
    for (const path of removedPaths) resolver.removePath(path);

    // Symbols first, so edges resolve against every file of the batch.
    const minted = new Map<string, string>();
    const plans: FilePlan[] = [];
    for (const unit of units) {
      const plan: FilePlan = { unit, symbols: [], removed: [], wave1: [], wave2: [] };
      plans.push(plan);
      if (!unit.drafts) continue;

      const existing = new Map<string, GraphSymbol>();
      const file = fileByPath.get(unit.path);
      if (file) {
        for (const symbol of this.store.symbolsIn(file.id)) existing.set(symbolKey(symbol.name, symbol.arity), symbol);
      }

      const keys = new Set<string>();
      for (const draft of unit.drafts.symbols) {
        const key = symbolKey(draft.name, draft.arity);
        if (keys.has(key)) continue;
        keys.add(key);
        const match = existing.get(key);
        const id = match?.id ?? nanoid(12);
        if (!match) minted.set(id, unit.path);
        plan.symbols.push({ ...draft, id, key, created: !match });
      }
      for (const [key, symbol] of existing) {
        if (!keys.has(key)) plan.removed.push(symbol);
      }

      resolver.removePath(unit.path);
      for (const symbol of plan.symbols) {
        resolver.add({ id: symbol.id, path: unit.path, name: symbol.name, kind: symbol.kind });
      }
    }

    for (const plan of plans) {
      const { drafts, path } = plan.unit;
      if (!drafts) continue;
      const byKey = new Map(plan.symbols.map((symbol) => [symbol.key, symbol]));
      const moduleSymbol = byKey.get(symbolKey(MODULE_SYMBOL, 0));

      const edges: PlannedEdge[] = [];
      for (const draft of drafts.edges) {
        const source = byKey.get(draft.sourceKey) ?? moduleSymbol;
        if (!source) continue;
        const resolution = resolver.resolve({
          sourcePath: path,
          sourceName: source.name,
          targetName: draft.targetName,
          hint: draft.hint,
          kind: draft.kind,
        });
        edges.push({
          sourceId: source.id,
          targetId: resolution.type === "resolved" ? resolution.symbolId : null,
          targetName: draft.targetName,
          hint: draft.hint,
          kind: draft.kind,
          confidence: classify(draft.reach, resolution),
          reach: draft.reach,
          line: draft.line,
        });
      }

      for (const edge of mergeEdges(edges)) {
        const targetPath = edge.targetId === null ? undefined : minted.get(edge.targetId);
        if (targetPath !== undefined && targetPath !== path) plan.wave2.push({ edge, targetPath });
        else plan.wave1.push(edge);
      }
    }
    return plans;
  }

  // ==========================================================================
  // Committing
  // ==========================================================================

  /**
   * Run one file unit under its path mutex and the write lock. A failed
   * commit is retried once; a ConsistencyError is never retried.
   */
  private async commit(path: string, report: SyncReport, write: () => void): Promise<boolean> {
    let failure: CommitError | null = null;
    for (let attempt = 1; attempt <= COMMIT_ATTEMPTS; attempt++) {
      try {
        await this.mutex.run(path, () => this.lock.write(() => this.store.transaction(write)));
        return true;
      } catch (thrown) {
        if (thrown instanceof ConsistencyError) throw thrown;
        failure = new CommitError(path, toError(thrown));
        this.logger.debug("Commit attempt failed", { path, attempt, error: failure.message });
      }
    }
    const message = failure?.message ?? `${path}: commit failed`;
    this.logger.warn("Commit failed", { path, error: message });
    this.fail(report, { path, kind: "commit", message });
    return false;
  }

  private writeFirstWave(plan: FilePlan, touched: Set<string>): void {
    const { unit } = plan;
    const file = this.store.upsertFile({
      path: unit.path,
      language: unit.language,
      digest: unit.digest,
      lastSyncedAt: this.clock().toISOString(),
      lastError: unit.error?.message ?? null,
    });
    // Stale beats empty: a failed scan leaves the stored symbols in place.
    if (!unit.drafts) return;

    this.store.upsertSymbols(
      file.id,
      plan.symbols.map((symbol) => ({
        id: symbol.id,
        name: symbol.name,
        kind: symbol.kind,
        arity: symbol.arity,
        signature: symbol.signature,
        line: symbol.line,
        endLine: symbol.endLine,
      }))
    );

    const bySource = groupBySource(plan.wave1);
    for (const symbol of plan.symbols) {
      this.applyEdges(symbol.id, bySource.get(symbol.id) ?? [], true);
    }

    const outcome = this.store.tombstoneSymbols(
      plan.removed.map((symbol) => symbol.id),
      this.clock().toISOString()
    );
    for (const id of outcome.retaggedSources) touched.add(id);
  }

  private writeSecondWave(plan: FilePlan, landed: ReadonlySet<string>): void {
    const edges = plan.wave2.map(({ edge, targetPath }) =>
      landed.has(targetPath)
        ? edge
        : { ...edge, targetId: null, confidence: classify(edge.reach, { type: "unresolved" }) }
    );
    for (const [sourceId, group] of groupBySource(edges)) {
      this.applyEdges(sourceId, group, false);
    }
  }

  /**
   * Write the planned outgoing edges of one symbol. Edges already stored
   * under the same key keep their id and count one more observation; with
   * `prune`, stored edges not planned any more are deleted first.
   */
  private applyEdges(sourceId: string, planned: PlannedEdge[], prune: boolean): void {
    const current = new Map(this.store.edgesFrom(sourceId).map((edge) => [edgeKey(edge), edge]));
    const edges = mergeEdges(planned);

    if (prune) {
      const wanted = new Set(edges.map((edge) => edgeKey(edge)));
      const stale = [...current.entries()].filter(([key]) => !wanted.has(key)).map(([, edge]) => edge.id);
      if (stale.length > 0) this.store.deleteEdges(stale);
    }

    this.store.upsertEdges(
      edges.map((edge) => {
        const existing = current.get(edgeKey(edge));
        return existing
          ? { ...edge, id: existing.id, observations: existing.observations + 1 }
          : { ...edge, id: nanoid(12), observations: 1 };
      })
    );
  }

  private async remove(path: string, report: SyncReport, touched: Set<string>): Promise<void> {
    const file = await this.lock.read(() => this.store.getFileByPath(path));
    if (!file || file.tombstonedAt !== null) {
      this.index.forget(path);
      return;
    }
    let tombstoned: SymbolChange[] = [];
    const ok = await this.commit(path, report, () => {
      const names = new Map(this.store.symbolsIn(file.id).map((symbol) => [symbol.id, symbol.name]));
      const outcome = this.store.tombstoneFile(file.id, this.clock().toISOString());
      tombstoned = outcome.symbolIds.map((id) => ({ id, name: names.get(id) ?? id, path }));
      for (const id of outcome.retaggedSources) touched.add(id);
    });
    if (!ok) return;
    this.index.forget(path);
    report.removed++;
    report.tombstonedSymbols.push(...tombstoned);
  }

  // ==========================================================================
  // Promotion and leaves
  // ==========================================================================

  /**
   * Re-resolve stored edges that have no target. New symbols can make an
   * unresolved reference from an untouched file resolvable.
   */
  private promote(touched: Set<string>): number {
    const unresolved = this.store.unresolvedEdges().filter((edge) => edge.hint.type !== "opaque");
    if (unresolved.length === 0) return 0;

    const paths = new Map(this.store.listFiles().map((file) => [file.id, file.path]));
    const resolver = new SymbolResolver();
    const sources = new Map<string, { name: string; path: string }>();
    for (const symbol of this.store.listSymbols()) {
      const path = paths.get(symbol.fileId);
      if (path === undefined) continue;
      resolver.add({ id: symbol.id, path, name: symbol.name, kind: symbol.kind });
      sources.set(symbol.id, { name: symbol.name, path });
    }

    let promoted = 0;
    this.store.transaction(() => {
      for (const edge of unresolved) {
        const source = sources.get(edge.sourceId);
        if (!source) continue;
        const resolution = resolver.resolve({
          sourcePath: source.path,
          sourceName: source.name,
          targetName: edge.targetName,
          hint: edge.hint,
          kind: edge.kind,
        });
        if (resolution.type !== "resolved") continue;

        const next = { ...edge, targetId: resolution.symbolId, confidence: classify(edge.reach, resolution) };
        const key = edgeKey(next);
        const twin = this.store.edgesFrom(edge.sourceId).find((other) => other.id !== edge.id && edgeKey(other) === key);
        if (twin) {
          this.store.deleteEdges([edge.id]);
          this.store.upsertEdges([{ ...twin, observations: twin.observations + edge.observations }]);
        } else {
          this.store.upsertEdges([next]);
        }
        touched.add(edge.sourceId);
        promoted++;
      }
    });
    if (promoted > 0) this.logger.debug("Promoted unresolved edges", { promoted });
    return promoted;
  }

  private recomputeLeaves(ids: Iterable<string>): void {
    this.store.transaction(() => {
      for (const id of ids) {
        if (!this.store.getSymbol(id)) continue;
        const isLeaf = !this.store.edgesFrom(id).some((edge) => edge.confidence === "resolved");
        this.store.setLeaf(id, isLeaf);
      }
    });
  }

  private fail(report: SyncReport, error: FileError): void {
    if (error.kind === "scan") this.logger.warn("Scan failed", { path: error.path, error: error.message });
    report.errors.push(error);
  }
}
