/**
 * SQLite persistence for the dependency graph (better-sqlite3).
 *
 * Use ":memory:" for testing, a file path for production.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { nanoid } from "nanoid";
import { ConsistencyError } from "../../core/errors.js";
import { targetKey, type GraphEdge, type GraphStats, type GraphSymbol, type SourceFile } from "../../core/model.js";
import type {
  EdgeUpsert,
  FileUpsert,
  GraphStore,
  ListOptions,
  SymbolUpsert,
  TombstoneOutcome,
} from "../../core/ports/GraphStore.js";
import {
  ConfidenceSchema,
  LanguageSchema,
  ReachSchema,
  RelationKindSchema,
  SymbolKindSchema,
  TargetHintSchema,
} from "../../core/schemas.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Source layout first, then the bundled `dist/` layout. */
const SCHEMA_CANDIDATES = [
  path.resolve(__dirname, "../../../schema/graph.sql"),
  path.resolve(__dirname, "../schema/graph.sql"),
];

/** Row shapes from SQLite */
interface FileRow {
  id: string;
  path: string;
  language: string;
  digest: string;
  last_synced_at: string;
  tombstoned_at: string | null;
  last_error: string | null;
}

interface SymbolRow {
  id: string;
  file_id: string;
  name: string;
  kind: string;
  arity: number;
  signature: string | null;
  line: number;
  end_line: number;
  is_leaf: number;
  tombstoned_at: string | null;
}

interface EdgeRow {
  id: string;
  source_id: string;
  target_id: string | null;
  target_key: string;
  target_name: string;
  hint: string;
  kind: string;
  confidence: string;
  reach: string;
  observations: number;
  line: number;
}

interface EdgeParams {
  id: string;
  sourceId: string;
  targetId: string | null;
  targetKey: string;
  targetName: string;
  hint: string;
  kind: string;
  confidence: string;
  reach: string;
  observations: number;
  line: number;
}

interface CountRow {
  key: string;
  count: number;
}

export interface SqliteGraphStoreOptions {
  /** Database file, or ":memory:". */
  dbPath: string;
  /** Override the bundled schema file. */
  schemaPath?: string;
}

function locateSchema(): string {
  const found = SCHEMA_CANDIDATES.find((candidate) => existsSync(candidate));
  if (!found) throw new Error(`graph.sql not found (looked in ${SCHEMA_CANDIDATES.join(", ")})`);
  return found;
}

function toFile(row: FileRow): SourceFile {
  return {
    id: row.id,
    path: row.path,
    language: LanguageSchema.parse(row.language),
    digest: row.digest,
    lastSyncedAt: row.last_synced_at,
    tombstonedAt: row.tombstoned_at,
    lastError: row.last_error,
  };
}

function toSymbol(row: SymbolRow): GraphSymbol {
  return {
    id: row.id,
    fileId: row.file_id,
    name: row.name,
    kind: SymbolKindSchema.parse(row.kind),
    arity: row.arity,
    signature: row.signature,
    line: row.line,
    endLine: row.end_line,
    isLeaf: row.is_leaf === 1,
    tombstonedAt: row.tombstoned_at,
  };
}

function toEdge(row: EdgeRow): GraphEdge {
  return {
    id: row.id,
    sourceId: row.source_id,
    targetId: row.target_id,
    targetName: row.target_name,
    hint: TargetHintSchema.parse(JSON.parse(row.hint)),
    kind: RelationKindSchema.parse(row.kind),
    confidence: ConfidenceSchema.parse(row.confidence),
    reach: ReachSchema.parse(row.reach),
    observations: row.observations,
    line: row.line,
  };
}

function toEdgeParams(edge: EdgeUpsert): EdgeParams {
  return {
    id: edge.id,
    sourceId: edge.sourceId,
    targetId: edge.targetId,
    targetKey: targetKey(edge),
    targetName: edge.targetName,
    hint: JSON.stringify(edge.hint),
    kind: edge.kind,
    confidence: edge.confidence,
    reach: edge.reach,
    observations: edge.observations,
    line: edge.line,
  };
}

export class SqliteGraphStore implements GraphStore {
  private db: Database.Database;

  // Prepared statements for performance
  private stmtFileById: Database.Statement<[string], FileRow>;
  private stmtFileByPath: Database.Statement<[string], FileRow>;
  private stmtFilesLive: Database.Statement<[], FileRow>;
  private stmtFilesAll: Database.Statement<[], FileRow>;
  private stmtInsertFile: Database.Statement<[FileRow]>;
  private stmtUpdateFile: Database.Statement<[FileRow]>;
  private stmtTombstoneFile: Database.Statement<[string, string]>;

  private stmtSymbolById: Database.Statement<[string], SymbolRow>;
  private stmtSymbolsInFile: Database.Statement<[string], SymbolRow>;
  private stmtSymbolsByName: Database.Statement<[string, string, string], SymbolRow>;
  private stmtSymbolsLive: Database.Statement<[], SymbolRow>;
  private stmtUpsertSymbol: Database.Statement<[SymbolRow]>;
  private stmtTombstoneSymbol: Database.Statement<[string, string]>;
  private stmtSetLeaf: Database.Statement<[number, string]>;

  private stmtEdgeByKey: Database.Statement<[string, string, string], EdgeRow>;
  private stmtEdgesFrom: Database.Statement<[string], EdgeRow>;
  private stmtEdgesTo: Database.Statement<[string], EdgeRow>;
  private stmtEdgesAll: Database.Statement<[], EdgeRow>;
  private stmtEdgesUnresolved: Database.Statement<[], EdgeRow>;
  private stmtUpsertEdge: Database.Statement<[EdgeParams]>;
  private stmtDeleteEdge: Database.Statement<[string]>;
  private stmtBumpObservations: Database.Statement<[number, string]>;

  private stmtCountFiles: Database.Statement<[], { count: number }>;
  private stmtCountSymbols: Database.Statement<[], { count: number }>;
  private stmtCountByConfidence: Database.Statement<[], CountRow>;
  private stmtCountByKind: Database.Statement<[], CountRow>;

  constructor(options: SqliteGraphStoreOptions) {
    if (options.dbPath !== ":memory:") {
      mkdirSync(path.dirname(options.dbPath), { recursive: true });
    }
    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate(options.schemaPath ?? locateSchema());

    this.stmtFileById = this.db.prepare(`SELECT * FROM files WHERE id = ?`);
    this.stmtFileByPath = this.db.prepare(`SELECT * FROM files WHERE path = ?`);
    this.stmtFilesLive = this.db.prepare(`SELECT * FROM files WHERE tombstoned_at IS NULL ORDER BY path`);
    this.stmtFilesAll = this.db.prepare(`SELECT * FROM files ORDER BY path`);
    this.stmtInsertFile = this.db.prepare(`
      INSERT INTO files (id, path, language, digest, last_synced_at, tombstoned_at, last_error)
      VALUES (@id, @path, @language, @digest, @last_synced_at, @tombstoned_at, @last_error)
    `);
    this.stmtUpdateFile = this.db.prepare(`
      UPDATE files SET
        language = @language,
        digest = @digest,
        last_synced_at = @last_synced_at,
        tombstoned_at = @tombstoned_at,
        last_error = @last_error
      WHERE id = @id AND path = @path
    `);
    this.stmtTombstoneFile = this.db.prepare(`
      UPDATE files SET tombstoned_at = ? WHERE id = ? AND tombstoned_at IS NULL
    `);

    this.stmtSymbolById = this.db.prepare(`SELECT * FROM symbols WHERE id = ?`);
    this.stmtSymbolsInFile = this.db.prepare(`
      SELECT * FROM symbols WHERE file_id = ? AND tombstoned_at IS NULL ORDER BY line, name
    `);
    this.stmtSymbolsByName = this.db.prepare(`
      SELECT * FROM symbols
      WHERE tombstoned_at IS NULL
        AND (name = ? OR substr(name, -length(?) - 1) = '.' || ?)
      ORDER BY rowid
    `);
    this.stmtSymbolsLive = this.db.prepare(`SELECT * FROM symbols WHERE tombstoned_at IS NULL ORDER BY rowid`);
    this.stmtUpsertSymbol = this.db.prepare(`
      INSERT INTO symbols (id, file_id, name, kind, arity, signature, line, end_line, is_leaf, tombstoned_at)
      VALUES (@id, @file_id, @name, @kind, @arity, @signature, @line, @end_line, @is_leaf, @tombstoned_at)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        kind = excluded.kind,
        arity = excluded.arity,
        signature = excluded.signature,
        line = excluded.line,
        end_line = excluded.end_line,
        tombstoned_at = NULL
    `);
    this.stmtTombstoneSymbol = this.db.prepare(`
      UPDATE symbols SET tombstoned_at = ? WHERE id = ? AND tombstoned_at IS NULL
    `);
    this.stmtSetLeaf = this.db.prepare(`UPDATE symbols SET is_leaf = ? WHERE id = ?`);

    this.stmtEdgeByKey = this.db.prepare(`
      SELECT * FROM edges WHERE source_id = ? AND target_key = ? AND kind = ?
    `);
    this.stmtEdgesFrom = this.db.prepare(`SELECT * FROM edges WHERE source_id = ? ORDER BY rowid`);
    this.stmtEdgesTo = this.db.prepare(`SELECT * FROM edges WHERE target_id = ? ORDER BY rowid`);
    this.stmtEdgesAll = this.db.prepare(`SELECT * FROM edges ORDER BY rowid`);
    this.stmtEdgesUnresolved = this.db.prepare(`SELECT * FROM edges WHERE target_id IS NULL ORDER BY rowid`);
    this.stmtUpsertEdge = this.db.prepare(`
      INSERT INTO edges (id, source_id, target_id, target_key, target_name, hint, kind, confidence, reach, observations, line)
      VALUES (@id, @sourceId, @targetId, @targetKey, @targetName, @hint, @kind, @confidence, @reach, @observations, @line)
      ON CONFLICT(id) DO UPDATE SET
        target_id = excluded.target_id,
        target_key = excluded.target_key,
        target_name = excluded.target_name,
        hint = excluded.hint,
        kind = excluded.kind,
        confidence = excluded.confidence,
        reach = excluded.reach,
        observations = excluded.observations,
        line = excluded.line
    `);
    this.stmtDeleteEdge = this.db.prepare(`DELETE FROM edges WHERE id = ?`);
    this.stmtBumpObservations = this.db.prepare(`
      UPDATE edges SET observations = observations + ? WHERE id = ?
    `);

    this.stmtCountFiles = this.db.prepare(`SELECT COUNT(*) AS count FROM files WHERE tombstoned_at IS NULL`);
    this.stmtCountSymbols = this.db.prepare(`SELECT COUNT(*) AS count FROM symbols WHERE tombstoned_at IS NULL`);
    this.stmtCountByConfidence = this.db.prepare(`
      SELECT confidence AS key, COUNT(*) AS count FROM edges GROUP BY confidence
    `);
    this.stmtCountByKind = this.db.prepare(`SELECT kind AS key, COUNT(*) AS count FROM edges GROUP BY kind`);
  }

  private migrate(schemaPath: string): void {
    this.db.exec(readFileSync(schemaPath, "utf8"));
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  upsertFile(file: FileUpsert): SourceFile {
    const existing = this.stmtFileByPath.get(file.path);
    const row: FileRow = {
      id: existing?.id ?? nanoid(12),
      path: file.path,
      language: file.language,
      digest: file.digest,
      last_synced_at: file.lastSyncedAt,
      tombstoned_at: null,
      last_error: file.lastError,
    };
    if (existing) this.stmtUpdateFile.run(row);
    else this.stmtInsertFile.run(row);
    return toFile(row);
  }

  getFile(id: string): SourceFile | null {
    const row = this.stmtFileById.get(id);
    return row ? toFile(row) : null;
  }

  getFileByPath(filePath: string): SourceFile | null {
    const row = this.stmtFileByPath.get(filePath);
    return row ? toFile(row) : null;
  }

  listFiles(options: ListOptions = {}): SourceFile[] {
    const rows = options.includeTombstoned ? this.stmtFilesAll.all() : this.stmtFilesLive.all();
    return rows.map(toFile);
  }

  tombstoneFile(fileId: string, at: string): TombstoneOutcome {
    if (!this.stmtFileById.get(fileId)) throw new ConsistencyError(`Unknown file ${fileId}`);
    const ids = this.stmtSymbolsInFile.all(fileId).map((row) => row.id);
    const outcome = this.tombstoneSymbols(ids, at);
    this.stmtTombstoneFile.run(at, fileId);
    return outcome;
  }

  // ==========================================================================
  // Symbols
  // ==========================================================================

  upsertSymbols(fileId: string, symbols: SymbolUpsert[]): GraphSymbol[] {
    const file = this.stmtFileById.get(fileId);
    if (!file || file.tombstoned_at !== null) {
      throw new ConsistencyError(`Cannot add symbols to missing or tombstoned file ${fileId}`);
    }
    return symbols.map((symbol) => {
      const existing = this.stmtSymbolById.get(symbol.id);
      if (existing && existing.file_id !== fileId) {
        throw new ConsistencyError(`Symbol ${symbol.id} belongs to file ${existing.file_id}`);
      }
      const row: SymbolRow = {
        id: symbol.id,
        file_id: fileId,
        name: symbol.name,
        kind: symbol.kind,
        arity: symbol.arity,
        signature: symbol.signature,
        line: symbol.line,
        end_line: symbol.endLine,
        is_leaf: existing?.is_leaf ?? 1,
        tombstoned_at: null,
      };
      this.stmtUpsertSymbol.run(row);
      return toSymbol(row);
    });
  }

  tombstoneSymbols(ids: string[], at: string): TombstoneOutcome {
    const tombstoned = new Set<string>();
    for (const id of ids) {
      if (this.stmtTombstoneSymbol.run(at, id).changes > 0) tombstoned.add(id);
    }

    let deletedEdges = 0;
    for (const id of tombstoned) {
      for (const edge of this.stmtEdgesFrom.all(id)) {
        deletedEdges += this.stmtDeleteEdge.run(edge.id).changes;
      }
    }

    const retagged = new Set<string>();
    for (const id of tombstoned) {
      for (const row of this.stmtEdgesTo.all(id)) {
        const edge = toEdge(row);
        const next: EdgeUpsert = { ...edge, targetId: null, confidence: "external" };
        const twin = this.stmtEdgeByKey.get(next.sourceId, targetKey(next), next.kind);
        if (twin && twin.id !== edge.id) {
          this.stmtDeleteEdge.run(edge.id);
          this.stmtBumpObservations.run(edge.observations, twin.id);
        } else {
          this.stmtUpsertEdge.run(toEdgeParams(next));
        }
        retagged.add(edge.sourceId);
      }
    }

    return { symbolIds: [...tombstoned], deletedEdges, retaggedSources: [...retagged] };
  }

  getSymbol(id: string, options: ListOptions = {}): GraphSymbol | null {
    const row = this.stmtSymbolById.get(id);
    if (!row) return null;
    if (row.tombstoned_at !== null && !options.includeTombstoned) return null;
    return toSymbol(row);
  }

  symbolsIn(fileId: string): GraphSymbol[] {
    return this.stmtSymbolsInFile.all(fileId).map(toSymbol);
  }

  findSymbolsByName(name: string): GraphSymbol[] {
    return this.stmtSymbolsByName.all(name, name, name).map(toSymbol);
  }

  listSymbols(): GraphSymbol[] {
    return this.stmtSymbolsLive.all().map(toSymbol);
  }

  setLeaf(symbolId: string, isLeaf: boolean): void {
    this.stmtSetLeaf.run(isLeaf ? 1 : 0, symbolId);
  }

  // ==========================================================================
  // Edges
  // ==========================================================================

  upsertEdges(edges: EdgeUpsert[]): GraphEdge[] {
    return edges.map((edge) => {
      this.assertLive(edge.sourceId, "source");
      if (edge.targetId !== null) this.assertLive(edge.targetId, "target");
      const params = toEdgeParams(edge);
      const holder = this.stmtEdgeByKey.get(params.sourceId, params.targetKey, params.kind);
      if (holder && holder.id !== edge.id) {
        throw new ConsistencyError(`Duplicate edge ${edge.sourceId} -> ${params.targetKey} (${edge.kind})`);
      }
      this.stmtUpsertEdge.run(params);
      return { ...edge };
    });
  }

  deleteEdges(ids: string[]): void {
    for (const id of ids) this.stmtDeleteEdge.run(id);
  }

  edgesFrom(symbolId: string): GraphEdge[] {
    return this.stmtEdgesFrom.all(symbolId).map(toEdge);
  }

  edgesTo(symbolId: string): GraphEdge[] {
    return this.stmtEdgesTo.all(symbolId).map(toEdge);
  }

  listEdges(): GraphEdge[] {
    return this.stmtEdgesAll.all().map(toEdge);
  }

  unresolvedEdges(): GraphEdge[] {
    return this.stmtEdgesUnresolved.all().map(toEdge);
  }

  stats(): GraphStats {
    const stats: GraphStats = {
      files: this.stmtCountFiles.get()?.count ?? 0,
      symbols: this.stmtCountSymbols.get()?.count ?? 0,
      edges: 0,
      byConfidence: { resolved: 0, conditional: 0, dynamic: 0, external: 0 },
      byKind: { call: 0, import: 0, compose: 0 },
    };
    for (const row of this.stmtCountByConfidence.all()) {
      stats.byConfidence[ConfidenceSchema.parse(row.key)] = row.count;
      stats.edges += row.count;
    }
    for (const row of this.stmtCountByKind.all()) {
      stats.byKind[RelationKindSchema.parse(row.key)] = row.count;
    }
    return stats;
  }

  close(): void {
    this.db.close();
  }

  private assertLive(symbolId: string, role: "source" | "target"): void {
    const row = this.stmtSymbolById.get(symbolId);
    if (!row || row.tombstoned_at !== null) {
      throw new ConsistencyError(`Edge ${role} ${symbolId} is missing or tombstoned`);
    }
  }
}
