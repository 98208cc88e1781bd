/**
 * @depmap/graph
 * Static dependency graph and impact analysis for source trees.
 */

// Model
export type {
  Language,
  SymbolKind,
  RelationKind,
  Reach,
  Confidence,
  ChangeKind,
  SyncState,
  SourceFile,
  GraphSymbol,
  TargetHint,
  ModuleResolution,
  GraphEdge,
  SymbolDraft,
  EdgeDraft,
  ScanDrafts,
  SourceInput,
  FileError,
  SymbolChange,
  SyncReport,
  SyncOptions,
  Cycle,
  Certainty,
  ImpactEntry,
  ImpactOptions,
  ImpactResult,
  GraphStats,
} from "./core/model.js";
export { MODULE_SYMBOL, describeTarget, edgeKey } from "./core/model.js";
export { classify, type Resolution } from "./core/confidence.js";
export { ScanError, CommitError, ConsistencyError } from "./core/errors.js";
export { SymbolResolver } from "./core/SymbolResolver.js";

// Ports
export type { GraphStore } from "./core/ports/GraphStore.js";
export type { SourceScanner } from "./core/ports/SourceScanner.js";

// Stores
export { InMemoryGraphStore } from "./infrastructure/memory/InMemoryGraphStore.js";
export { SqliteGraphStore, type SqliteGraphStoreOptions } from "./infrastructure/sqlite/SqliteGraphStore.js";

// Scanners
export { ScannerRegistry, createDefaultRegistry } from "./infrastructure/scanners/ScannerRegistry.js";
export { TypeScriptScanner } from "./infrastructure/scanners/TypeScriptScanner.js";
export { PatternScanner } from "./infrastructure/scanners/PatternScanner.js";

// Engine
export { ChecksumIndex, computeDigest } from "./infrastructure/ChecksumIndex.js";
export { GraphBuilder } from "./infrastructure/GraphBuilder.js";
export { CycleDetector, type CycleReport } from "./infrastructure/CycleDetector.js";
export { ImpactAnalyzer, DEFAULT_MAX_DEPTH } from "./infrastructure/ImpactAnalyzer.js";
export { GraphEngine, type GraphEngineOptions, type SymbolDetail, type EdgeView } from "./infrastructure/GraphEngine.js";
export { NodeSourceWalker, type WalkOptions } from "./infrastructure/NodeSourceWalker.js";

// Config and tools
export { loadConfig, type GraphConfig } from "./config.js";
export { registerAllTools, type Services } from "./tools/index.js";
