import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConsistencyError } from "../src/core/errors.js";
import type { EdgeUpsert, GraphStore, SymbolUpsert } from "../src/core/ports/GraphStore.js";
import { InMemoryGraphStore } from "../src/infrastructure/memory/InMemoryGraphStore.js";
import { SqliteGraphStore } from "../src/infrastructure/sqlite/SqliteGraphStore.js";

const AT = "2026-01-01T00:00:00.000Z";

function symbol(id: string, name: string, line = 1): SymbolUpsert {
  return { id, name, kind: "function", arity: 0, signature: null, line, endLine: line + 1 };
}

function edge(id: string, sourceId: string, targetId: string | null, targetName: string): EdgeUpsert {
  return {
    id,
    sourceId,
    targetId,
    targetName,
    hint: { type: "bare" },
    kind: "call",
    confidence: targetId === null ? "external" : "resolved",
    reach: "direct",
    observations: 1,
    line: 1,
  };
}

const adapters: Array<[string, () => GraphStore]> = [
  ["InMemoryGraphStore", () => new InMemoryGraphStore()],
  ["SqliteGraphStore", () => new SqliteGraphStore({ dbPath: ":memory:" })],
];

describe.each(adapters)("%s", (_name, createStore) => {
  let store: GraphStore;
  let fileId: string;

  beforeEach(() => {
    store = createStore();
    fileId = store.upsertFile({ path: "src/a.ts", language: "typescript", digest: "d1", lastSyncedAt: AT, lastError: null }).id;
    store.upsertSymbols(fileId, [symbol("a", "a", 1), symbol("b", "b", 5), symbol("c", "c", 10)]);
  });

  afterEach(() => {
    store.close();
  });

  describe("files", () => {
    it("updates a file in place by path", () => {
      const updated = store.upsertFile({
        path: "src/a.ts",
        language: "typescript",
        digest: "d2",
        lastSyncedAt: AT,
        lastError: "Unbalanced brackets",
      });
      expect(updated.id).toBe(fileId);
      expect(store.getFileByPath("src/a.ts")).toMatchObject({ digest: "d2", lastError: "Unbalanced brackets" });
    });

    it("revives a tombstoned file under its old id", () => {
      store.tombstoneFile(fileId, AT);
      expect(store.listFiles()).toEqual([]);
      expect(store.listFiles({ includeTombstoned: true })).toHaveLength(1);

      const revived = store.upsertFile({ path: "src/a.ts", language: "typescript", digest: "d3", lastSyncedAt: AT, lastError: null });
      expect(revived.id).toBe(fileId);
      expect(revived.tombstonedAt).toBeNull();
    });
  });

  describe("symbols", () => {
    it("lists live symbols of a file by line", () => {
      expect(store.symbolsIn(fileId).map((s) => s.name)).toEqual(["a", "b", "c"]);
    });

    it("starts new symbols as leaves", () => {
      expect(store.getSymbol("a")?.isLeaf).toBe(true);
      store.setLeaf("a", false);
      store.upsertSymbols(fileId, [symbol("a", "a", 2)]);
      expect(store.getSymbol("a")).toMatchObject({ isLeaf: false, line: 2 });
    });

    it("refuses symbols on a tombstoned file", () => {
      store.tombstoneFile(fileId, AT);
      expect(() => store.upsertSymbols(fileId, [symbol("d", "d")])).toThrow(ConsistencyError);
    });

    it("finds symbols by exact or member name", () => {
      store.upsertSymbols(fileId, [{ ...symbol("save", "Repo.save", 20), kind: "method" }]);
      expect(store.findSymbolsByName("save").map((s) => s.id)).toEqual(["save"]);
      expect(store.findSymbolsByName("Repo.save").map((s) => s.id)).toEqual(["save"]);
      expect(store.findSymbolsByName("ave")).toEqual([]);
    });

    it("hides tombstoned symbols unless asked", () => {
      store.tombstoneSymbols(["c"], AT);
      expect(store.getSymbol("c")).toBeNull();
      expect(store.getSymbol("c", { includeTombstoned: true })?.tombstonedAt).toBe(AT);
      expect(store.listSymbols().map((s) => s.id).sort()).toEqual(["a", "b"]);
    });
  });

  describe("edges", () => {
    it("reads edges in both directions", () => {
      store.upsertEdges([edge("e1", "a", "b", "b"), edge("e2", "a", "c", "c"), edge("e3", "b", "c", "c")]);
      expect(store.edgesFrom("a").map((e) => e.id).sort()).toEqual(["e1", "e2"]);
      expect(store.edgesTo("c").map((e) => e.id).sort()).toEqual(["e2", "e3"]);
      expect(store.edgesFrom("b")).toEqual([expect.objectContaining({ targetId: "c", hint: { type: "bare" } })]);
    });

    it("rejects a second edge with the same source, target and kind", () => {
      store.upsertEdges([edge("e1", "a", "b", "b")]);
      expect(() => store.upsertEdges([edge("e2", "a", "b", "b")])).toThrow(ConsistencyError);
    });

    it("rejects edges touching tombstoned symbols", () => {
      store.tombstoneSymbols(["c"], AT);
      expect(() => store.upsertEdges([edge("e1", "a", "c", "c")])).toThrow(ConsistencyError);
      expect(() => store.upsertEdges([edge("e2", "c", "a", "a")])).toThrow(ConsistencyError);
    });

    it("deletes outgoing and re-tags incoming edges when a symbol is tombstoned", () => {
      store.upsertEdges([edge("e1", "a", "b", "b"), edge("e2", "b", "c", "c")]);
      const outcome = store.tombstoneSymbols(["b"], AT);

      expect(outcome).toEqual({ symbolIds: ["b"], deletedEdges: 1, retaggedSources: ["a"] });
      expect(store.edgesFrom("b")).toEqual([]);
      expect(store.edgesFrom("a")).toEqual([
        expect.objectContaining({ id: "e1", targetId: null, confidence: "external", targetName: "b" }),
      ]);
      expect(store.unresolvedEdges().map((e) => e.id)).toEqual(["e1"]);
    });

    it("folds a re-tagged edge into its external twin", () => {
      store.upsertEdges([edge("e1", "a", "b", "b"), { ...edge("e2", "a", null, "b"), observations: 2 }]);
      store.tombstoneSymbols(["b"], AT);
      const remaining = store.edgesFrom("a");
      expect(remaining).toHaveLength(1);
      expect(remaining[0]).toMatchObject({ id: "e2", targetId: null, observations: 3 });
    });

    it("tombstoning twice changes nothing", () => {
      store.tombstoneSymbols(["b"], AT);
      expect(store.tombstoneSymbols(["b"], AT)).toEqual({ symbolIds: [], deletedEdges: 0, retaggedSources: [] });
    });
  });

  describe("transactions", () => {
    it("rolls every write back when the callback throws", () => {
      store.upsertEdges([edge("e1", "a", "b", "b")]);
      expect(() =>
        store.transaction(() => {
          store.tombstoneSymbols(["b"], AT);
          store.upsertSymbols(fileId, [symbol("d", "d", 20)]);
          throw new Error("abort");
        })
      ).toThrow("abort");

      expect(store.getSymbol("b")?.tombstonedAt).toBeNull();
      expect(store.getSymbol("d")).toBeNull();
      expect(store.edgesFrom("a")).toEqual([expect.objectContaining({ id: "e1", targetId: "b", confidence: "resolved" })]);
    });

    it("returns the callback's value on success", () => {
      expect(store.transaction(() => store.symbolsIn(fileId).length)).toBe(3);
    });
  });

  it("counts live files, symbols and edges", () => {
    store.upsertEdges([edge("e1", "a", "b", "b"), edge("e2", "a", null, "print")]);
    store.tombstoneSymbols(["c"], AT);
    expect(store.stats()).toEqual({
      files: 1,
      symbols: 2,
      edges: 2,
      byConfidence: { resolved: 1, conditional: 0, dynamic: 0, external: 1 },
      byKind: { call: 2, import: 0, compose: 0 },
    });
  });
});
