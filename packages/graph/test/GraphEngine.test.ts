import { describe, it, expect, beforeEach } from "vitest";
import { silentLogger } from "@depmap/core";
import { ConsistencyError } from "../src/core/errors.js";
import type { GraphEdge, GraphSymbol, SourceFile, SourceInput, SymbolChange, SyncState } from "../src/core/model.js";
import type { EdgeUpsert, FileUpsert } from "../src/core/ports/GraphStore.js";
import { computeDigest } from "../src/infrastructure/ChecksumIndex.js";
import { GraphEngine } from "../src/infrastructure/GraphEngine.js";
import { InMemoryGraphStore } from "../src/infrastructure/memory/InMemoryGraphStore.js";

function src(path: string, ...lines: string[]): SourceInput {
  return { path, content: lines.join("\n") };
}

const CHAIN_LINES = [
  "export function base() {",
  "  return 1;",
  "}",
  "export function mid() {",
  "  return base();",
  "}",
  "export function top() {",
  "  return mid();",
  "}",
];
const CHAIN = src("src/chain.ts", ...CHAIN_LINES);

const HELPER_LINES = ["export function helper() {", "  return 1;", "}"];
const UTIL = src("src/util.ts", ...HELPER_LINES);
const APP = src("src/app.ts", 'import { helper } from "./util";', "export function run() {", "  return helper();", "}");

const CYCLE = [
  src("src/a.ts", 'import { b } from "./b";', "export function a() {", "  b();", "}"),
  src("src/b.ts", 'import { c } from "./c";', "export function b() {", "  c();", "}"),
  src("src/c.ts", 'import { a } from "./a";', "export function c() {", "  a();", "}"),
];

function located(changes: SymbolChange[]): string[] {
  return changes.map((change) => `${change.path}#${change.name}`).sort();
}

function createEngine(store = new InMemoryGraphStore()): GraphEngine {
  return GraphEngine.create({ store, logger: silentLogger });
}

async function symbolNamed(engine: GraphEngine, name: string): Promise<GraphSymbol> {
  const [symbol] = (await engine.findSymbols(name)).filter((s) => s.name === name);
  if (!symbol) throw new Error(`No symbol ${name}`);
  return symbol;
}

describe("GraphEngine", () => {
  let engine: GraphEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe("sync", () => {
    it("adds files and resolves edges across them", async () => {
      const report = await engine.sync([APP, UTIL]);
      expect(report).toMatchObject({ added: 2, modified: 0, removed: 0, failed: 0, succeeded: 2, tombstonedSymbols: [] });
      expect(located(report.createdSymbols)).toEqual([
        "src/app.ts#<module>",
        "src/app.ts#run",
        "src/util.ts#<module>",
        "src/util.ts#helper",
      ]);

      const stats = await engine.stats();
      expect(stats).toEqual({
        files: 2,
        symbols: 4,
        edges: 2,
        byConfidence: { resolved: 2, conditional: 0, dynamic: 0, external: 0 },
        byKind: { call: 1, import: 1, compose: 0 },
      });

      const run = await symbolNamed(engine, "run");
      const helper = await symbolNamed(engine, "helper");
      expect(run.isLeaf).toBe(false);
      expect(helper.isLeaf).toBe(true);
    });

    it("is idempotent", async () => {
      await engine.sync([APP, UTIL, CHAIN]);
      const before = await engine.stats();
      const ids = (await engine.symbolsIn("src/chain.ts")).map((s) => s.id);

      const again = await engine.sync([APP, UTIL, CHAIN]);
      expect(again).toMatchObject({ added: 0, modified: 0, removed: 0, unchanged: 3 });
      expect(again.createdSymbols).toEqual([]);
      expect(again.tombstonedSymbols).toEqual([]);
      expect(await engine.stats()).toEqual(before);
      expect((await engine.symbolsIn("src/chain.ts")).map((s) => s.id)).toEqual(ids);
    });

    it("counts another observation when a modified file keeps an edge", async () => {
      await engine.sync([CHAIN]);
      await engine.sync([src("src/chain.ts", ...CHAIN_LINES, "// touched")]);
      const mid = await symbolNamed(engine, "mid");
      const detail = await engine.getSymbol(mid.id);
      expect(detail.ok && detail.value.outgoing.map((e) => [e.targetName, e.observations])).toEqual([["base", 2]]);
    });

    it("tombstones removed files and promotes their edges when they return", async () => {
      await engine.sync([APP, UTIL]);
      const run = await symbolNamed(engine, "run");

      const helperBefore = await symbolNamed(engine, "helper");

      const removal = await engine.sync([APP]);
      expect(removal).toMatchObject({ removed: 1, unchanged: 1, createdSymbols: [] });
      expect(located(removal.tombstonedSymbols)).toEqual(["src/util.ts#<module>", "src/util.ts#helper"]);
      expect(removal.tombstonedSymbols.map((change) => change.id)).toContain(helperBefore.id);
      const orphaned = await engine.getSymbol(run.id);
      expect(orphaned.ok && orphaned.value.outgoing).toEqual([
        expect.objectContaining({ targetName: "helper", targetId: null, confidence: "external" }),
      ]);
      expect((await symbolNamed(engine, "run")).isLeaf).toBe(true);

      const back = await engine.sync([APP, UTIL]);
      expect(back).toMatchObject({ added: 1, unchanged: 1, promotedEdges: 2 });
      const helper = await symbolNamed(engine, "helper");
      const restored = await engine.getSymbol(run.id);
      expect(restored.ok && restored.value.outgoing).toEqual([
        expect.objectContaining({ targetId: helper.id, confidence: "resolved" }),
      ]);
      expect((await symbolNamed(engine, "run")).isLeaf).toBe(false);
    });

    it("treats a renamed function as a removal plus an addition", async () => {
      await engine.sync([src("src/lib.ts", "export function foo() {", "  return 1;", "}")]);
      const foo = await symbolNamed(engine, "foo");

      const report = await engine.sync([src("src/lib.ts", "export function bar() {", "  return 1;", "}")]);
      const bar = await symbolNamed(engine, "bar");
      expect(report).toMatchObject({
        modified: 1,
        createdSymbols: [{ id: bar.id, name: "bar", path: "src/lib.ts" }],
        tombstonedSymbols: [{ id: foo.id, name: "foo", path: "src/lib.ts" }],
      });
      expect((await engine.symbolsIn("src/lib.ts")).map((s) => s.name).sort()).toEqual(["<module>", "bar"]);
      expect((await engine.getSymbol(foo.id)).ok).toBe(false);
      expect(await engine.impactOf(foo.id)).toEqual({ ok: true, value: [] });
    });

    it("treats a renamed file as a removal plus an addition", async () => {
      await engine.sync([UTIL]);
      const old = await symbolNamed(engine, "helper");

      const report = await engine.sync([src("src/helpers.ts", ...HELPER_LINES)]);
      expect(report).toMatchObject({ added: 1, removed: 1 });
      const renamed = await symbolNamed(engine, "helper");
      expect(renamed.id).not.toBe(old.id);
      expect((await engine.getSymbol(old.id)).ok).toBe(false);
      expect(await engine.getFile("src/util.ts")).toBeNull();
    });

    it("leaves known files alone when pruning is off", async () => {
      await engine.sync([APP, UTIL]);
      const report = await engine.sync([APP], { prune: false });
      expect(report).toMatchObject({ removed: 0, unchanged: 1 });
      expect((await engine.stats()).files).toBe(2);
    });

    it("reports state transitions", async () => {
      const states: SyncState[] = [];
      const observed = GraphEngine.create({
        store: new InMemoryGraphStore(),
        logger: silentLogger,
        onStateChange: (state) => states.push(state),
      });
      await observed.sync([CHAIN]);
      expect(states).toEqual(["scanning", "diffing", "committing", "idle"]);
      expect(observed.syncState).toBe("idle");
    });

    it("commits nothing and forgets the digests of a cancelled run", async () => {
      const controller = new AbortController();
      controller.abort();
      const cancelled = await engine.sync([CHAIN], { signal: controller.signal });
      expect(cancelled).toMatchObject({ cancelled: true, added: 1, succeeded: 0 });
      expect((await engine.stats()).files).toBe(0);

      const retried = await engine.sync([CHAIN]);
      expect(retried).toMatchObject({ cancelled: false, added: 1, succeeded: 1 });
    });
  });

  describe("failures", () => {
    it("isolates an unreadable file", async () => {
      const report = await engine.sync([CHAIN, { path: "src/locked.ts", error: new Error("EACCES") }]);
      expect(report.failed).toBe(1);
      expect(report.errors).toEqual([{ path: "src/locked.ts", kind: "scan", message: "src/locked.ts: Unreadable: EACCES" }]);
      expect(report.succeeded).toBe(1);
      expect(await engine.getFile("src/locked.ts")).toBeNull();
      expect((await engine.symbolsIn("src/chain.ts")).map((s) => s.name).sort()).toEqual(["<module>", "base", "mid", "top"]);
    });

    it("keeps the symbols of a known file that becomes unreadable", async () => {
      await engine.sync([CHAIN, UTIL]);
      const ids = (await engine.symbolsIn("src/chain.ts")).map((s) => s.id).sort();
      const changed = src("src/util.ts", "export function helper() {", "  return 2;", "}");

      const report = await engine.sync([{ path: "src/chain.ts", error: new Error("EIO") }, changed]);
      expect(report.errors).toEqual([{ path: "src/chain.ts", kind: "scan", message: "src/chain.ts: Unreadable: EIO" }]);
      expect(report).toMatchObject({ modified: 1, removed: 0, failed: 1, succeeded: 1, tombstonedSymbols: [] });
      expect((await engine.getFile("src/util.ts"))?.digest).toBe(computeDigest("export function helper() {\n  return 2;\n}"));
      expect((await engine.symbolsIn("src/chain.ts")).map((s) => s.id).sort()).toEqual(ids);

      const readable = await engine.sync([CHAIN, changed]);
      expect(readable).toMatchObject({ unchanged: 2, added: 0, modified: 0, failed: 0 });
    });

    it("rejects files no scanner understands", async () => {
      const report = await engine.sync([src("README.md", "# notes")]);
      expect(report.errors).toEqual([
        { path: "README.md", kind: "scan", message: "README.md: No scanner for this file type" },
      ]);
    });

    it("keeps the last good symbols of a file that stops parsing", async () => {
      await engine.sync([UTIL]);
      const helper = await symbolNamed(engine, "helper");

      const report = await engine.sync([src("src/util.ts", "export function helper() {", "  return ;;(", "}")]);
      expect(report).toMatchObject({ modified: 1, failed: 1, succeeded: 0 });
      expect(report.errors[0]).toMatchObject({ path: "src/util.ts", kind: "scan" });

      expect((await symbolNamed(engine, "helper")).id).toBe(helper.id);
      const file = await engine.getFile("src/util.ts");
      expect(file?.lastError).toBe(report.errors[0].message);
    });

    it("reports a file whose commit keeps failing and retries it next time", async () => {
      let attempts = 0;
      class FlakyStore extends InMemoryGraphStore {
        upsertFile(file: FileUpsert): SourceFile {
          if (file.path === "src/util.ts" && attempts++ < 2) throw new Error("disk full");
          return super.upsertFile(file);
        }
      }
      const flaky = createEngine(new FlakyStore());

      const report = await flaky.sync([CHAIN, UTIL]);
      expect(attempts).toBe(2);
      expect(report.errors).toEqual([{ path: "src/util.ts", kind: "commit", message: "src/util.ts: disk full" }]);
      expect(report).toMatchObject({ added: 2, failed: 1, succeeded: 1 });

      const retry = await flaky.sync([CHAIN, UTIL]);
      expect(retry).toMatchObject({ added: 1, unchanged: 1, failed: 0, succeeded: 1 });
    });

    it("recomputes leaves of a file whose second commit wave fails", async () => {
      class EdgeFailingStore extends InMemoryGraphStore {
        upsertEdges(edges: EdgeUpsert[]): GraphEdge[] {
          if (edges.some((edge) => edge.targetName === "helper2")) throw new Error("disk full");
          return super.upsertEdges(edges);
        }
      }
      const failing = createEngine(new EdgeFailingStore());
      await failing.sync([APP, UTIL]);
      expect((await symbolNamed(failing, "run")).isLeaf).toBe(false);

      const extra = src("src/extra.ts", "export function helper2() {", "  return 2;", "}");
      const app = src("src/app.ts", 'import { helper2 } from "./extra";', "export function run() {", "  return helper2();", "}");
      const report = await failing.sync([app, UTIL, extra]);

      expect(report.errors).toEqual([{ path: "src/app.ts", kind: "commit", message: "src/app.ts: disk full" }]);
      expect(located(report.createdSymbols)).toEqual(["src/extra.ts#<module>", "src/extra.ts#helper2"]);
      expect((await symbolNamed(failing, "run")).isLeaf).toBe(true);
    });

    it("aborts the run on a consistency violation", async () => {
      class BrokenStore extends InMemoryGraphStore {
        upsertFile(): SourceFile {
          throw new ConsistencyError("file table corrupted");
        }
      }
      const broken = createEngine(new BrokenStore());
      await expect(broken.sync([CHAIN])).rejects.toThrow(ConsistencyError);
      expect(broken.syncState).toBe("idle");
    });
  });

  describe("cycles", () => {
    it("finds a cycle across files exactly once", async () => {
      await engine.sync(CYCLE);
      const cycles = await engine.findCycles();
      expect(cycles).toHaveLength(1);
      expect([...cycles[0].names].sort()).toEqual(["a", "b", "c"]);
      expect(cycles[0].confidence).toBe("resolved");
    });

    it("does not report new cycles for a file hanging off an existing one", async () => {
      await engine.sync(CYCLE);
      await engine.sync([...CYCLE, src("src/d.ts", 'import { a } from "./a";', "export function d() {", "  a();", "}")]);
      expect(await engine.findCycles()).toHaveLength(1);
    });

    it("ignores dynamic edges", async () => {
      await engine.sync([
        src(
          "src/loop.ts",
          "class Loop {",
          "  start() {",
          "    this.step();",
          "  }",
          "  step() {",
          '    this["start"]();',
          "  }",
          "}"
        ),
      ]);
      expect(await engine.findCycles()).toEqual([]);

      const uncertain = await engine.uncertainEdges();
      expect(uncertain.map(({ edge, source, path }) => [path, source.name, edge.targetName, edge.line])).toEqual([
        ["src/loop.ts", "Loop.step", "start", 6],
      ]);
    });

    it("rates a cycle by its weakest edge", async () => {
      await engine.sync([
        src(
          "src/pingpong.ts",
          "function ping(n: number) {",
          "  if (n > 0) pong(n - 1);",
          "}",
          "function pong(n: number) {",
          "  ping(n);",
          "}"
        ),
      ]);
      const [cycle] = await engine.findCycles();
      expect([...cycle.names].sort()).toEqual(["ping", "pong"]);
      expect(cycle.confidence).toBe("conditional");
    });
  });

  describe("impact", () => {
    it("returns dependents by distance", async () => {
      await engine.sync([CHAIN]);
      const base = await symbolNamed(engine, "base");
      const result = await engine.impactOf(base.id);
      expect(result.ok && result.value.map((e) => [e.symbol.name, e.depth, e.certainty, e.via])).toEqual([
        ["mid", 1, "certain", "resolved"],
        ["top", 2, "certain", "resolved"],
      ]);
    });

    it("stops at the requested depth", async () => {
      await engine.sync([CHAIN]);
      const base = await symbolNamed(engine, "base");
      const result = await engine.impactOf(base.id, 1);
      expect(result.ok && result.value.map((e) => e.symbol.name)).toEqual(["mid"]);
    });

    it("fails for unknown symbols and is empty for tombstoned ones", async () => {
      await engine.sync([UTIL]);
      const helper = await symbolNamed(engine, "helper");
      await engine.sync([]);

      expect((await engine.impactOf("no-such-id")).ok).toBe(false);
      expect(await engine.impactOf(helper.id)).toEqual({ ok: true, value: [] });
    });
  });

  describe("queries", () => {
    it("finds orphans", async () => {
      await engine.sync([CHAIN]);
      expect((await engine.findOrphans()).map((s) => s.name)).toEqual(["top"]);
    });

    it("describes a symbol with both edge directions", async () => {
      await engine.sync([CHAIN]);
      const mid = await symbolNamed(engine, "mid");
      const detail = await engine.getSymbol(mid.id);
      expect(detail.ok).toBe(true);
      if (!detail.ok) return;
      expect(detail.value.file?.path).toBe("src/chain.ts");
      expect(detail.value.incoming.map((e) => detail.value.names.get(e.sourceId))).toEqual(["top"]);
      expect(detail.value.outgoing.map((e) => e.targetId && detail.value.names.get(e.targetId))).toEqual(["base"]);
    });

    it("looks files up by id or path", async () => {
      await engine.sync([CHAIN]);
      const file = await engine.getFile("./src/chain.ts");
      expect(file?.language).toBe("typescript");
      expect((await engine.symbolsIn(file?.id ?? "")).length).toBe(4);
      expect(await engine.symbolsIn("src/missing.ts")).toEqual([]);
    });
  });

  it("seeds its digests from the store", async () => {
    const store = new InMemoryGraphStore();
    await createEngine(store).sync([CHAIN]);
    const reopened = createEngine(store);
    expect(await reopened.sync([CHAIN])).toMatchObject({ unchanged: 1, added: 0 });
  });
});
