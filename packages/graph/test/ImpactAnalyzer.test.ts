import { describe, it, expect, beforeEach } from "vitest";
import type { Confidence, ImpactResult } from "../src/core/model.js";
import type { EdgeUpsert } from "../src/core/ports/GraphStore.js";
import { ImpactAnalyzer } from "../src/infrastructure/ImpactAnalyzer.js";
import { InMemoryGraphStore } from "../src/infrastructure/memory/InMemoryGraphStore.js";

function dependsOn(sourceId: string, targetId: string, confidence: Confidence): EdgeUpsert {
  return {
    id: `${sourceId}->${targetId}`,
    sourceId,
    targetId,
    targetName: targetId,
    hint: { type: "bare" },
    kind: "call",
    confidence,
    reach: confidence === "conditional" ? "conditional" : confidence === "dynamic" ? "indirect" : "direct",
    observations: 1,
    line: 1,
  };
}

function rows(result: ImpactResult): Array<[string, number, string, string]> {
  return result.entries.map((e) => [e.symbol.name, e.depth, e.certainty, e.via]);
}

describe("ImpactAnalyzer", () => {
  let analyzer: ImpactAnalyzer;

  //   x --resolved--> t <--conditional-- y
  //   z --resolved--> x      w --resolved--> y
  //   z --dynamic---> y
  beforeEach(() => {
    const store = new InMemoryGraphStore();
    const fileId = store.upsertFile({
      path: "src/t.ts",
      language: "typescript",
      digest: "d",
      lastSyncedAt: "2026-01-01T00:00:00.000Z",
      lastError: null,
    }).id;
    store.upsertSymbols(
      fileId,
      ["t", "w", "x", "y", "z"].map((id, i) => ({
        id,
        name: id,
        kind: "function" as const,
        arity: 0,
        signature: null,
        line: i + 1,
        endLine: i + 1,
      }))
    );
    store.upsertEdges([
      dependsOn("x", "t", "resolved"),
      dependsOn("y", "t", "conditional"),
      dependsOn("t", "t", "resolved"),
      dependsOn("z", "x", "resolved"),
      dependsOn("w", "y", "resolved"),
      dependsOn("z", "y", "dynamic"),
    ]);
    analyzer = new ImpactAnalyzer(store);
  });

  it("walks dependents level by level", () => {
    const result = analyzer.impactOf("t");
    expect(result.truncated).toBe(false);
    expect(rows(result)).toEqual([
      ["x", 1, "certain", "resolved"],
      ["y", 1, "possible", "conditional"],
      ["w", 2, "possible", "resolved"],
      ["z", 2, "certain", "resolved"],
    ]);
  });

  it("honours the depth bound", () => {
    expect(rows(analyzer.impactOf("t", { maxDepth: 1 })).map(([name]) => name)).toEqual(["x", "y"]);
  });

  it("follows the strongest dependents first under a fan-out bound", () => {
    const result = analyzer.impactOf("t", { maxFanOut: 1 });
    expect(result.truncated).toBe(true);
    expect(rows(result).map(([name]) => name)).toEqual(["x", "z"]);
  });

  it("stops at the entry limit", () => {
    const result = analyzer.impactOf("t", { limit: 3 });
    expect(result.truncated).toBe(true);
    expect(rows(result).map(([name]) => name)).toEqual(["x", "y", "w"]);
  });

  it("is empty for a symbol nothing depends on", () => {
    expect(analyzer.impactOf("w")).toEqual({ entries: [], truncated: false });
  });

  it("is empty for an unknown symbol", () => {
    expect(analyzer.impactOf("missing")).toEqual({ entries: [], truncated: false });
  });
});
