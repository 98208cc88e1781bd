import { describe, it, expect } from "vitest";
import { ChecksumIndex, computeDigest } from "../src/infrastructure/ChecksumIndex.js";

describe("computeDigest", () => {
  it("is a 16 character hex prefix that follows the content", () => {
    const digest = computeDigest("export const a = 1;\n");
    expect(digest).toMatch(/^[0-9a-f]{16}$/);
    expect(computeDigest("export const a = 1;\n")).toBe(digest);
    expect(computeDigest("export const a = 2;\n")).not.toBe(digest);
  });
});

describe("ChecksumIndex", () => {
  it("classifies paths as added, unchanged or modified", () => {
    const index = new ChecksumIndex();
    expect(index.record("a.ts", "d1")).toBe("added");
    expect(index.record("a.ts", "d1")).toBe("unchanged");
    expect(index.record("a.ts", "d2")).toBe("modified");
    expect(index.get("a.ts")).toBe("d2");
    expect(index.size).toBe(1);
  });

  it("starts from a seed", () => {
    const index = new ChecksumIndex([["a.ts", "d1"]]);
    expect(index.record("a.ts", "d1")).toBe("unchanged");
  });

  it("sweeps known paths that were not seen, sorted", () => {
    const index = new ChecksumIndex([
      ["c.ts", "d"],
      ["a.ts", "d"],
      ["b.ts", "d"],
    ]);
    expect(index.sweep(new Set(["b.ts"]))).toEqual(["a.ts", "c.ts"]);
    // Sweeping does not forget; only a confirmed removal does.
    expect(index.size).toBe(3);
    index.forget("a.ts");
    expect(index.sweep(new Set(["b.ts"]))).toEqual(["c.ts"]);
  });

  it("reverts a recorded digest", () => {
    const index = new ChecksumIndex([["a.ts", "d1"]]);
    index.record("a.ts", "d2");
    index.record("b.ts", "d3");
    index.revert("a.ts", "d1");
    index.revert("b.ts", null);
    expect(index.get("a.ts")).toBe("d1");
    expect(index.get("b.ts")).toBeNull();
  });
});
