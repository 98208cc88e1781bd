import { describe, it, expect } from "vitest";
import { classify, isCycleEligible, strongest, weakest } from "../src/core/confidence.js";
import { describeTarget, edgeKey } from "../src/core/model.js";

describe("classify", () => {
  const resolved = { type: "resolved", symbolId: "s1" } as const;
  const ambiguous = { type: "ambiguous", candidates: ["s1", "s2"] } as const;
  const unresolved = { type: "unresolved" } as const;

  it("marks indirect references dynamic whatever the resolution", () => {
    expect(classify("indirect", resolved)).toBe("dynamic");
    expect(classify("indirect", unresolved)).toBe("dynamic");
  });

  it("marks conditional references conditional even when unresolved", () => {
    expect(classify("conditional", resolved)).toBe("conditional");
    expect(classify("conditional", unresolved)).toBe("conditional");
  });

  it("splits direct references by resolution", () => {
    expect(classify("direct", resolved)).toBe("resolved");
    expect(classify("direct", ambiguous)).toBe("dynamic");
    expect(classify("direct", unresolved)).toBe("external");
  });
});

describe("confidence ordering", () => {
  it("keeps the stronger or weaker class", () => {
    expect(strongest("dynamic", "conditional")).toBe("conditional");
    expect(strongest("resolved", "external")).toBe("resolved");
    expect(weakest("resolved", "conditional")).toBe("conditional");
    expect(weakest("dynamic", "external")).toBe("external");
  });

  it("admits only resolved and conditional edges to cycles", () => {
    expect(isCycleEligible("resolved")).toBe(true);
    expect(isCycleEligible("conditional")).toBe(true);
    expect(isCycleEligible("dynamic")).toBe(false);
    expect(isCycleEligible("external")).toBe(false);
  });
});

describe("edge identity", () => {
  it("describes unresolved targets by their hint", () => {
    expect(describeTarget("helper", { type: "bare" })).toBe("helper");
    expect(describeTarget("save", { type: "self" })).toBe("this.save");
    expect(describeTarget("find", { type: "member", receiver: "Repo" })).toBe("Repo.find");
    expect(describeTarget("join", { type: "module", specifier: "node:path", resolution: "package" })).toBe(
      "node:path#join"
    );
    expect(describeTarget("handler", { type: "opaque" })).toBe("?handler");
  });

  it("keys resolved edges by target id and unresolved ones by descriptor", () => {
    const base = { sourceId: "a", targetName: "helper", hint: { type: "bare" } as const, kind: "call" as const };
    expect(edgeKey({ ...base, targetId: "b" })).toBe("a\u0000b\u0000call");
    expect(edgeKey({ ...base, targetId: null })).toBe("a\u0000external:helper\u0000call");
    expect(edgeKey({ ...base, targetId: "b" })).not.toBe(edgeKey({ ...base, targetId: "b", kind: "import" }));
  });
});
