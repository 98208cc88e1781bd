import { describe, it, expect } from "vitest";
import { SymbolResolver, ownerOf, type ResolveRequest, type SymbolRef } from "../src/core/SymbolResolver.js";

const refs: SymbolRef[] = [
  { id: "m-util", path: "src/util.ts", name: "<module>", kind: "module" },
  { id: "helper-util", path: "src/util.ts", name: "helper", kind: "function" },
  { id: "m-app", path: "src/app.ts", name: "<module>", kind: "module" },
  { id: "helper-app", path: "src/app.ts", name: "helper", kind: "function" },
  { id: "run", path: "src/app.ts", name: "run", kind: "function" },
  { id: "save", path: "src/repo.ts", name: "Repo.save", kind: "method" },
  { id: "load", path: "src/repo.ts", name: "Repo.load", kind: "method" },
  { id: "m-a", path: "pkg/a/index.ts", name: "<module>", kind: "module" },
  { id: "m-b", path: "lib/a/index.ts", name: "<module>", kind: "module" },
];

function request(partial: Partial<ResolveRequest> & Pick<ResolveRequest, "targetName" | "hint">): ResolveRequest {
  return { sourcePath: "src/app.ts", sourceName: "run", kind: "call", ...partial };
}

describe("SymbolResolver", () => {
  const resolver = new SymbolResolver(refs);

  it("prefers a match in the referencing file", () => {
    expect(resolver.resolve(request({ targetName: "helper", hint: { type: "bare" } }))).toEqual({
      type: "resolved",
      symbolId: "helper-app",
    });
  });

  it("reports a name defined in several other files as ambiguous", () => {
    const result = resolver.resolve(
      request({ sourcePath: "src/other.ts", targetName: "helper", hint: { type: "bare" } })
    );
    expect(result).toEqual({ type: "ambiguous", candidates: ["helper-util", "helper-app"] });
  });

  it("resolves self references through the owner of the caller", () => {
    const result = resolver.resolve(
      request({ sourcePath: "src/repo.ts", sourceName: "Repo.save", targetName: "load", hint: { type: "self" } })
    );
    expect(result).toEqual({ type: "resolved", symbolId: "load" });
    expect(resolver.resolve(request({ targetName: "load", hint: { type: "self" } }))).toEqual({
      type: "unresolved",
    });
  });

  it("resolves members by qualified name, then by the last receiver segment", () => {
    expect(resolver.resolve(request({ targetName: "save", hint: { type: "member", receiver: "Repo" } }))).toEqual({
      type: "resolved",
      symbolId: "save",
    });
    expect(
      resolver.resolve(request({ targetName: "save", hint: { type: "member", receiver: "models.Repo" } }))
    ).toEqual({ type: "resolved", symbolId: "save" });
    expect(resolver.resolve(request({ targetName: "save", hint: { type: "member", receiver: "db" } }))).toEqual({
      type: "unresolved",
    });
  });

  it("resolves relative module imports to the named symbol", () => {
    const result = resolver.resolve(
      request({ targetName: "helper", hint: { type: "module", specifier: "./util", resolution: "relative" } })
    );
    expect(result).toEqual({ type: "resolved", symbolId: "helper-util" });
  });

  it("falls back to the module symbol for imports of names it does not know", () => {
    const hint = { type: "module", specifier: "./util.js", resolution: "relative" } as const;
    expect(resolver.resolve(request({ targetName: "Config", hint, kind: "import" }))).toEqual({
      type: "resolved",
      symbolId: "m-util",
    });
    expect(resolver.resolve(request({ targetName: "Config", hint, kind: "call" }))).toEqual({ type: "unresolved" });
  });

  it("matches suffix specifiers against several directories", () => {
    const hint = { type: "module", specifier: "a", resolution: "suffix" } as const;
    expect(resolver.resolve(request({ targetName: "<module>", hint, kind: "import" }))).toEqual({
      type: "ambiguous",
      candidates: ["m-a", "m-b"],
    });
  });

  it("never resolves packages or opaque targets", () => {
    expect(
      resolver.resolve(request({ targetName: "helper", hint: { type: "module", specifier: "lodash", resolution: "package" } }))
    ).toEqual({ type: "unresolved" });
    expect(resolver.resolve(request({ targetName: "helper", hint: { type: "opaque" } }))).toEqual({
      type: "unresolved",
    });
  });

  it("forgets every symbol of a removed path", () => {
    const local = new SymbolResolver(refs);
    local.removePath("src/app.ts");
    expect(local.has("src/app.ts")).toBe(false);
    expect(
      local.resolve(request({ sourcePath: "src/other.ts", targetName: "helper", hint: { type: "bare" } }))
    ).toEqual({ type: "resolved", symbolId: "helper-util" });
  });
});

describe("ownerOf", () => {
  it("strips the member name", () => {
    expect(ownerOf("Repo.save")).toBe("Repo");
    expect(ownerOf("a.b.c")).toBe("a.b");
    expect(ownerOf("save")).toBeNull();
  });
});
