import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { computeDigest } from "../src/infrastructure/ChecksumIndex.js";
import { NodeSourceWalker, sourcePattern } from "../src/infrastructure/NodeSourceWalker.js";

describe("sourcePattern", () => {
  it("uses no braces for a single extension", () => {
    expect(sourcePattern([".ts"])).toBe("**/*.ts");
  });

  it("sorts and dedupes extensions", () => {
    expect(sourcePattern([".ts", ".py", "ts"])).toBe("**/*.{py,ts}");
  });
});

describe("NodeSourceWalker", () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "depmap-walk-"));
    const files: Record<string, string> = {
      "src/app.ts": "export function run() {}\n",
      "src/lib/util.py": "def helper():\n    return 1\n",
      "src/notes.md": "# notes\n",
      "node_modules/pkg/index.ts": "export const x = 1;\n",
      "dist/app.ts": "export function run() {}\n",
    };
    for (const [path, content] of Object.entries(files)) {
      await mkdir(dirname(join(root, path)), { recursive: true });
      await writeFile(join(root, path), content);
    }
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads matching files outside excluded directories", async () => {
    const inputs = await new NodeSourceWalker({ root, extensions: [".ts", ".py"] }).walk();
    const content = "export function run() {}\n";
    expect(inputs).toEqual([
      { path: "src/app.ts", content, digest: computeDigest(content) },
      {
        path: "src/lib/util.py",
        content: "def helper():\n    return 1\n",
        digest: computeDigest("def helper():\n    return 1\n"),
      },
    ]);
  });

  it("honours custom exclusions", async () => {
    const inputs = await new NodeSourceWalker({ root, extensions: [".ts"], excludedDirs: ["lib", "src"] }).walk();
    expect(inputs.map((input) => input.path)).toEqual(["dist/app.ts", "node_modules/pkg/index.ts"]);
  });

  it("reads nothing without extensions", async () => {
    expect(await new NodeSourceWalker({ root, extensions: [] }).walk()).toEqual([]);
  });
});
