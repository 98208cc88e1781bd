/**
 * Pattern sets for the languages scanned without a real parser.
 */

import { MODULE_SYMBOL, type Language, type ModuleResolution, type TargetHint } from "../../core/model.js";
import type { LexOptions } from "./text.js";

export type PatternLanguage = Extract<Language, "python" | "go" | "rust" | "java">;

/** A name an import brings into scope. */
export interface ImportBinding {
  local: string;
  specifier: string;
  resolution: ModuleResolution;
  /** Name looked up in the target module; `<module>` for whole-module bindings. */
  imported: string;
  namespace: boolean;
}

/** An import statement as an edge: what it names and where. */
export interface ImportFact {
  targetName: string;
  specifier: string;
  resolution: ModuleResolution;
  offset: number;
}

export interface ParsedImports {
  bindings: ImportBinding[];
  facts: ImportFact[];
}

export interface DynamicMatch {
  start: number;
  end: number;
  targetName: string;
  hint: TargetHint;
  kind: "call" | "import";
}

export interface LanguagePatterns {
  language: PatternLanguage;
  extensions: string[];
  lex: LexOptions;
  block: "brace" | "indent";
  /**
   * Callable declarations. Named groups: `name`, optional `receiver` (Go).
   * The match must end at the opening parenthesis of the parameter list.
   */
  declaration: RegExp;
  /** Member containers (class, impl, trait). Named group: `name`. */
  container: RegExp | null;
  /** Receiver names that mean "the current instance". */
  selfNames: string[];
  /** Parameters dropped from arity when they lead the list. */
  implicitParams: RegExp | null;
  /** Words that look like calls but are syntax. */
  keywords: Set<string>;
  /** Block headers that make their body conditional. */
  conditionalHeader: RegExp;
  /** `cond ? a : b` exists in the language. */
  ternary: boolean;
  /** Short-circuit operators, as a pattern over the statement prefix. */
  shortCircuit: RegExp;
  parseImports(code: string): ParsedImports;
  findDynamic(code: string): DynamicMatch[];
  /** Extract the bound name from one parameter's source text. */
  paramName(param: string): string | null;
}

function specifierResolution(specifier: string): ModuleResolution {
  return specifier.startsWith(".") ? "relative" : "suffix";
}

function lineOffsets(code: string): Array<{ text: string; offset: number }> {
  const lines: Array<{ text: string; offset: number }> = [];
  let offset = 0;
  for (const text of code.split("\n")) {
    lines.push({ text, offset });
    offset += text.length + 1;
  }
  return lines;
}

function collect(
  code: string,
  pattern: RegExp,
  build: (match: RegExpMatchArray, at: number) => DynamicMatch | null
): DynamicMatch[] {
  const found: DynamicMatch[] = [];
  for (const match of code.matchAll(pattern)) {
    const built = build(match, match.index ?? 0);
    if (built) found.push(built);
  }
  return found;
}

function lastWord(text: string): string | null {
  const words = text.match(/[A-Za-z_$][\w$]*/g);
  return words ? words[words.length - 1] : null;
}

// ============================================================================
// Python
// ============================================================================

/** `.util` → `./util`, `..pkg.mod` → `../pkg/mod`, `pkg.mod` → `pkg/mod`. */
export function pythonSpecifier(module: string): string {
  const dots = /^\.*/.exec(module)?.[0].length ?? 0;
  const rest = module.slice(dots).replace(/\./g, "/");
  if (dots === 0) return rest;
  const prefix = dots === 1 ? "./" : "../".repeat(dots - 1);
  return rest === "" ? prefix.replace(/\/$/, "") || "." : `${prefix}${rest}`;
}

function parsePythonImports(code: string): ParsedImports {
  const bindings: ImportBinding[] = [];
  const facts: ImportFact[] = [];
  const lines = lineOffsets(code);

  for (let i = 0; i < lines.length; i++) {
    const { text, offset } = lines[i];
    const from = /^\s*from\s+(\.*[\w.]*)\s+import\s+(.+)$/.exec(text);
    if (from) {
      let names = from[2];
      if (names.trim().startsWith("(") && !names.includes(")")) {
        while (i + 1 < lines.length && !names.includes(")")) {
          i++;
          names += ` ${lines[i].text}`;
        }
      }
      const specifier = pythonSpecifier(from[1]);
      const resolution = specifierResolution(specifier);
      for (const raw of names.replace(/[()]/g, " ").split(",")) {
        const part = raw.trim();
        if (part === "") continue;
        if (part === "*") {
          facts.push({ targetName: MODULE_SYMBOL, specifier, resolution, offset });
          continue;
        }
        const [imported, alias] = part.split(/\s+as\s+/);
        bindings.push({ local: alias ?? imported, specifier, resolution, imported, namespace: false });
        facts.push({ targetName: imported, specifier, resolution, offset });
      }
      continue;
    }

    const plain = /^\s*import\s+(.+)$/.exec(text);
    if (plain) {
      for (const raw of plain[1].split(",")) {
        const [module, alias] = raw.trim().split(/\s+as\s+/);
        if (!module) continue;
        const specifier = pythonSpecifier(module);
        const resolution = specifierResolution(specifier);
        bindings.push({
          local: alias ?? module.split(".")[0],
          specifier,
          resolution,
          imported: MODULE_SYMBOL,
          namespace: true,
        });
        facts.push({ targetName: MODULE_SYMBOL, specifier, resolution, offset });
      }
    }
  }
  return { bindings, facts };
}

function findPythonDynamic(code: string): DynamicMatch[] {
  return [
    ...collect(code, /\bgetattr\s*\(\s*([\w.]+)\s*,\s*(["'])(\w+)\2\s*\)\s*\(/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: m[3],
      hint: m[1] === "self" || m[1] === "cls" ? { type: "self" } : { type: "bare" },
      kind: "call",
    })),
    ...collect(code, /\bgetattr\s*\(\s*([\w.]+)\s*,\s*([A-Za-z_]\w*)\s*\)\s*\(/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: `getattr(${m[1]}, ${m[2]})`,
      hint: { type: "opaque" },
      kind: "call",
    })),
    ...collect(code, /\b(?:globals|locals)\s*\(\s*\)\s*\[\s*(["'])(\w+)\1\s*\]\s*\(/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: m[2],
      hint: { type: "bare" },
      kind: "call",
    })),
    ...collect(code, /\b(eval|exec)\s*\(/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: m[1],
      hint: { type: "opaque" },
      kind: "call",
    })),
    ...collect(code, /\b(?:importlib\.)?import_module\s*\(\s*(["'])([\w.]+)\1/g, (m, at) => {
      const specifier = pythonSpecifier(m[2]);
      return {
        start: at,
        end: at + m[0].length,
        targetName: MODULE_SYMBOL,
        hint: { type: "module", specifier, resolution: specifierResolution(specifier) },
        kind: "import",
      };
    }),
    ...subscriptCalls(code),
  ];
}

/** `handlers["save"](...)` and `handlers[key](...)`. */
function subscriptCalls(code: string): DynamicMatch[] {
  return collect(code, /\b([A-Za-z_]\w*)\s*\[([^\]\n]*)\]\s*\(/g, (m, at) => {
    if (m[1] === "globals" || m[1] === "locals") return null;
    const literal = /^\s*(["'])(\w+)\1\s*$/.exec(m[2]);
    return {
      start: at,
      end: at + m[0].length,
      targetName: literal ? literal[2] : `${m[1]}[${m[2].trim()}]`,
      hint: literal ? { type: "bare" } : { type: "opaque" },
      kind: "call",
    };
  });
}

function pythonParam(param: string): string | null {
  const name = param.replace(/^\*{1,2}/, "").split(/[:=]/)[0].trim();
  return /^[A-Za-z_]\w*$/.test(name) ? name : null;
}

// ============================================================================
// Go
// ============================================================================

function parseGoImports(code: string): ParsedImports {
  const bindings: ImportBinding[] = [];
  const facts: ImportFact[] = [];
  const add = (alias: string | undefined, path: string, offset: number): void => {
    const resolution = specifierResolution(path);
    const local = alias ?? path.slice(path.lastIndexOf("/") + 1);
    if (local !== "_" && local !== ".") {
      bindings.push({ local, specifier: path, resolution, imported: MODULE_SYMBOL, namespace: true });
    }
    facts.push({ targetName: MODULE_SYMBOL, specifier: path, resolution, offset });
  };

  for (const m of code.matchAll(/^import\s+(?:([\w.]+)\s+)?"([^"]+)"/gm)) {
    add(m[1], m[2], m.index ?? 0);
  }
  for (const block of code.matchAll(/^import\s*\(([^)]*)\)/gm)) {
    const base = (block.index ?? 0) + block[0].indexOf("(") + 1;
    for (const m of block[1].matchAll(/(?:([\w.]+)\s+)?"([^"]+)"/g)) {
      add(m[1], m[2], base + (m.index ?? 0));
    }
  }
  return { bindings, facts };
}

function findGoDynamic(code: string): DynamicMatch[] {
  return collect(code, /\.MethodByName\s*\(\s*"(\w+)"\s*\)/g, (m, at) => ({
    start: at,
    end: at + m[0].length,
    targetName: m[1],
    hint: { type: "bare" },
    kind: "call",
  }));
}

function goParam(param: string): string | null {
  const name = param.trim().split(/\s+/)[0];
  return /^[A-Za-z_]\w*$/.test(name) ? name : null;
}

// ============================================================================
// Rust
// ============================================================================

/** Expand one level of `{a, b as c}` groups in a `use` tree. */
function expandUse(tree: string): string[] {
  const brace = tree.indexOf("{");
  if (brace === -1) return [tree.trim()];
  const prefix = tree.slice(0, brace);
  const inner = tree.slice(brace + 1, tree.lastIndexOf("}"));
  return inner
    .split(",")
    .map((leaf) => leaf.trim())
    .filter((leaf) => leaf !== "")
    .map((leaf) => (leaf === "self" ? prefix.replace(/::$/, "") : `${prefix}${leaf}`));
}

function rustSpecifier(segments: string[]): { specifier: string; resolution: ModuleResolution } {
  const [head, ...rest] = segments;
  if (head === "crate") return { specifier: rest.join("/"), resolution: "suffix" };
  if (head === "self") return { specifier: `./${rest.join("/")}`, resolution: "relative" };
  if (head === "super") {
    let ups = 1;
    while (rest[0] === "super") {
      rest.shift();
      ups++;
    }
    return { specifier: `${"../".repeat(ups)}${rest.join("/")}`, resolution: "relative" };
  }
  return { specifier: segments.join("/"), resolution: "package" };
}

function parseRustImports(code: string): ParsedImports {
  const bindings: ImportBinding[] = [];
  const facts: ImportFact[] = [];
  for (const m of code.matchAll(/^[ \t]*(?:pub(?:\([^)]*\))?\s+)?use\s+([^;]+);/gm)) {
    const offset = m.index ?? 0;
    for (const leaf of expandUse(m[1].replace(/\s+/g, " "))) {
      const [path, alias] = leaf.split(/\s+as\s+/);
      const segments = path.split("::").map((s) => s.trim()).filter((s) => s !== "");
      const imported = segments[segments.length - 1];
      if (!imported || imported === "*") {
        const { specifier, resolution } = rustSpecifier(segments.slice(0, -1));
        facts.push({ targetName: MODULE_SYMBOL, specifier, resolution, offset });
        continue;
      }
      const { specifier, resolution } = rustSpecifier(segments.slice(0, -1));
      bindings.push({ local: alias ?? imported, specifier, resolution, imported, namespace: false });
      facts.push({ targetName: imported, specifier, resolution, offset });
    }
  }
  return { bindings, facts };
}

function findRustDynamic(code: string): DynamicMatch[] {
  // `(self.handler)(args)`: calling a stored closure or fn pointer.
  return collect(code, /\(\s*((?:self\.)?[A-Za-z_]\w*(?:\.\w+)*)\s*\)\s*\(/g, (m, at) => ({
    start: at,
    end: at + m[0].length,
    targetName: m[1],
    hint: { type: "opaque" },
    kind: "call",
  }));
}

function rustParam(param: string): string | null {
  const name = param.split(":")[0].replace(/^mut\s+/, "").trim();
  return /^[A-Za-z_]\w*$/.test(name) ? name : null;
}

// ============================================================================
// Java
// ============================================================================

function parseJavaImports(code: string): ParsedImports {
  const bindings: ImportBinding[] = [];
  const facts: ImportFact[] = [];
  for (const m of code.matchAll(/^[ \t]*import\s+(static\s+)?([\w.]+)(\.\*)?\s*;/gm)) {
    const offset = m.index ?? 0;
    const segments = m[2].split(".");
    if (m[3]) {
      facts.push({ targetName: MODULE_SYMBOL, specifier: segments.join("/"), resolution: "suffix", offset });
      continue;
    }
    if (m[1]) {
      // import static a.b.C.member;
      const member = segments[segments.length - 1];
      const owner = segments[segments.length - 2];
      const specifier = segments.slice(0, -1).join("/");
      bindings.push({ local: member, specifier, resolution: "suffix", imported: `${owner}.${member}`, namespace: false });
      facts.push({ targetName: `${owner}.${member}`, specifier, resolution: "suffix", offset });
      continue;
    }
    const className = segments[segments.length - 1];
    const specifier = segments.join("/");
    bindings.push({ local: className, specifier, resolution: "suffix", imported: className, namespace: false });
    facts.push({ targetName: MODULE_SYMBOL, specifier, resolution: "suffix", offset });
  }
  return { bindings, facts };
}

function findJavaDynamic(code: string): DynamicMatch[] {
  return [
    ...collect(code, /\.get(?:Declared)?Method\s*\(\s*"(\w+)"/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: m[1],
      hint: { type: "bare" },
      kind: "call",
    })),
    ...collect(code, /\bClass\.forName\s*\(\s*"([\w.$]+)"\s*\)/g, (m, at) => ({
      start: at,
      end: at + m[0].length,
      targetName: MODULE_SYMBOL,
      hint: { type: "module", specifier: m[1].replace(/\./g, "/"), resolution: "suffix" },
      kind: "import",
    })),
  ];
}

function javaParam(param: string): string | null {
  return lastWord(param.replace(/@\w+(\([^)]*\))?/g, " ").replace(/<[^>]*>/g, " "));
}

// ============================================================================
// Registry
// ============================================================================

const C_LIKE_KEYWORDS = ["if", "for", "while", "switch", "return", "catch", "sizeof", "else", "case"];

export const LANGUAGE_PATTERNS: Record<PatternLanguage, LanguagePatterns> = {
  python: {
    language: "python",
    extensions: [".py", ".pyi"],
    lex: {
      lineComment: "#",
      blockComments: false,
      nestedBlockComments: false,
      tripleQuotes: true,
      backtickStrings: false,
      singleQuote: "string",
    },
    block: "indent",
    declaration: /^[ \t]*(?:async[ \t]+)?def[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?=\()/gm,
    container: /^[ \t]*class[ \t]+(?<name>[A-Za-z_]\w*)/gm,
    selfNames: ["self", "cls"],
    implicitParams: /^(?:self|cls)$/,
    keywords: new Set([
      "if", "elif", "while", "for", "return", "def", "class", "and", "or", "not",
      "in", "is", "lambda", "yield", "await", "with", "assert", "del", "except",
    ]),
    conditionalHeader: /^(?:if|elif|else|except|case)\b/,
    ternary: false,
    shortCircuit: /\b(?:and|or)\b/,
    parseImports: parsePythonImports,
    findDynamic: findPythonDynamic,
    paramName: pythonParam,
  },
  go: {
    language: "go",
    extensions: [".go"],
    lex: {
      lineComment: "//",
      blockComments: true,
      nestedBlockComments: false,
      tripleQuotes: false,
      backtickStrings: true,
      singleQuote: "char",
    },
    block: "brace",
    declaration: /^func[ \t]*(?:\((?<receiver>[^)]*)\)[ \t]*)?(?<name>[A-Za-z_]\w*)[ \t]*(?:\[[^\]\n]*\][ \t]*)?(?=\()/gm,
    container: null,
    selfNames: [],
    implicitParams: null,
    keywords: new Set([...C_LIKE_KEYWORDS, "func", "go", "defer", "select", "range", "map", "chan", "interface", "struct"]),
    conditionalHeader: /\b(?:if|else|switch|select|case|default)\b/,
    ternary: false,
    shortCircuit: /&&|\|\|/,
    parseImports: parseGoImports,
    findDynamic: findGoDynamic,
    paramName: goParam,
  },
  rust: {
    language: "rust",
    extensions: [".rs"],
    lex: {
      lineComment: "//",
      blockComments: true,
      nestedBlockComments: true,
      tripleQuotes: false,
      backtickStrings: false,
      singleQuote: "char",
    },
    block: "brace",
    declaration:
      /^[ \t]*(?:pub(?:\([^)\n]*\))?[ \t]+)?(?:default[ \t]+)?(?:const[ \t]+)?(?:async[ \t]+)?(?:unsafe[ \t]+)?(?:extern[ \t]+"[^"\n]*"[ \t]+)?fn[ \t]+(?<name>[A-Za-z_]\w*)[ \t]*(?:<[^>(\n]*>[ \t]*)?(?=\()/gm,
    container:
      /^[ \t]*(?:pub(?:\([^)\n]*\))?[ \t]+)?(?:unsafe[ \t]+)?(?:impl(?:[ \t]*<[^>{\n]*>)?[ \t]+(?:[\w:]+(?:<[^>{\n]*>)?[ \t]+for[ \t]+)?|trait[ \t]+)(?<name>[A-Za-z_]\w*)/gm,
    selfNames: ["self", "Self"],
    implicitParams: /^&?(?:'\w+\s+)?(?:mut\s+)?self(?:\s*:.*)?$/,
    keywords: new Set([...C_LIKE_KEYWORDS, "fn", "match", "loop", "in", "as", "move", "impl", "where", "let"]),
    conditionalHeader: /\b(?:if|else|match)\b/,
    ternary: false,
    shortCircuit: /&&|\|\|/,
    parseImports: parseRustImports,
    findDynamic: findRustDynamic,
    paramName: rustParam,
  },
  java: {
    language: "java",
    extensions: [".java"],
    lex: {
      lineComment: "//",
      blockComments: true,
      nestedBlockComments: false,
      tripleQuotes: true,
      backtickStrings: false,
      singleQuote: "char",
    },
    block: "brace",
    declaration:
      /^[ \t]*(?:@\w+(?:\([^)\n]*\))?[ \t]+)*(?:(?:public|protected|private|static|final|abstract|synchronized|native|default|strictfp)[ \t]+)*(?:<[^>\n]+>[ \t]+)?(?:(?<type>[\w.$]+(?:<[^(\n]*>)?(?:\[\])*)[ \t]+)?(?<name>[A-Za-z_$][\w$]*)[ \t]*(?=\()/gm,
    container:
      /^[ \t]*(?:(?:public|protected|private|static|final|abstract|sealed|non-sealed)[ \t]+)*(?:class|interface|enum|record)[ \t]+(?<name>[A-Za-z_$][\w$]*)/gm,
    selfNames: ["this"],
    implicitParams: null,
    keywords: new Set([...C_LIKE_KEYWORDS, "new", "throw", "synchronized", "super", "this", "try", "assert"]),
    conditionalHeader: /\b(?:if|else|switch|case|default|catch)\b/,
    ternary: true,
    shortCircuit: /&&|\|\|/,
    parseImports: parseJavaImports,
    findDynamic: findJavaDynamic,
    paramName: javaParam,
  },
};
