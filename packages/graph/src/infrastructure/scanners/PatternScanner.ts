/**
 * Regex-driven scanner for languages without a bundled parser.
 *
 * Works on a lexed copy of the file where comments and string contents are
 * blanked, so patterns never fire inside them. Block extents come from
 * brace matching or indentation, depending on the language.
 */

import { Err, Ok, type Result } from "@depmap/core";
import { ScanError } from "../../core/errors.js";
import {
  MODULE_SYMBOL,
  symbolKey,
  type EdgeDraft,
  type Language,
  type Reach,
  type ScanDrafts,
  type SymbolDraft,
  type TargetHint,
} from "../../core/model.js";
import type { SourceScanner } from "../../core/ports/SourceScanner.js";
import { LANGUAGE_PATTERNS, type ImportBinding, type LanguagePatterns, type PatternLanguage } from "./patterns.js";
import { LineMap, lex, matchClosing, splitTopLevel } from "./text.js";

const CALL = /((?:[A-Za-z_$][\w$]*[ \t]*(?:\.|::)[ \t]*)*)([A-Za-z_$][\w$]*)[ \t]*(?:::<[^>\n]*>)?[ \t]*\(/g;
const MAX_SIGNATURE = 200;

interface Span {
  start: number;
  end: number;
}

interface Declaration extends Span {
  key: string;
  name: string;
  /** Calls before the body (default arguments) belong to the enclosing scope. */
  bodyStart: number;
  params: Set<string>;
  /** Go receiver variable, used like `self`. */
  receiverVar: string | null;
}

interface Container extends Span {
  name: string;
}

export class PatternScanner implements SourceScanner {
  readonly name: string;
  readonly extensions: Readonly<Record<string, Language>>;
  private readonly patterns: LanguagePatterns;

  constructor(language: PatternLanguage) {
    this.patterns = LANGUAGE_PATTERNS[language];
    this.name = language;
    this.extensions = Object.fromEntries(this.patterns.extensions.map((ext) => [ext, language]));
  }

  scan(path: string, content: string): Result<ScanDrafts, ScanError> {
    if (content.includes("\u0000")) {
      return Err(new ScanError(path, "Binary content"));
    }
    const unbalanced = firstUnbalanced(lex(content, this.patterns.lex).masked);
    if (unbalanced !== -1) {
      return Err(new ScanError(path, "Unbalanced brackets", new LineMap(content).lineOf(unbalanced)));
    }
    return Ok(new PatternWalk(this.patterns, content).run());
  }
}

const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

/** Offset of the first bracket that never closes or closes the wrong opener. */
function firstUnbalanced(masked: string): number {
  const open: number[] = [];
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === "(" || ch === "[" || ch === "{") {
      open.push(i);
    } else if (ch in CLOSERS) {
      const opener = open.pop();
      if (opener === undefined || masked[opener] !== CLOSERS[ch]) return i;
    }
  }
  return open.length > 0 ? open[0] : -1;
}

function indentOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].replace(/\t/g, "    ").length : 0;
}

class PatternWalk {
  private readonly code: string;
  private readonly masked: string;
  private readonly lines: LineMap;
  private readonly maskedLines: string[];
  private symbols: SymbolDraft[] = [];
  private edges: EdgeDraft[] = [];
  private declarations: Declaration[] = [];
  private bindings = new Map<string, ImportBinding>();
  /** Offsets of declaration and container names, never calls. */
  private headerNames = new Set<number>();
  private conditionalBlocks: Span[] = [];

  constructor(
    private readonly patterns: LanguagePatterns,
    content: string
  ) {
    const lexed = lex(content, patterns.lex);
    this.code = lexed.code;
    this.masked = lexed.masked;
    this.lines = new LineMap(content);
    this.maskedLines = this.masked.split("\n");
  }

  run(): ScanDrafts {
    this.symbols.push({
      name: MODULE_SYMBOL,
      kind: "module",
      arity: 0,
      signature: null,
      line: 1,
      endLine: this.lines.lineCount,
    });

    const containers = this.findContainers();
    this.findDeclarations(containers);
    if (this.patterns.block === "brace") this.findConditionalBlocks();

    const imports = this.patterns.parseImports(this.code);
    for (const binding of imports.bindings) this.bindings.set(binding.local, binding);
    for (const fact of imports.facts) {
      this.edges.push({
        sourceKey: this.ownerAt(fact.offset).key,
        targetName: fact.targetName,
        hint: { type: "module", specifier: fact.specifier, resolution: fact.resolution },
        kind: "import",
        reach: "direct",
        line: this.lines.lineOf(fact.offset),
      });
    }

    const dynamic = this.patterns.findDynamic(this.code);
    for (const match of dynamic) {
      this.edges.push({
        sourceKey: this.ownerAt(match.start).key,
        targetName: match.targetName,
        hint: match.hint,
        kind: match.kind,
        reach: "indirect",
        line: this.lines.lineOf(match.start),
      });
    }

    this.findCalls(dynamic);
    return { symbols: this.symbols, edges: this.edges };
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private findContainers(): Container[] {
    const pattern = this.patterns.container;
    if (!pattern) return [];
    const containers: Container[] = [];
    for (const match of this.masked.matchAll(pattern)) {
      const name = match.groups?.name;
      if (!name) continue;
      const start = match.index ?? 0;
      this.headerNames.add(start + match[0].length - name.length);
      const body = this.bodyStart(start + match[0].length);
      if (body === null) continue;
      const end = this.blockEnd(start, body);
      if (end !== null) containers.push({ name, start, end });
    }
    return containers;
  }

  private findDeclarations(containers: Container[]): void {
    const seen = new Set<string>();
    for (const match of this.masked.matchAll(this.patterns.declaration)) {
      const name = match.groups?.name;
      if (!name || this.patterns.keywords.has(name)) continue;
      const type = match.groups?.type;
      if (type && this.patterns.keywords.has(type)) continue;

      const start = match.index ?? 0;
      const open = start + match[0].length;
      const close = matchClosing(this.masked, open);
      if (close === -1) continue;
      const body = this.bodyStart(close + 1);
      if (body === null) continue;
      const end = this.blockEnd(start, body);
      if (end === null) continue;

      this.headerNames.add(open - (match[0].length - match[0].trimEnd().length) - name.length);

      const owner = this.ownerName(match.groups?.receiver, containers, start);
      const qualified = owner === null ? name : `${owner}.${owner === name ? "constructor" : name}`;
      const rawParams = splitTopLevel(this.code.slice(open + 1, close));
      const params = this.explicitParams(rawParams, owner !== null);
      const key = symbolKey(qualified, params.length);
      if (seen.has(key)) continue;
      seen.add(key);

      const signature = `(${rawParams.join(", ")})`.replace(/\s+/g, " ");
      this.symbols.push({
        name: qualified,
        kind: owner === null ? "function" : "method",
        arity: params.length,
        signature: signature.length > MAX_SIGNATURE ? `${signature.slice(0, MAX_SIGNATURE - 1)}…` : signature,
        line: this.lines.lineOf(start),
        endLine: this.lines.lineOf(end),
      });
      this.declarations.push({
        key,
        name: qualified,
        start,
        end,
        bodyStart: body,
        params: new Set(params.flatMap((p) => {
          const param = this.patterns.paramName(p);
          return param ? [param] : [];
        })),
        receiverVar: this.receiverVar(match.groups?.receiver),
      });
    }
  }

  private ownerName(receiver: string | undefined, containers: Container[], offset: number): string | null {
    if (receiver !== undefined) {
      const words = receiver.replace(/\[[^\]]*\]/g, "").match(/[A-Za-z_]\w*/g);
      return words ? words[words.length - 1] : null;
    }
    let innermost: Container | null = null;
    for (const container of containers) {
      if (container.start < offset && offset <= container.end) {
        if (!innermost || container.start > innermost.start) innermost = container;
      }
    }
    return innermost ? innermost.name : null;
  }

  private receiverVar(receiver: string | undefined): string | null {
    if (receiver === undefined) return null;
    const words = receiver.trim().split(/\s+/);
    return words.length > 1 ? words[0] : null;
  }

  private explicitParams(raw: string[], isMember: boolean): string[] {
    const implicit = this.patterns.implicitParams;
    const params = raw.filter((p) => p !== "*" && p !== "/");
    if (isMember && implicit && params.length > 0 && implicit.test(params[0])) {
      return params.slice(1);
    }
    return params;
  }

  /**
   * Offset where the body begins: after `{` for brace languages, after the
   * header's `:` for indentation languages. Null for bodiless declarations.
   */
  private bodyStart(from: number): number | null {
    if (this.patterns.block === "indent") {
      const colon = this.masked.indexOf(":", from);
      return colon === -1 ? null : colon + 1;
    }
    for (let i = from; i < this.masked.length; i++) {
      const ch = this.masked[i];
      if (ch === "{") return i + 1;
      if (ch === ";" || ch === "}") return null;
    }
    return null;
  }

  /** Offset of the last character of the block opened at `body`. */
  private blockEnd(start: number, body: number): number | null {
    if (this.patterns.block === "brace") {
      const close = matchClosing(this.masked, body - 1);
      return close === -1 ? null : close;
    }
    const headerLine = this.lines.lineOf(start);
    const headerIndent = indentOf(this.maskedLines[headerLine - 1]);
    const firstBodyLine = this.lines.lineOf(body);
    const sameLine = this.maskedLines[firstBodyLine - 1].slice(body - this.lines.startOf(firstBodyLine)).trim();
    let last = firstBodyLine;
    if (sameLine === "") {
      for (let line = firstBodyLine + 1; line <= this.maskedLines.length; line++) {
        const text = this.maskedLines[line - 1];
        if (text.trim() === "") continue;
        if (indentOf(text) <= headerIndent) break;
        last = line;
      }
    }
    return this.lines.startOf(last) + this.maskedLines[last - 1].length;
  }

  private ownerAt(offset: number): { key: string; declaration: Declaration | null } {
    let owner: Declaration | null = null;
    for (const decl of this.declarations) {
      if (decl.bodyStart <= offset && offset <= decl.end) {
        if (!owner || decl.start > owner.start) owner = decl;
      }
    }
    return owner ? { key: owner.key, declaration: owner } : { key: symbolKey(MODULE_SYMBOL, 0), declaration: null };
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  private findCalls(dynamic: Span[]): void {
    for (const match of this.masked.matchAll(CALL)) {
      const start = match.index ?? 0;
      const receiverText = match[1];
      const name = match[2];
      const nameOffset = start + receiverText.length;
      if (this.headerNames.has(nameOffset)) continue;
      if (this.patterns.keywords.has(name) && receiverText === "") continue;
      if (dynamic.some((span) => span.start <= nameOffset && nameOffset < span.end)) continue;
      const before = start > 0 ? this.masked[start - 1] : "";
      if (before === "@") continue;

      const { key, declaration } = this.ownerAt(start);
      const receiver = receiverText.replace(/[ \t]/g, "").replace(/::/g, ".").replace(/\.$/, "");
      const reach = this.reachAt(start, declaration);
      const edge = this.classifyCall(name, receiver, before, start, declaration, reach);
      if (!edge) continue;
      this.edges.push({ sourceKey: key, kind: "call", line: this.lines.lineOf(nameOffset), ...edge });
    }
  }

  private classifyCall(
    name: string,
    receiver: string,
    before: string,
    start: number,
    owner: Declaration | null,
    reach: Reach
  ): { targetName: string; hint: TargetHint; reach: Reach } | null {
    // `foo().bar(` or `x[0].bar(`: the receiver is an expression.
    if (receiver === "" && before === ".") {
      return { targetName: name, hint: { type: "member", receiver: "<expr>" }, reach };
    }

    if (receiver === "") {
      if (/\bnew\s+$/.test(this.masked.slice(Math.max(0, start - 8), start))) {
        const binding = this.bindings.get(name);
        if (binding && !binding.namespace) {
          return {
            targetName: `${binding.imported}.constructor`,
            hint: { type: "module", specifier: binding.specifier, resolution: binding.resolution },
            reach,
          };
        }
        return { targetName: "constructor", hint: { type: "member", receiver: name }, reach };
      }
      if (owner?.params.has(name)) {
        return { targetName: name, hint: { type: "opaque" }, reach: "indirect" };
      }
      const binding = this.bindings.get(name);
      if (binding) {
        return {
          targetName: binding.namespace ? MODULE_SYMBOL : binding.imported,
          hint: { type: "module", specifier: binding.specifier, resolution: binding.resolution },
          reach,
        };
      }
      return { targetName: name, hint: { type: "bare" }, reach };
    }

    const head = receiver.split(".")[0];
    if (receiver === head && (this.patterns.selfNames.includes(head) || head === owner?.receiverVar)) {
      return { targetName: name, hint: { type: "self" }, reach };
    }
    const binding = this.bindings.get(head);
    if (binding && receiver === head) {
      return {
        targetName: binding.namespace ? name : `${binding.imported}.${name}`,
        hint: { type: "module", specifier: binding.specifier, resolution: binding.resolution },
        reach,
      };
    }
    return { targetName: name, hint: { type: "member", receiver }, reach };
  }

  // ==========================================================================
  // Reach
  // ==========================================================================

  private findConditionalBlocks(): void {
    const stack: Array<{ open: number; conditional: boolean }> = [];
    let boundary = 0;
    for (let i = 0; i < this.masked.length; i++) {
      const ch = this.masked[i];
      if (ch === "{") {
        const header = this.masked.slice(boundary, i);
        stack.push({ open: i, conditional: this.patterns.conditionalHeader.test(header) });
        boundary = i + 1;
      } else if (ch === "}") {
        const block = stack.pop();
        if (block?.conditional) this.conditionalBlocks.push({ start: block.open, end: i });
        boundary = i + 1;
      } else if (ch === ";") {
        boundary = i + 1;
      }
    }
  }

  private reachAt(offset: number, owner: Declaration | null): Reach {
    const floor = owner ? owner.bodyStart : 0;
    if (this.patterns.block === "brace") {
      if (this.conditionalBlocks.some((block) => block.start > floor && block.start < offset && offset < block.end)) {
        return "conditional";
      }
      return this.conditionalPrefix(this.statementPrefix(offset)) ? "conditional" : "direct";
    }
    return this.indentReach(offset, floor);
  }

  /** Masked text from the last statement boundary up to `offset`. */
  private statementPrefix(offset: number): string {
    let i = offset - 1;
    while (i >= 0 && !";{}".includes(this.masked[i])) i--;
    return this.masked.slice(i + 1, offset);
  }

  private conditionalPrefix(prefix: string): boolean {
    if (this.patterns.shortCircuit.test(prefix)) return true;
    if (this.patterns.ternary && /\?(?![.?])/.test(prefix)) return true;
    if (/\belse\b/.test(prefix)) return true;
    const header = /\b(?:if|case|default)\b/.exec(prefix);
    if (!header) return false;
    // Past the condition's closing parenthesis means inside the branch.
    const afterKeyword = prefix.slice(header.index);
    let depth = 0;
    let closed = false;
    for (const ch of afterKeyword) {
      if (ch === "(") depth++;
      else if (ch === ")") {
        depth--;
        if (depth === 0) closed = true;
      }
    }
    return (closed && depth === 0) || /\b(?:case|default)\b[^:]*:/.test(afterKeyword);
  }

  /** Enclosing conditional headers by indentation, within the owner's body. */
  private indentReach(offset: number, floor: number): Reach {
    const lineNo = this.lines.lineOf(offset);
    const lineText = this.maskedLines[lineNo - 1];
    const column = offset - this.lines.startOf(lineNo);
    const trimmed = lineText.trim();
    let indent = indentOf(lineText);

    // Same-line branch: `if ok: save()`, `a() if c else b()`, `x or load()`.
    if (/^(?:if|elif)\b/.test(trimmed)) {
      const colon = lineText.lastIndexOf(":");
      if (/^elif\b/.test(trimmed) || (colon !== -1 && column > colon)) return "conditional";
    } else if (/^(?:else|except)\b/.test(trimmed)) {
      return "conditional";
    } else if (/\bif\b.*\belse\b/.test(trimmed)) {
      const ifAt = lineText.search(/\bif\b/);
      const elseAt = lineText.search(/\belse\b/);
      if (column < ifAt || column > elseAt) return "conditional";
    }
    if (this.patterns.shortCircuit.test(lineText.slice(0, column))) return "conditional";

    const floorLine = this.lines.lineOf(floor);
    for (let line = lineNo - 1; line >= floorLine && indent > 0; line--) {
      const text = this.maskedLines[line - 1];
      if (text.trim() === "") continue;
      const lineIndent = indentOf(text);
      if (lineIndent >= indent) continue;
      indent = lineIndent;
      if (this.patterns.conditionalHeader.test(text.trim()) && text.trimEnd().endsWith(":")) return "conditional";
    }
    return "direct";
  }
}
