/**
 * Text utilities for the pattern scanners. Every transformation keeps
 * offsets and line breaks intact so positions map back to the source.
 */

export interface LexOptions {
  lineComment: "#" | "//";
  blockComments: boolean;
  /** Rust block comments nest. */
  nestedBlockComments: boolean;
  /** Python and Java text blocks: `"""…"""`. */
  tripleQuotes: boolean;
  /** Go raw strings: `` `…` ``. */
  backtickStrings: boolean;
  /** `'` starts a string (python) or a char literal that must close within a few chars. */
  singleQuote: "string" | "char";
}

export interface LexedSource {
  /** Comments blanked, strings intact. */
  code: string;
  /** Comments blanked, string contents blanked (quotes kept). */
  masked: string;
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, " ");
}

/**
 * Blank comments and string contents without moving any character.
 */
export function lex(content: string, options: LexOptions): LexedSource {
  let code = "";
  let masked = "";
  let i = 0;
  const n = content.length;

  const emit = (text: string, kind: "code" | "comment" | "string-body"): void => {
    if (kind === "code") {
      code += text;
      masked += text;
    } else if (kind === "comment") {
      const spaces = blank(text);
      code += spaces;
      masked += spaces;
    } else {
      code += text;
      masked += blank(text);
    }
  };

  while (i < n) {
    const ch = content[i];
    const next = content[i + 1];

    // Line comment
    if (content.startsWith(options.lineComment, i)) {
      const end = content.indexOf("\n", i);
      const stop = end === -1 ? n : end;
      emit(content.slice(i, stop), "comment");
      i = stop;
      continue;
    }

    // Block comment
    if (options.blockComments && ch === "/" && next === "*") {
      let depth = 0;
      let j = i;
      while (j < n) {
        if (content.startsWith("/*", j)) {
          depth = options.nestedBlockComments ? depth + 1 : 1;
          j += 2;
        } else if (content.startsWith("*/", j)) {
          depth--;
          j += 2;
          if (depth <= 0) break;
        } else {
          j++;
        }
      }
      emit(content.slice(i, j), "comment");
      i = j;
      continue;
    }

    // Triple-quoted strings
    if (options.tripleQuotes && (content.startsWith('"""', i) || content.startsWith("'''", i))) {
      const quote = content.slice(i, i + 3);
      const end = content.indexOf(quote, i + 3);
      const stop = end === -1 ? n : end;
      emit(quote, "code");
      emit(content.slice(i + 3, stop), "string-body");
      if (end !== -1) emit(quote, "code");
      i = end === -1 ? n : end + 3;
      continue;
    }

    if (options.backtickStrings && ch === "`") {
      const end = content.indexOf("`", i + 1);
      const stop = end === -1 ? n : end;
      emit("`", "code");
      emit(content.slice(i + 1, stop), "string-body");
      if (end !== -1) emit("`", "code");
      i = end === -1 ? n : end + 1;
      continue;
    }

    if (ch === '"' || (ch === "'" && (options.singleQuote === "string" || isCharLiteral(content, i)))) {
      const stop = closingQuote(content, i);
      emit(ch, "code");
      emit(content.slice(i + 1, stop), "string-body");
      if (stop < n) emit(content[stop], "code");
      i = stop + 1;
      continue;
    }

    emit(ch, "code");
    i++;
  }

  return { code, masked };
}

/** `'a'`, `'\n'`, `'\u{1F600}'`; a lone `'a` (Rust lifetime) is not one. */
function isCharLiteral(content: string, start: number): boolean {
  return /^'(?:\\(?:u\{[0-9a-fA-F]+\}|.)|[^\\'\n])'/.test(content.slice(start, start + 12));
}

/** Offset of the quote closing the string opened at `start`, or the line end. */
function closingQuote(content: string, start: number): number {
  const quote = content[start];
  let i = start + 1;
  while (i < content.length) {
    const ch = content[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i;
    if (ch === "\n") return i;
    i++;
  }
  return content.length;
}

/**
 * Offset of the bracket closing the one at `open`, or -1 when unbalanced.
 */
export function matchClosing(text: string, open: number): number {
  const opener = text[open];
  const closer = opener === "(" ? ")" : opener === "[" ? "]" : "}";
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === opener) depth++;
    else if (ch === closer) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split on commas that are not nested inside brackets or generics.
 */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "-" && text[i + 1] === ">") {
      current += "->";
      i++;
      continue;
    }
    if ("([{<".includes(ch)) depth++;
    else if (")]}>".includes(ch)) depth = Math.max(0, depth - 1);
    if (ch === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  if (current.trim() !== "") parts.push(current.trim());
  return parts.filter((part) => part !== "");
}

/** 1-based line of every offset, via a precomputed table of line starts. */
export class LineMap {
  private starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === "\n") this.starts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.starts.length;
  }

  lineOf(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  startOf(line: number): number {
    return this.starts[line - 1];
  }
}
