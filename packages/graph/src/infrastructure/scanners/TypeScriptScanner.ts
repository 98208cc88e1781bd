/**
 * TypeScript/JavaScript scanner built on the TypeScript compiler API.
 *
 * Symbols: function declarations, consts bound to arrow or function
 * expressions, class methods, accessors and constructors, plus the file's
 * `<module>` symbol. Edges: calls, `new`, imports (static, dynamic and
 * `require`), re-exports, and functions passed as arguments (`compose`).
 */

import ts from "typescript";
import { Err, Ok, type Result } from "@depmap/core";
import { ScanError } from "../../core/errors.js";
import {
  MODULE_SYMBOL,
  symbolKey,
  type EdgeDraft,
  type Language,
  type Reach,
  type RelationKind,
  type ScanDrafts,
  type SymbolDraft,
  type SymbolKind,
  type TargetHint,
} from "../../core/model.js";
import type { SourceScanner } from "../../core/ports/SourceScanner.js";

const EXTENSIONS: Readonly<Record<string, Language>> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
};

const MAX_SIGNATURE = 200;
const MAX_DESCRIPTOR = 60;

interface ImportBinding {
  specifier: string;
  /** Exported name, or the local name for default imports. */
  imported: string;
  namespace: boolean;
}

interface Owner {
  key: string;
  name: string;
}

type FunctionLike = ts.FunctionDeclaration | ts.FunctionExpression | ts.ArrowFunction | ts.MethodDeclaration
  | ts.ConstructorDeclaration | ts.GetAccessorDeclaration | ts.SetAccessorDeclaration;

function scriptKindFor(path: string): ts.ScriptKind {
  if (path.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (path.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(path)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

export function moduleHint(specifier: string): TargetHint {
  return {
    type: "module",
    specifier,
    resolution: specifier.startsWith(".") ? "relative" : "package",
  };
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ");
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

function skipWrappers(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current) || ts.isNonNullExpression(current) || ts.isAsExpression(current)) {
    current = current.expression;
  }
  return current;
}

function isShortCircuit(kind: ts.SyntaxKind): boolean {
  return (
    kind === ts.SyntaxKind.AmpersandAmpersandToken ||
    kind === ts.SyntaxKind.BarBarToken ||
    kind === ts.SyntaxKind.QuestionQuestionToken ||
    kind === ts.SyntaxKind.AmpersandAmpersandEqualsToken ||
    kind === ts.SyntaxKind.BarBarEqualsToken ||
    kind === ts.SyntaxKind.QuestionQuestionEqualsToken
  );
}

function collectBindingNames(name: ts.BindingName, into: Set<string>): void {
  if (ts.isIdentifier(name)) {
    into.add(name.text);
    return;
  }
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) collectBindingNames(element.name, into);
  }
}

function parameterNames(fn: FunctionLike): Set<string> {
  const names = new Set<string>();
  for (const param of fn.parameters) collectBindingNames(param.name, names);
  return names;
}

/** Parameters excluding a TypeScript `this` annotation. */
function realParameters(fn: FunctionLike): ts.ParameterDeclaration[] {
  return fn.parameters.filter((p) => !(ts.isIdentifier(p.name) && p.name.text === "this"));
}

function functionInitializer(node: ts.Expression | undefined): ts.ArrowFunction | ts.FunctionExpression | null {
  if (!node) return null;
  const inner = skipWrappers(node);
  return ts.isArrowFunction(inner) || ts.isFunctionExpression(inner) ? inner : null;
}

function memberName(name: ts.PropertyName): string {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return name.getText();
}

/**
 * Syntactic diagnostics only; type errors are none of our business.
 */
function firstSyntaxError(path: string, content: string): ScanError | null {
  const { diagnostics = [] } = ts.transpileModule(content, {
    fileName: path,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });
  const error = diagnostics.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (!error) return null;
  const message = ts.flattenDiagnosticMessageText(error.messageText, "\n");
  const line =
    error.file && error.start !== undefined ? error.file.getLineAndCharacterOfPosition(error.start).line + 1 : null;
  return new ScanError(path, message, line);
}

export class TypeScriptScanner implements SourceScanner {
  readonly name = "typescript";
  readonly extensions = EXTENSIONS;

  scan(path: string, content: string): Result<ScanDrafts, ScanError> {
    const syntaxError = firstSyntaxError(path, content);
    if (syntaxError) return Err(syntaxError);
    const source = ts.createSourceFile(path, content, ts.ScriptTarget.Latest, true, scriptKindFor(path));
    return Ok(new FileWalk(source).run());
  }
}

/**
 * One pass over a parsed file. Tracks the enclosing symbol, the parameter
 * names in scope and how many conditional branches deep the walk is.
 */
class FileWalk {
  private symbols: SymbolDraft[] = [];
  private edges: EdgeDraft[] = [];
  private keys = new Set<string>();
  private imports = new Map<string, ImportBinding>();
  private topLevelFunctions = new Set<string>();
  private params: Array<Set<string>> = [];
  private conditional = 0;
  private owner: Owner;

  constructor(private readonly source: ts.SourceFile) {
    const lastLine = source.getLineAndCharacterOfPosition(source.getEnd()).line + 1;
    this.owner = this.addSymbol(MODULE_SYMBOL, "module", 0, null, 1, lastLine) ?? {
      key: symbolKey(MODULE_SYMBOL, 0),
      name: MODULE_SYMBOL,
    };
  }

  run(): ScanDrafts {
    this.collectTopLevel();
    for (const statement of this.source.statements) this.visitTopLevel(statement);
    return { symbols: this.symbols, edges: this.edges };
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private collectTopLevel(): void {
    for (const statement of this.source.statements) {
      if (ts.isFunctionDeclaration(statement) && statement.name) {
        this.topLevelFunctions.add(statement.name.text);
      } else if (ts.isVariableStatement(statement)) {
        for (const decl of statement.declarationList.declarations) {
          if (ts.isIdentifier(decl.name) && functionInitializer(decl.initializer)) {
            this.topLevelFunctions.add(decl.name.text);
          }
        }
      } else if (ts.isImportDeclaration(statement)) {
        this.collectImport(statement);
      } else if (ts.isImportEqualsDeclaration(statement) && !statement.isTypeOnly) {
        const ref = statement.moduleReference;
        if (ts.isExternalModuleReference(ref) && ts.isStringLiteral(ref.expression)) {
          this.imports.set(statement.name.text, {
            specifier: ref.expression.text,
            imported: statement.name.text,
            namespace: true,
          });
        }
      }
    }
  }

  private collectImport(node: ts.ImportDeclaration): void {
    if (!ts.isStringLiteral(node.moduleSpecifier)) return;
    const specifier = node.moduleSpecifier.text;
    const clause = node.importClause;
    if (!clause || clause.isTypeOnly) return;
    if (clause.name) {
      this.imports.set(clause.name.text, { specifier, imported: clause.name.text, namespace: false });
    }
    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) {
      this.imports.set(bindings.name.text, { specifier, imported: MODULE_SYMBOL, namespace: true });
    } else if (bindings) {
      for (const element of bindings.elements) {
        if (element.isTypeOnly) continue;
        const imported = element.propertyName ? element.propertyName.text : element.name.text;
        this.imports.set(element.name.text, { specifier, imported, namespace: false });
      }
    }
  }

  private visitTopLevel(node: ts.Statement): void {
    if (ts.isFunctionDeclaration(node)) {
      if (!node.body) return;
      const name = node.name ? node.name.text : "default";
      this.visitFunction(name, "function", node, node.body);
    } else if (ts.isVariableStatement(node)) {
      for (const decl of node.declarationList.declarations) {
        const fn = functionInitializer(decl.initializer);
        if (fn && ts.isIdentifier(decl.name)) {
          this.visitFunction(decl.name.text, "function", fn, fn.body);
        } else if (decl.initializer) {
          this.visit(decl.initializer);
        }
      }
    } else if (ts.isClassDeclaration(node)) {
      this.visitClass(node);
    } else if (ts.isImportDeclaration(node)) {
      this.emitImport(node);
    } else if (ts.isExportDeclaration(node)) {
      this.emitReExport(node);
    } else if (ts.isImportEqualsDeclaration(node)) {
      const binding = this.imports.get(node.name.text);
      if (binding) this.addEdge(MODULE_SYMBOL, moduleHint(binding.specifier), "import", "direct", node);
    } else {
      this.visit(node);
    }
  }

  private visitClass(node: ts.ClassDeclaration): void {
    const className = node.name ? node.name.text : "default";
    for (const member of node.members) {
      if (ts.isMethodDeclaration(member) && member.body) {
        this.visitFunction(`${className}.${memberName(member.name)}`, "method", member, member.body);
      } else if (ts.isConstructorDeclaration(member) && member.body) {
        this.visitFunction(`${className}.constructor`, "method", member, member.body);
      } else if ((ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) && member.body) {
        this.visitFunction(`${className}.${memberName(member.name)}`, "method", member, member.body);
      } else if (ts.isPropertyDeclaration(member)) {
        const fn = functionInitializer(member.initializer);
        if (fn) {
          this.visitFunction(`${className}.${memberName(member.name)}`, "method", fn, fn.body);
        } else if (member.initializer) {
          this.visit(member.initializer);
        }
      } else if (ts.isClassStaticBlockDeclaration(member)) {
        this.visit(member.body);
      }
    }
  }

  private visitFunction(name: string, kind: SymbolKind, fn: FunctionLike, body: ts.Node): void {
    const params = realParameters(fn);
    const signature = truncate(`(${params.map((p) => p.getText()).join(", ")})`, MAX_SIGNATURE);
    const owner = this.addSymbol(name, kind, params.length, signature, this.lineOf(fn), this.endLineOf(fn));
    if (!owner) return;

    const previous = this.owner;
    const depth = this.conditional;
    this.owner = owner;
    this.conditional = 0;
    this.params.push(parameterNames(fn));
    for (const param of fn.parameters) {
      if (param.initializer) this.visit(param.initializer);
    }
    this.visit(body);
    this.params.pop();
    this.conditional = depth;
    this.owner = previous;
  }

  private addSymbol(
    name: string,
    kind: SymbolKind,
    arity: number,
    signature: string | null,
    line: number,
    endLine: number
  ): Owner | null {
    const key = symbolKey(name, arity);
    // First declaration wins; later duplicates fold into it.
    if (this.keys.has(key)) return null;
    this.keys.add(key);
    this.symbols.push({ name, kind, arity, signature, line, endLine });
    return { key, name };
  }

  // ==========================================================================
  // Imports
  // ==========================================================================

  private emitImport(node: ts.ImportDeclaration): void {
    if (!ts.isStringLiteral(node.moduleSpecifier)) return;
    const clause = node.importClause;
    if (clause?.isTypeOnly) return;
    const hint = moduleHint(node.moduleSpecifier.text);

    if (!clause) {
      this.addEdge(MODULE_SYMBOL, hint, "import", "direct", node);
      return;
    }
    if (clause.name) this.addEdge(clause.name.text, hint, "import", "direct", node);
    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) {
      this.addEdge(MODULE_SYMBOL, hint, "import", "direct", node);
    } else if (bindings) {
      for (const element of bindings.elements) {
        if (element.isTypeOnly) continue;
        const imported = element.propertyName ? element.propertyName.text : element.name.text;
        this.addEdge(imported, hint, "import", "direct", node);
      }
    }
  }

  private emitReExport(node: ts.ExportDeclaration): void {
    if (node.isTypeOnly || !node.moduleSpecifier || !ts.isStringLiteral(node.moduleSpecifier)) return;
    const hint = moduleHint(node.moduleSpecifier.text);
    const clause = node.exportClause;
    if (clause && ts.isNamedExports(clause)) {
      for (const element of clause.elements) {
        if (element.isTypeOnly) continue;
        const imported = element.propertyName ? element.propertyName.text : element.name.text;
        this.addEdge(imported, hint, "import", "direct", node);
      }
    } else {
      this.addEdge(MODULE_SYMBOL, hint, "import", "direct", node);
    }
  }

  // ==========================================================================
  // Bodies
  // ==========================================================================

  private visit(node: ts.Node): void {
    if (ts.isCallExpression(node)) {
      this.handleCall(node);
      ts.forEachChild(node, (child) => this.visit(child));
    } else if (ts.isNewExpression(node)) {
      this.handleNew(node);
      ts.forEachChild(node, (child) => this.visit(child));
    } else if (ts.isIfStatement(node)) {
      this.visit(node.expression);
      this.inBranch(() => {
        this.visit(node.thenStatement);
        if (node.elseStatement) this.visit(node.elseStatement);
      });
    } else if (ts.isConditionalExpression(node)) {
      this.visit(node.condition);
      this.inBranch(() => {
        this.visit(node.whenTrue);
        this.visit(node.whenFalse);
      });
    } else if (ts.isSwitchStatement(node)) {
      this.visit(node.expression);
      this.inBranch(() => this.visit(node.caseBlock));
    } else if (ts.isBinaryExpression(node) && isShortCircuit(node.operatorToken.kind)) {
      this.visit(node.left);
      this.inBranch(() => this.visit(node.right));
    } else if (ts.isCatchClause(node)) {
      this.inBranch(() => ts.forEachChild(node, (child) => this.visit(child)));
    } else if (
      ts.isArrowFunction(node) ||
      ts.isFunctionExpression(node) ||
      ts.isFunctionDeclaration(node) ||
      ts.isMethodDeclaration(node)
    ) {
      this.params.push(parameterNames(node));
      ts.forEachChild(node, (child) => this.visit(child));
      this.params.pop();
    } else {
      ts.forEachChild(node, (child) => this.visit(child));
    }
  }

  private inBranch(fn: () => void): void {
    this.conditional++;
    try {
      fn();
    } finally {
      this.conditional--;
    }
  }

  private baseReach(node: ts.Node): Reach {
    return this.conditional > 0 || ts.isOptionalChain(node) ? "conditional" : "direct";
  }

  private handleCall(call: ts.CallExpression): void {
    const reach = this.baseReach(call);
    const callee = skipWrappers(call.expression);
    const firstArg = call.arguments[0];
    const literal = firstArg && ts.isStringLiteralLike(firstArg) ? firstArg.text : null;

    if (callee.kind === ts.SyntaxKind.ImportKeyword) {
      if (literal !== null) this.addEdge(MODULE_SYMBOL, moduleHint(literal), "import", "indirect", call);
      else this.addEdge(truncate(call.getText(), MAX_DESCRIPTOR), { type: "opaque" }, "import", "indirect", call);
      return;
    }
    if (ts.isIdentifier(callee) && callee.text === "require" && literal !== null) {
      this.addEdge(MODULE_SYMBOL, moduleHint(literal), "import", reach, call);
      return;
    }

    this.emitCallee(callee, reach, call);
    this.emitComposed(call.arguments, reach);
  }

  private emitCallee(callee: ts.Expression, reach: Reach, site: ts.Node): void {
    if (ts.isIdentifier(callee)) {
      const name = callee.text;
      if (name === "eval" || this.isParameter(name)) {
        this.addEdge(name, { type: "opaque" }, "call", "indirect", site);
        return;
      }
      const binding = this.imports.get(name);
      if (binding) {
        this.addEdge(binding.imported, moduleHint(binding.specifier), "call", reach, site);
        return;
      }
      this.addEdge(name, { type: "bare" }, "call", reach, site);
      return;
    }

    if (ts.isPropertyAccessExpression(callee)) {
      const member = callee.name.text;
      const receiver = skipWrappers(callee.expression);
      if ((member === "call" || member === "apply" || member === "bind") && this.isCallableName(receiver)) {
        this.emitCallee(receiver, reach, site);
        return;
      }
      if (receiver.kind === ts.SyntaxKind.ThisKeyword) {
        this.addEdge(member, { type: "self" }, "call", reach, site);
        return;
      }
      if (ts.isIdentifier(receiver)) {
        if (receiver.text === "Reflect" && (member === "apply" || member === "construct")) {
          this.addEdge(`Reflect.${member}`, { type: "opaque" }, "call", "indirect", site);
          return;
        }
        const binding = this.imports.get(receiver.text);
        if (binding) {
          const name = binding.namespace ? member : `${binding.imported}.${member}`;
          this.addEdge(name, moduleHint(binding.specifier), "call", reach, site);
          return;
        }
      }
      this.addEdge(member, { type: "member", receiver: this.receiverText(receiver) }, "call", reach, site);
      return;
    }

    if (ts.isElementAccessExpression(callee)) {
      const arg = callee.argumentExpression;
      if (ts.isStringLiteralLike(arg)) {
        const hint: TargetHint =
          skipWrappers(callee.expression).kind === ts.SyntaxKind.ThisKeyword ? { type: "self" } : { type: "bare" };
        this.addEdge(arg.text, hint, "call", "indirect", site);
      } else {
        this.addEdge(truncate(callee.getText(), MAX_DESCRIPTOR), { type: "opaque" }, "call", "indirect", site);
      }
      return;
    }

    if (ts.isFunctionExpression(callee) || ts.isArrowFunction(callee)) return;

    this.addEdge(truncate(callee.getText(), MAX_DESCRIPTOR), { type: "opaque" }, "call", "indirect", site);
  }

  private handleNew(node: ts.NewExpression): void {
    const reach = this.baseReach(node);
    const callee = skipWrappers(node.expression);
    if (ts.isIdentifier(callee)) {
      const binding = this.imports.get(callee.text);
      if (binding && !binding.namespace) {
        this.addEdge(`${binding.imported}.constructor`, moduleHint(binding.specifier), "call", reach, node);
      } else {
        this.addEdge("constructor", { type: "member", receiver: callee.text }, "call", reach, node);
      }
    } else if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.expression)) {
      const binding = this.imports.get(callee.expression.text);
      if (binding?.namespace) {
        this.addEdge(`${callee.name.text}.constructor`, moduleHint(binding.specifier), "call", reach, node);
      }
    }
    if (node.arguments) this.emitComposed(node.arguments, reach);
  }

  /** Functions handed to another call by name. */
  private emitComposed(args: ts.NodeArray<ts.Expression>, reach: Reach): void {
    for (const raw of args) {
      const arg = skipWrappers(raw);
      if (ts.isIdentifier(arg)) {
        if (this.isParameter(arg.text)) continue;
        const binding = this.imports.get(arg.text);
        if (binding && !binding.namespace) {
          this.addEdge(binding.imported, moduleHint(binding.specifier), "compose", reach, arg);
        } else if (this.topLevelFunctions.has(arg.text)) {
          this.addEdge(arg.text, { type: "bare" }, "compose", reach, arg);
        }
      } else if (ts.isPropertyAccessExpression(arg) && arg.expression.kind === ts.SyntaxKind.ThisKeyword) {
        this.addEdge(arg.name.text, { type: "self" }, "compose", reach, arg);
      }
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private isParameter(name: string): boolean {
    return this.params.some((scope) => scope.has(name));
  }

  private isCallableName(node: ts.Expression): boolean {
    return ts.isIdentifier(node) || (ts.isPropertyAccessExpression(node) && node.expression.kind === ts.SyntaxKind.ThisKeyword);
  }

  private receiverText(node: ts.Expression): string {
    if (ts.isIdentifier(node)) return node.text;
    if (ts.isPropertyAccessExpression(node)) {
      const inner = skipWrappers(node.expression);
      if (inner.kind === ts.SyntaxKind.ThisKeyword) return `this.${node.name.text}`;
      if (ts.isIdentifier(inner) || ts.isPropertyAccessExpression(inner)) {
        return `${this.receiverText(inner)}.${node.name.text}`;
      }
    }
    if (node.kind === ts.SyntaxKind.SuperKeyword) return "super";
    return "<expr>";
  }

  private addEdge(targetName: string, hint: TargetHint, kind: RelationKind, reach: Reach, site: ts.Node): void {
    this.edges.push({
      sourceKey: this.owner.key,
      targetName,
      hint,
      kind,
      reach,
      line: this.lineOf(site),
    });
  }

  private lineOf(node: ts.Node): number {
    return this.source.getLineAndCharacterOfPosition(node.getStart(this.source)).line + 1;
  }

  private endLineOf(node: ts.Node): number {
    return this.source.getLineAndCharacterOfPosition(node.getEnd()).line + 1;
  }
}
