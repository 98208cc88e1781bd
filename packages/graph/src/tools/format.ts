/**
 * Markdown rendering shared by the graph tools.
 */

import {
  describeTarget,
  type GraphEdge,
  type GraphStats,
  type GraphSymbol,
  type ImpactResult,
  type SyncReport,
} from "../core/model.js";
import type { CycleReport } from "../infrastructure/CycleDetector.js";
import type { EdgeView, SymbolDetail } from "../infrastructure/GraphEngine.js";

/** `Repo.save/2 (method) L12-30` */
export function formatSymbolLine(symbol: GraphSymbol): string {
  const lines = symbol.line === symbol.endLine ? `L${symbol.line}` : `L${symbol.line}-${symbol.endLine}`;
  return `${symbol.name}/${symbol.arity} (${symbol.kind}) ${lines} \`${symbol.id}\``;
}

export function formatSyncReport(report: SyncReport): string {
  const lines = [
    "## Sync",
    "",
    `**Files:** ${report.added} added, ${report.modified} modified, ${report.removed} removed, ${report.unchanged} unchanged`,
    `**Symbols:** ${report.createdSymbols.length} created, ${report.tombstonedSymbols.length} tombstoned`,
  ];
  if (report.promotedEdges > 0) lines.push(`**Promoted edges:** ${report.promotedEdges}`);
  lines.push(`**Duration:** ${report.durationMs}ms`);
  if (report.cancelled) lines.push("", "**Note:** Sync was cancelled before every file was committed.");

  if (report.errors.length > 0) {
    lines.push("", `### Failures (${report.failed})`, "");
    for (const error of report.errors) lines.push(`- [${error.kind}] ${error.message}`);
  }
  return lines.join("\n");
}

export function formatCycles(report: CycleReport): string {
  if (report.cycles.length === 0) {
    return report.truncated ? "No cycles found before the traversal budget ran out." : "No cycles found.";
  }
  const lines = [`## Cycles (${report.cycles.length})`, ""];
  for (const [i, cycle] of report.cycles.entries()) {
    const walk = [...cycle.names, cycle.names[0]].join(" -> ");
    lines.push(`${i + 1}. ${walk} (${cycle.confidence})`);
  }
  if (report.truncated) {
    lines.push("", "**Note:** Enumeration stopped at the traversal budget; more cycles may exist.");
  }
  return lines.join("\n");
}

export function formatImpact(symbol: string, result: ImpactResult): string {
  if (result.entries.length === 0) return `Nothing depends on ${symbol}.`;
  const lines = [`## Impact of ${symbol}`, "", `${result.entries.length} dependent symbol(s):`];
  let depth = 0;
  for (const entry of result.entries) {
    if (entry.depth !== depth) {
      depth = entry.depth;
      lines.push("", `### Depth ${depth}`, "");
    }
    lines.push(`- ${formatSymbolLine(entry.symbol)} ${entry.certainty} via ${entry.via}`);
  }
  if (result.truncated) lines.push("", "**Note:** Result truncated by fan-out or limit.");
  return lines.join("\n");
}

export function formatSymbolList(title: string, symbols: GraphSymbol[], paths: ReadonlyMap<string, string>): string {
  if (symbols.length === 0) return `${title}: none.`;
  const lines = [`## ${title} (${symbols.length})`, ""];
  for (const symbol of symbols) {
    const path = paths.get(symbol.fileId);
    lines.push(`- ${formatSymbolLine(symbol)}${path ? ` in ${path}` : ""}`);
  }
  return lines.join("\n");
}

function formatEdge(edge: GraphEdge, names: ReadonlyMap<string, string>, direction: "in" | "out"): string {
  const other =
    direction === "in"
      ? (names.get(edge.sourceId) ?? edge.sourceId)
      : edge.targetId === null
        ? describeTarget(edge.targetName, edge.hint)
        : (names.get(edge.targetId) ?? edge.targetName);
  const arrow = direction === "in" ? "<-" : "->";
  return `- ${arrow} ${other} [${edge.kind}, ${edge.confidence}] L${edge.line}`;
}

export function formatSymbolDetail(detail: SymbolDetail): string {
  const { symbol, file, names } = detail;
  const lines = [`## ${symbol.name}`, ""];
  lines.push(`**Kind:** ${symbol.kind}`);
  lines.push(`**File:** ${file ? `${file.path}:${symbol.line}` : `line ${symbol.line}`}`);
  if (symbol.signature) lines.push(`**Signature:** \`${symbol.signature}\``);
  lines.push(`**Leaf:** ${symbol.isLeaf ? "yes" : "no"}`);

  lines.push("", `### Incoming (${detail.incoming.length})`, "");
  for (const edge of detail.incoming) lines.push(formatEdge(edge, names, "in"));
  lines.push("", `### Outgoing (${detail.outgoing.length})`, "");
  for (const edge of detail.outgoing) lines.push(formatEdge(edge, names, "out"));
  return lines.join("\n");
}

export function formatUncertainEdges(views: EdgeView[]): string {
  if (views.length === 0) return "No dynamic edges.";
  const lines = [`## Dynamic edges (${views.length})`, ""];
  for (const { edge, source, path } of views) {
    lines.push(`- ${path}:${edge.line} ${source.name} -> ${describeTarget(edge.targetName, edge.hint)} (${edge.kind}, ${edge.reach})`);
  }
  return lines.join("\n");
}

export function formatStats(stats: GraphStats): string {
  const { byConfidence: c, byKind: k } = stats;
  return [
    "## Graph",
    "",
    `**Files:** ${stats.files}`,
    `**Symbols:** ${stats.symbols}`,
    `**Edges:** ${stats.edges}`,
    `**By confidence:** resolved ${c.resolved}, conditional ${c.conditional}, dynamic ${c.dynamic}, external ${c.external}`,
    `**By kind:** call ${k.call}, import ${k.import}, compose ${k.compose}`,
  ].join("\n");
}
