/**
 * Reverse reachability: which symbols depend, directly or transitively,
 * on a given symbol.
 */

import { isCertain, rank, strongest } from "../core/confidence.js";
import type { Confidence, GraphEdge, ImpactEntry, ImpactOptions, ImpactResult } from "../core/model.js";
import type { GraphStore } from "../core/ports/GraphStore.js";

export const DEFAULT_MAX_DEPTH = 5;

interface Reached {
  certain: boolean;
  via: Confidence;
}

function byStrength(a: GraphEdge, b: GraphEdge): number {
  return rank(b.confidence) - rank(a.confidence) || a.sourceId.localeCompare(b.sourceId);
}

export class ImpactAnalyzer {
  constructor(
    private readonly store: GraphStore,
    private readonly defaultMaxDepth: number = DEFAULT_MAX_DEPTH
  ) {}

  /**
   * Breadth-first over incoming edges, one level per depth, so every entry
   * carries its shortest distance. A node is certain when some path to it
   * uses only `resolved` edges.
   */
  impactOf(symbolId: string, options: ImpactOptions = {}): ImpactResult {
    const maxDepth = options.maxDepth ?? this.defaultMaxDepth;
    const { maxFanOut, limit } = options;
    const entries: ImpactEntry[] = [];
    let truncated = false;

    if (!this.store.getSymbol(symbolId)) return { entries, truncated };

    const visited = new Set([symbolId]);
    let frontier = new Map<string, Reached>([[symbolId, { certain: true, via: "resolved" }]]);

    for (let depth = 1; depth <= maxDepth && frontier.size > 0; depth++) {
      const next = new Map<string, Reached>();
      for (const [id, reached] of frontier) {
        let incoming = this.store.edgesTo(id).filter((edge) => edge.sourceId !== id).sort(byStrength);
        if (maxFanOut !== undefined && incoming.length > maxFanOut) {
          incoming = incoming.slice(0, maxFanOut);
          truncated = true;
        }
        for (const edge of incoming) {
          if (visited.has(edge.sourceId)) continue;
          const certain = reached.certain && isCertain(edge.confidence);
          const seen = next.get(edge.sourceId);
          next.set(edge.sourceId, {
            certain: certain || (seen?.certain ?? false),
            via: seen ? strongest(seen.via, edge.confidence) : edge.confidence,
          });
        }
      }

      const level = [...next.entries()].flatMap(([id, reached]) => {
        const symbol = this.store.getSymbol(id);
        return symbol ? [{ symbol, reached }] : [];
      });
      level.sort((a, b) => a.symbol.name.localeCompare(b.symbol.name) || a.symbol.id.localeCompare(b.symbol.id));

      frontier = new Map();
      for (const { symbol, reached } of level) {
        if (limit !== undefined && entries.length >= limit) {
          truncated = true;
          return { entries, truncated };
        }
        visited.add(symbol.id);
        frontier.set(symbol.id, reached);
        entries.push({ symbol, depth, certainty: reached.certain ? "certain" : "possible", via: reached.via });
      }
    }
    return { entries, truncated };
  }
}
