/**
 * Confidence annotation: maps a scanner observation plus a resolution
 * outcome onto exactly one confidence class.
 */

import type { Confidence, Reach } from "./model.js";

/** Outcome of looking a reference up in the in-tree symbol index. */
export type Resolution =
  | { type: "resolved"; symbolId: string }
  | { type: "ambiguous"; candidates: readonly string[] }
  | { type: "unresolved" };

const RANK: Record<Confidence, number> = {
  resolved: 3,
  conditional: 2,
  dynamic: 1,
  external: 0,
};

/**
 * Decision order is fixed; the first matching rule wins.
 *
 * | reach       | resolution | confidence  |
 * |-------------|------------|-------------|
 * | indirect    | any        | dynamic     |
 * | conditional | any        | conditional |
 * | direct      | resolved   | resolved    |
 * | direct      | ambiguous  | dynamic     |
 * | direct      | unresolved | external    |
 */
export function classify(reach: Reach, resolution: Resolution): Confidence {
  if (reach === "indirect") return "dynamic";
  if (reach === "conditional") return "conditional";
  if (resolution.type === "resolved") return "resolved";
  if (resolution.type === "ambiguous") return "dynamic";
  return "external";
}

export function rank(confidence: Confidence): number {
  return RANK[confidence];
}

/** Merge of duplicate observations: the stronger class wins. */
export function strongest(a: Confidence, b: Confidence): Confidence {
  return RANK[a] >= RANK[b] ? a : b;
}

export function weakest(a: Confidence, b: Confidence): Confidence {
  return RANK[a] <= RANK[b] ? a : b;
}

/** Only statically visible edges take part in cycle detection. */
export function isCycleEligible(confidence: Confidence): confidence is "resolved" | "conditional" {
  return confidence === "resolved" || confidence === "conditional";
}

/** Whether an impact path through this edge is certain rather than possible. */
export function isCertain(confidence: Confidence): boolean {
  return confidence === "resolved";
}

const REACH_RANK: Record<Reach, number> = { direct: 2, conditional: 1, indirect: 0 };

export function strongestReach(a: Reach, b: Reach): Reach {
  return REACH_RANK[a] >= REACH_RANK[b] ? a : b;
}
