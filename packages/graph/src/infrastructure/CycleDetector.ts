/**
 * Cycle detection over the statically visible part of the graph.
 *
 * Only `resolved` and `conditional` edges with a target take part; dynamic
 * and external edges would report cycles nobody can see in the code.
 * Tarjan's algorithm narrows the search to strongly connected components,
 * then every elementary cycle inside a component is walked once.
 */

import { silentLogger, type Logger } from "@depmap/core";
import { isCycleEligible, rank } from "../core/confidence.js";
import type { Cycle } from "../core/model.js";
import type { GraphStore } from "../core/ports/GraphStore.js";

type Eligible = Cycle["confidence"];

export interface Arc {
  to: string;
  confidence: Eligible;
}

interface Snapshot {
  adjacency: Map<string, Arc[]>;
  names: Map<string, string>;
}

export interface CycleDetectorOptions {
  /** Edge traversals allowed per node before enumeration stops. */
  stepsPerNode?: number;
  logger?: Logger;
}

export interface CycleReport {
  cycles: Cycle[];
  truncated: boolean;
}

// ============================================================================
// Strongly connected components (Tarjan)
// ============================================================================

/** Tarjan's algorithm over an explicit frame stack; call chains can be deeper than the JS stack. */
export function findSCCs(adjacency: ReadonlyMap<string, readonly Arc[]>): string[][] {
  let counter = 0;
  const indices = new Map<string, number>();
  const lowlinks = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const sccs: string[][] = [];
  const frames: Array<{ node: string; next: number }> = [];

  const open = (node: string): void => {
    indices.set(node, counter);
    lowlinks.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);
    frames.push({ node, next: 0 });
  };
  const lower = (node: string, value: number): void => {
    lowlinks.set(node, Math.min(lowlinks.get(node) ?? value, value));
  };

  for (const root of adjacency.keys()) {
    if (indices.has(root)) continue;
    open(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const arcs = adjacency.get(frame.node) ?? [];
      if (frame.next < arcs.length) {
        const { to } = arcs[frame.next++];
        const seen = indices.get(to);
        if (seen === undefined) open(to);
        else if (onStack.has(to)) lower(frame.node, seen);
        continue;
      }

      frames.pop();
      const low = lowlinks.get(frame.node) ?? 0;
      const parent = frames[frames.length - 1];
      if (parent) lower(parent.node, low);
      if (low !== indices.get(frame.node)) continue;

      const scc: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        scc.push(member);
      } while (member !== frame.node);
      sccs.push(scc);
    }
  }
  return sccs;
}

// ============================================================================
// Elementary cycles
// ============================================================================

class Budget {
  private remaining: number;
  exhausted = false;

  constructor(limit: number) {
    this.remaining = limit;
  }

  spend(): boolean {
    if (this.remaining <= 0) {
      this.exhausted = true;
      return false;
    }
    this.remaining--;
    return true;
  }
}

function weakestOf(confidences: Eligible[]): Eligible {
  return confidences.reduce<Eligible>((weakest, c) => (rank(c) < rank(weakest) ? c : weakest), "resolved");
}

function toCycle(ids: string[], confidences: Eligible[], snapshot: Snapshot): Cycle {
  return {
    symbolIds: ids,
    names: ids.map((id) => snapshot.names.get(id) ?? id),
    confidence: weakestOf(confidences),
  };
}

/**
 * Shortest cycle through `start` within its component, by breadth-first
 * search. Costs at most one pass over the component's arcs.
 */
function shortestCycle(start: string, members: ReadonlyMap<string, number>, snapshot: Snapshot): Cycle | null {
  const parents = new Map<string, { from: string; confidence: Eligible }>();
  const queue = [start];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    for (const arc of snapshot.adjacency.get(node) ?? []) {
      if (!members.has(arc.to)) continue;
      if (arc.to === start) {
        const ids = [node];
        const confidences = [arc.confidence];
        for (let at = node; at !== start; ) {
          const step = parents.get(at);
          if (!step) return null;
          ids.push(step.from);
          confidences.push(step.confidence);
          at = step.from;
        }
        return toCycle(ids.reverse(), confidences, snapshot);
      }
      if (!parents.has(arc.to)) {
        parents.set(arc.to, { from: node, confidence: arc.confidence });
        queue.push(arc.to);
      }
    }
  }
  return null;
}

/**
 * Every elementary cycle of one component, each reported from its smallest
 * member while walking only members ordered after it, so every rotation is
 * found exactly once. Stops when the budget runs out.
 */
function* walkComponent(
  members: string[],
  order: ReadonlyMap<string, number>,
  snapshot: Snapshot,
  budget: Budget,
  skip: string | null
): Generator<Cycle> {
  for (const [startOrder, start] of members.entries()) {
    const path = [start];
    const confidences: Eligible[] = [];
    const onPath = new Set([start]);
    const stack: Array<{ node: string; next: number }> = [{ node: start, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const arcs = snapshot.adjacency.get(frame.node) ?? [];
      if (frame.next >= arcs.length) {
        stack.pop();
        onPath.delete(frame.node);
        path.pop();
        confidences.pop();
        continue;
      }
      const arc = arcs[frame.next++];
      if (!budget.spend()) return;

      const targetOrder = order.get(arc.to);
      if (targetOrder === undefined || targetOrder < startOrder) continue;
      if (arc.to === start) {
        if (path.join("\u0000") !== skip) yield toCycle([...path], [...confidences, arc.confidence], snapshot);
        continue;
      }
      if (onPath.has(arc.to)) continue;
      path.push(arc.to);
      onPath.add(arc.to);
      confidences.push(arc.confidence);
      stack.push({ node: arc.to, next: 0 });
    }
  }
}

/**
 * Each component first yields its shortest cycle through its smallest
 * member, outside the budget, so a dense component cannot hide another
 * component's cycle. The budgeted walk then adds the remaining cycles.
 */
function* enumerate(snapshot: Snapshot, budget: Budget): Generator<Cycle> {
  for (const component of findSCCs(snapshot.adjacency)) {
    if (component.length < 2) continue;
    const members = [...component].sort();
    const order = new Map(members.map((id, i) => [id, i]));

    const first = shortestCycle(members[0], order, snapshot);
    if (first) yield first;
    yield* walkComponent(members, order, snapshot, budget, first ? first.symbolIds.join("\u0000") : null);
  }
}

/**
 * A lazy walk over the cycles of one graph snapshot. Iterating again starts
 * over; `truncated` reflects the most recent walk.
 */
export class CycleEnumeration implements Iterable<Cycle> {
  private exhausted = false;

  constructor(
    private readonly snapshot: Snapshot,
    private readonly limit: number
  ) {}

  get truncated(): boolean {
    return this.exhausted;
  }

  *[Symbol.iterator](): Iterator<Cycle> {
    const budget = new Budget(this.limit);
    this.exhausted = false;
    yield* enumerate(this.snapshot, budget);
    this.exhausted = budget.exhausted;
  }
}

export class CycleDetector {
  private readonly stepsPerNode: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: GraphStore,
    options: CycleDetectorOptions = {}
  ) {
    this.stepsPerNode = options.stepsPerNode ?? 64;
    this.logger = options.logger ?? silentLogger;
  }

  /** Snapshot the eligible edges now; cycles are produced on iteration. */
  cycles(): CycleEnumeration {
    const snapshot = this.snapshot();
    return new CycleEnumeration(snapshot, snapshot.adjacency.size * this.stepsPerNode);
  }

  findCycles(): CycleReport {
    const enumeration = this.cycles();
    const cycles = [...enumeration];
    if (enumeration.truncated) {
      this.logger.warn("Cycle enumeration stopped at the traversal budget", {
        found: cycles.length,
        stepsPerNode: this.stepsPerNode,
      });
    }
    return { cycles, truncated: enumeration.truncated };
  }

  private snapshot(): Snapshot {
    const arcs = new Map<string, Map<string, Eligible>>();
    for (const edge of this.store.listEdges()) {
      const { targetId, confidence } = edge;
      if (targetId === null || targetId === edge.sourceId || !isCycleEligible(confidence)) continue;
      let out = arcs.get(edge.sourceId);
      if (!out) {
        out = new Map();
        arcs.set(edge.sourceId, out);
      }
      const seen = out.get(targetId);
      // Parallel edges (a call and an import) count once, at their strongest.
      out.set(targetId, seen && rank(seen) >= rank(confidence) ? seen : confidence);
    }

    const adjacency = new Map<string, Arc[]>();
    for (const source of [...arcs.keys()].sort()) {
      const out = arcs.get(source) ?? new Map<string, Eligible>();
      adjacency.set(
        source,
        [...out.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([to, confidence]) => ({ to, confidence }))
      );
    }

    const names = new Map<string, string>();
    for (const symbol of this.store.listSymbols()) names.set(symbol.id, symbol.name);
    return { adjacency, names };
  }
}
