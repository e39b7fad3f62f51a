/**
 * Reachability analysis over the dependency graph
 */

import type { AmbiguousEdge, ItemId } from '../types/index.js';
import type { DependencyGraph } from './dependency-graph.js';

export interface ReachabilityResult {
  required: Set<ItemId>;
  /** Ambiguous edges leaving required items, in discovery order */
  ambiguous: AmbiguousEdge[];
}

/**
 * Incremental breadth-first closure. Every item is expanded at most once,
 * so each edge is visited once across all calls to {@link extend}.
 */
export class ReachabilityAnalyzer {
  private required = new Set<ItemId>();
  private discovered: AmbiguousEdge[] = [];
  private reported = 0;

  constructor(private readonly graph: DependencyGraph) {}

  get requiredIds(): ReadonlySet<ItemId> {
    return this.required;
  }

  isRequired(id: ItemId): boolean {
    return this.required.has(id);
  }

  /**
   * Mark seeds required and follow unambiguous edges from them.
   * Returns the newly required items in visit order.
   */
  extend(seeds: Iterable<ItemId>): ItemId[] {
    const added: ItemId[] = [];
    const queue: ItemId[] = [];

    const mark = (id: ItemId) => {
      if (this.required.has(id)) return;
      this.required.add(id);
      added.push(id);
      queue.push(id);
    };

    for (const seed of seeds) mark(seed);

    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      if (id === undefined) break;
      for (const edge of this.graph.edgesFrom(id)) {
        mark(edge.to);
      }
      this.discovered.push(...this.graph.ambiguousFrom(id));
    }

    return added;
  }

  /**
   * Ambiguous edges found since the previous call
   */
  takeAmbiguous(): AmbiguousEdge[] {
    const edges = this.discovered.slice(this.reported);
    this.reported = this.discovered.length;
    return edges;
  }

  result(): ReachabilityResult {
    return { required: new Set(this.required), ambiguous: [...this.discovered] };
  }
}

/**
 * Transitive closure of the entry points over unambiguous edges
 */
export function computeReachability(graph: DependencyGraph, entryPoints: Iterable<ItemId>): ReachabilityResult {
  const analyzer = new ReachabilityAnalyzer(graph);
  analyzer.extend(entryPoints);
  return analyzer.result();
}
