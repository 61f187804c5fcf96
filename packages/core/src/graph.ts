import { IntegrityError } from './errors.js';
import type { Component, DependencyEdge, TopologyPolicy, TopologyScore } from './types.js';

/**
 * Arena representation of one inventory's dependency graph. Components are addressed by
 * their position in `components`; adjacency lists hold indices, so cycles never produce
 * reference cycles between node objects.
 */
export class ComponentGraph {
  readonly components: readonly Component[];
  readonly children: readonly number[][];
  readonly parents: readonly number[][];
  readonly roots: readonly number[];
  readonly edgeCount: number;
  private readonly indexById: ReadonlyMap<string, number>;

  private constructor(
    components: Component[],
    indexById: Map<string, number>,
    children: number[][],
    parents: number[][],
    roots: number[],
    edgeCount: number
  ) {
    this.components = components;
    this.indexById = indexById;
    this.children = children;
    this.parents = parents;
    this.roots = roots;
    this.edgeCount = edgeCount;
  }

  static build(components: Component[], edges: DependencyEdge[], roots: string[] = []): ComponentGraph {
    const indexById = new Map<string, number>();
    components.forEach((component, idx) => {
      if (indexById.has(component.id)) {
        throw new IntegrityError(component.id, 'component list', `Duplicate component "${component.id}"`);
      }
      indexById.set(component.id, idx);
    });

    const children: number[][] = components.map(() => []);
    const parents: number[][] = components.map(() => []);
    const seen = new Set<string>();
    let edgeCount = 0;

    for (const edge of edges) {
      const where = `dependency edge ${edge.parent} -> ${edge.child}`;
      const from = indexById.get(edge.parent);
      if (from === undefined) throw new IntegrityError(edge.parent, where);
      const to = indexById.get(edge.child);
      if (to === undefined) throw new IntegrityError(edge.child, where);
      if (from === to) continue;

      const key = `${from}:${to}`;
      if (seen.has(key)) continue;
      seen.add(key);
      children[from].push(to);
      parents[to].push(from);
      edgeCount += 1;
    }

    let rootIndices: number[];
    if (roots.length > 0) {
      const unique = new Set<number>();
      for (const id of roots) {
        const idx = indexById.get(id);
        if (idx === undefined) throw new IntegrityError(id, 'root set');
        unique.add(idx);
      }
      rootIndices = [...unique];
    } else {
      rootIndices = parents.flatMap((list, idx) => (list.length === 0 ? [idx] : []));
    }

    return new ComponentGraph([...components], indexById, children, parents, rootIndices, edgeCount);
  }

  get size(): number {
    return this.components.length;
  }

  indexOf(componentId: string): number | undefined {
    return this.indexById.get(componentId);
  }

  /** Shortest edge distance from the nearest root; -1 where no root reaches the node. */
  depths(): number[] {
    const depth = new Array<number>(this.size).fill(-1);
    const queue: number[] = [];
    for (const root of this.roots) {
      depth[root] = 0;
      queue.push(root);
    }
    for (let head = 0; head < queue.length; head += 1) {
      const node = queue[head];
      const next = depth[node] + 1;
      for (const child of this.children[node]) {
        if (depth[child] !== -1) continue;
        depth[child] = next;
        queue.push(child);
      }
    }
    return depth;
  }

  /** Number of other components that transitively depend on `index`. */
  ancestorCount(index: number): number {
    const visited = new Set<number>([index]);
    const stack = [...this.parents[index]];
    let count = 0;
    for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
      if (visited.has(node)) continue;
      visited.add(node);
      count += 1;
      for (const parent of this.parents[node]) {
        if (!visited.has(parent)) stack.push(parent);
      }
    }
    return count;
  }
}

export interface TopologyReport {
  scores: TopologyScore[];
  /** Deepest reachable component, in edges from its nearest root. */
  maxDepth: number;
  hubComponents: number;
}

export function computeTopology(graph: ComponentGraph, policy: TopologyPolicy): TopologyReport {
  const rawDepths = graph.depths();
  const reachableDepths = rawDepths.filter((d) => d >= 0);
  const maxReachable = reachableDepths.reduce((max, d) => Math.max(max, d), 0);
  const hasUnreachable = reachableDepths.length < rawDepths.length;
  const unreachableDepth = maxReachable + 1;
  const maxDepth = hasUnreachable ? unreachableDepth : maxReachable;
  const others = graph.size - 1;

  const scores = graph.components.map((component, idx): TopologyScore => {
    const raw = rawDepths[idx];
    const reachable = raw >= 0;
    const depth = reachable ? raw : unreachableDepth;
    const normalizedDepth = maxDepth > 0 ? depth / maxDepth : 0;
    const dependents = graph.ancestorCount(idx);
    const centrality = others > 0 ? dependents / others : 0;
    const tcs = policy.depthWeight * (1 - normalizedDepth) + policy.centralityWeight * centrality;
    return {
      componentId: component.id,
      depth,
      normalizedDepth,
      centrality,
      dependents,
      reachable,
      tcs
    };
  });

  return {
    scores,
    maxDepth: maxReachable,
    hubComponents: scores.filter((s) => s.tcs > policy.hubThreshold).length
  };
}
