/**
 * Unit dependency graph.
 *
 * Edges point from a dependent unit to its provider. Every insertion is
 * checked for acyclicity, so a UnitGraph is a DAG at all times.
 */
import { CyclicDependencyError, StackError, ErrorCodes } from '../../utils/errors.js';
import type { DependencyEdge } from './types.js';

export class UnitGraph {
  private readonly order: string[] = [];
  private readonly outgoing = new Map<string, Map<string, DependencyEdge>>();
  private readonly incoming = new Map<string, Map<string, DependencyEdge>>();

  /**
   * Add a node. Re-adding an existing node is a no-op.
   */
  addNode(name: string): void {
    if (this.outgoing.has(name)) return;
    this.order.push(name);
    this.outgoing.set(name, new Map());
    this.incoming.set(name, new Map());
  }

  hasNode(name: string): boolean {
    return this.outgoing.has(name);
  }

  /** Node names in insertion (declaration) order. */
  nodes(): string[] {
    return [...this.order];
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Insert an edge, replacing any existing edge between the same pair.
   *
   * @throws CyclicDependencyError if the edge would close a cycle
   */
  addEdge(edge: DependencyEdge): void {
    const out = this.requireNode(edge.from);
    this.requireNode(edge.to);

    if (edge.from === edge.to) {
      throw new CyclicDependencyError([edge.from, edge.from]);
    }

    const path = this.findPath(edge.to, edge.from);
    if (path) {
      throw new CyclicDependencyError([edge.from, ...path]);
    }

    out.set(edge.to, edge);
    this.incoming.get(edge.to)?.set(edge.from, edge);
  }

  getEdge(from: string, to: string): DependencyEdge | undefined {
    return this.outgoing.get(from)?.get(to);
  }

  edges(): DependencyEdge[] {
    return this.order.flatMap((name) => [...this.requireNode(name).values()]);
  }

  /** Edges from `name` to the units it depends on. */
  edgesFrom(name: string): DependencyEdge[] {
    return [...this.requireNode(name).values()];
  }

  /** Edges from units depending on `name`. */
  edgesTo(name: string): DependencyEdge[] {
    return [...(this.incoming.get(name)?.values() ?? [])];
  }

  /** Direct dependencies over enabled edges. */
  dependenciesOf(name: string): string[] {
    return this.edgesFrom(name).filter((e) => e.enabled).map((e) => e.to);
  }

  /** Direct dependents over enabled edges. */
  dependentsOf(name: string): string[] {
    return this.edgesTo(name).filter((e) => e.enabled).map((e) => e.from);
  }

  /**
   * All units reachable from `names` through enabled dependency edges
   * (the starting units are not included unless reachable).
   */
  transitiveDependencies(names: Iterable<string>): Set<string> {
    return this.reach(names, (n) => this.dependenciesOf(n));
  }

  /**
   * All units that transitively depend on `names` through enabled edges.
   */
  transitiveDependents(names: Iterable<string>): Set<string> {
    return this.reach(names, (n) => this.dependentsOf(n));
  }

  /**
   * Providers-first ordering, stable with respect to declaration order.
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const name of this.order) {
      remaining.set(name, this.requireNode(name).size);
    }

    const result: string[] = [];
    const done = new Set<string>();
    while (result.length < this.order.length) {
      const next = this.order.find((name) => !done.has(name) && remaining.get(name) === 0);
      if (next === undefined) {
        // Unreachable while addEdge guards insertion
        throw new StackError(ErrorCodes.CYCLIC_DEPENDENCY, 'Unable to make progress - cycle in unit graph');
      }
      done.add(next);
      result.push(next);
      for (const edge of this.edgesTo(next)) {
        remaining.set(edge.from, (remaining.get(edge.from) ?? 0) - 1);
      }
    }
    return result;
  }

  /**
   * Look for a cycle with a depth-first traversal and a recursion stack.
   *
   * @returns the cycle as a node path (first node repeated at the end), or null
   */
  findCycle(): string[] | null {
    const visited = new Set<string>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const visit = (name: string): string[] | null => {
      if (onStack.has(name)) {
        return [...stack.slice(stack.indexOf(name)), name];
      }
      if (visited.has(name)) return null;

      visited.add(name);
      stack.push(name);
      onStack.add(name);
      for (const dep of this.requireNode(name).keys()) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
      stack.pop();
      onStack.delete(name);
      return null;
    };

    for (const name of this.order) {
      const cycle = visit(name);
      if (cycle) return cycle;
    }
    return null;
  }

  /**
   * Depth-first search along dependency edges (all of them, enabled or not).
   */
  private findPath(from: string, to: string): string[] | null {
    const visited = new Set<string>();
    const walk = (name: string): string[] | null => {
      if (name === to) return [name];
      if (visited.has(name)) return null;
      visited.add(name);
      for (const next of this.requireNode(name).keys()) {
        const rest = walk(next);
        if (rest) return [name, ...rest];
      }
      return null;
    };
    return walk(from);
  }

  private reach(names: Iterable<string>, next: (name: string) => string[]): Set<string> {
    const result = new Set<string>();
    const queue = [...names];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const neighbour of next(current)) {
        if (!result.has(neighbour)) {
          result.add(neighbour);
          queue.push(neighbour);
        }
      }
    }
    return result;
  }

  private requireNode(name: string): Map<string, DependencyEdge> {
    const edges = this.outgoing.get(name);
    if (!edges) {
      throw new StackError(ErrorCodes.UNKNOWN_UNIT, `Unit not found in graph: ${name}`, { unit: name });
    }
    return edges;
  }
}
