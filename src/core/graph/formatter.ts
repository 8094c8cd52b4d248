import type { UnitGraph } from './dag.js';
import type { DependencyEdge, GraphFormat } from './types.js';

/**
 * Serializable view of a unit graph.
 */
export interface GraphView {
  nodes: Array<{ id: string; path: string; dependencies: number; dependents: number }>;
  edges: Array<{ from: string; to: string; enabled: boolean; skipOutputs: boolean }>;
}

/**
 * Renders unit graphs for the `graph` command. Edges are drawn in
 * execution direction: provider first, then the units that depend on it.
 */
export class GraphFormatter {
  constructor(
    private readonly graph: UnitGraph,
    private readonly paths: ReadonlyMap<string, string> = new Map()
  ) {}

  /**
   * Format graph as string output.
   */
  format(format: GraphFormat): string {
    switch (format) {
      case 'mermaid':
        return this.formatMermaid();
      case 'graphviz':
        return this.formatGraphviz();
      case 'json':
        return JSON.stringify(this.toView(), null, 2);
      default:
        throw new Error(`Unknown format: ${String(format)}`);
    }
  }

  toView(): GraphView {
    return {
      nodes: this.graph.nodes().map((id) => ({
        id,
        path: this.paths.get(id) ?? id,
        dependencies: this.graph.edgesFrom(id).length,
        dependents: this.graph.edgesTo(id).length,
      })),
      edges: this.graph.edges().map((e) => ({
        from: e.from,
        to: e.to,
        enabled: e.enabled,
        skipOutputs: e.skipOutputs,
      })),
    };
  }

  /**
   * Format graph as Mermaid diagram.
   */
  private formatMermaid(): string {
    const lines: string[] = ['graph TD'];

    for (const id of this.graph.nodes()) {
      lines.push(`    ${this.sanitizeId(id)}[${id}]`);
    }

    for (const edge of this.graph.edges()) {
      const provider = this.sanitizeId(edge.to);
      const dependent = this.sanitizeId(edge.from);
      if (!edge.enabled) {
        lines.push(`    ${provider} -. disabled .-> ${dependent}`);
      } else if (edge.skipOutputs) {
        lines.push(`    ${provider} -. no outputs .-> ${dependent}`);
      } else {
        lines.push(`    ${provider} --> ${dependent}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format graph as Graphviz DOT.
   */
  private formatGraphviz(): string {
    const lines: string[] = [
      'digraph Stack {',
      '    rankdir=TB;',
      '    node [shape=box, style=filled, fillcolor="#f3e5f5"];',
      '',
    ];

    for (const id of this.graph.nodes()) {
      const path = this.paths.get(id);
      const label = path && path !== id ? `${id}\\n(${path})` : id;
      lines.push(`    ${this.sanitizeId(id)} [label="${label}"];`);
    }

    lines.push('');

    for (const edge of this.graph.edges()) {
      lines.push(`    ${this.sanitizeId(edge.to)} -> ${this.sanitizeId(edge.from)}${this.edgeStyle(edge)};`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  private edgeStyle(edge: DependencyEdge): string {
    if (!edge.enabled) return ' [style=dashed, color=gray]';
    if (edge.skipOutputs) return ' [style=dotted]';
    return '';
  }

  /**
   * Sanitize ID for use in Mermaid/Graphviz.
   */
  private sanitizeId(id: string): string {
    return id.replace(/[^A-Za-z0-9_]/g, '_');
  }
}
