import { compareStrings, isInternalNode, type CallGraph, type GraphNode } from '../analyzer/call-graph.js';
import type { Cluster, FunctionId, NodeKind } from '../analyzer/types.js';

export interface DotOptions {
  /** Graph name written after `digraph` */
  name?: string;
  clusters?: readonly Cluster[];
  /** Functions to outline in red; omit when no coverage profile was read */
  untested?: ReadonlySet<FunctionId>;
}

const DEAD_FILL = '#f4cccc';
const ENTRY_FILL = '#d9ead3';

const NODE_SHAPES: Record<NodeKind, string> = {
  function: 'box',
  placeholder: 'box',
  external: 'ellipse',
  unresolved: 'octagon',
  method: 'diamond',
  literal: 'note',
};

/** Escape a string for use inside a double-quoted DOT id or label */
export function escapeDot(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, '\\n');
}

function quote(value: string): string {
  return `"${escapeDot(value)}"`;
}

function attributes(attrs: Record<string, string>): string {
  return Object.entries(attrs)
    .map(([key, value]) => `${key}=${quote(value)}`)
    .join(', ');
}

function nodeAttributes(node: GraphNode, untested?: ReadonlySet<FunctionId>): Record<string, string> {
  const attrs: Record<string, string> = { label: node.label, shape: NODE_SHAPES[node.kind] };
  const styles: string[] = [];

  if (isInternalNode(node)) {
    if (node.kind === 'placeholder') styles.push('dashed');
    if (node.status === 'dead') {
      styles.push('filled');
      attrs.fillcolor = DEAD_FILL;
    } else if (node.status === 'entry') {
      styles.push('filled');
      attrs.fillcolor = ENTRY_FILL;
    }
    if (untested?.has(node.id)) {
      attrs.color = 'red';
      attrs.penwidth = '2';
    }
  } else {
    styles.push('dashed');
  }

  if (styles.length > 0) attrs.style = styles.join(',');
  return attrs;
}

/**
 * Render a call graph as Graphviz DOT. Internal nodes are grouped into one
 * cluster per package with a nested cluster per receiver type; synthetic
 * nodes are emitted after the clusters, ordered by identity.
 */
export function renderDot(graph: CallGraph, options: DotOptions = {}): string {
  const lines: string[] = [
    `digraph ${quote(options.name ?? 'callgraph')} {`,
    '  rankdir=LR;',
    '  node [fontname="Helvetica"];',
    '',
  ];

  const clusters = options.clusters ?? [];
  const emitted = new Set<string>();

  const emitNode = (id: string, indent: string): void => {
    const node = graph.node(id);
    if (!node || emitted.has(id)) return;
    emitted.add(id);
    lines.push(`${indent}${quote(id)} [${attributes(nodeAttributes(node, options.untested))}];`);
  };

  const emitCluster = (cluster: Cluster, indent: string): void => {
    const title = cluster.kind === 'package' ? `Package: ${cluster.label}` : `Type: ${cluster.label}`;
    lines.push(`${indent}subgraph ${quote(`cluster_${cluster.id}`)} {`);
    lines.push(`${indent}  label=${quote(title)};`);
    for (const child of clusters.filter((c) => c.parent === cluster.id)) {
      emitCluster(child, indent + '  ');
    }
    for (const id of cluster.nodeIds) {
      emitNode(id, indent + '  ');
    }
    lines.push(`${indent}}`);
  };

  for (const cluster of clusters.filter((c) => c.parent === null)) {
    emitCluster(cluster, '  ');
  }

  const remaining = graph
    .nodes()
    .filter((n) => !emitted.has(n.id))
    .sort((a, b) => compareStrings(a.id, b.id));
  for (const node of remaining) {
    emitNode(node.id, '  ');
  }

  lines.push('');

  for (const edge of graph.edges()) {
    const lineNumbers = edge.sites.map((s) => s.line).join(',');
    const attrs: Record<string, string> = { tooltip: `lines ${lineNumbers}` };
    if (edge.sites.every((s) => s.invocation !== 'call')) {
      attrs.label = [...new Set(edge.sites.map((s) => s.invocation))].join('/');
    }
    lines.push(`  ${quote(edge.source)} -> ${quote(edge.target)} [${attributes(attrs)}];`);
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}
