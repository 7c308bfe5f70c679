import { describe, it, expect } from 'vitest';
import { CallGraph, buildClusters } from '../../src/analyzer/call-graph.js';
import { propagateEntryPoints } from '../../src/analyzer/entry-points.js';
import { escapeDot, renderDot } from '../../src/render/dot.js';

function createWorkerGraph(): CallGraph {
  const graph = new CallGraph();
  graph.ensureNode('main.main', { kind: 'function', label: 'main', packageName: 'main' });
  graph.ensureNode('main/Worker.Run', {
    kind: 'function',
    label: 'Worker.Run',
    packageName: 'main',
    receiver: 'Worker',
  });
  graph.ensureNode('main.old', { kind: 'function', label: 'old', packageName: 'main' });
  graph.ensureNode('external:fmt.Println', { kind: 'external', label: 'fmt.Println', packageName: 'fmt' });

  graph.addEdge('main.main', 'main/Worker.Run', 'local', { line: 3, invocation: 'call' });
  graph.addEdge('main.main', 'external:fmt.Println', 'external', { line: 4, invocation: 'call' });
  graph.addEdge('main/Worker.Run', 'external:fmt.Println', 'external', { line: 9, invocation: 'defer' });
  propagateEntryPoints(graph, ['main.main']);
  return graph;
}

describe('escapeDot', () => {
  it('should escape backslashes, quotes and newlines', () => {
    expect(escapeDot('a"b\\c\nd')).toBe('a\\"b\\\\c\\nd');
  });
});

describe('renderDot', () => {
  it('should render package and type clusters with status styling', () => {
    const graph = createWorkerGraph();
    const dot = renderDot(graph, { clusters: buildClusters(graph), untested: new Set(['main.old']) });

    expect(dot).toBe(
      [
        'digraph "callgraph" {',
        '  rankdir=LR;',
        '  node [fontname="Helvetica"];',
        '',
        '  subgraph "cluster_pkg:main" {',
        '    label="Package: main";',
        '    subgraph "cluster_type:main.Worker" {',
        '      label="Type: main.Worker";',
        '      "main/Worker.Run" [label="Worker.Run", shape="box"];',
        '    }',
        '    "main.main" [label="main", shape="box", fillcolor="#d9ead3", style="filled"];',
        '    "main.old" [label="old", shape="box", fillcolor="#f4cccc", color="red", penwidth="2", style="filled"];',
        '  }',
        '  "external:fmt.Println" [label="fmt.Println", shape="ellipse", style="dashed"];',
        '',
        '  "main.main" -> "main/Worker.Run" [tooltip="lines 3"];',
        '  "main.main" -> "external:fmt.Println" [tooltip="lines 4"];',
        '  "main/Worker.Run" -> "external:fmt.Println" [tooltip="lines 9", label="defer"];',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should emit every node at top level without clusters', () => {
    const dot = renderDot(createWorkerGraph(), { name: 'shop' });
    const lines = dot.split('\n');
    expect(lines[0]).toBe('digraph "shop" {');
    expect(lines.filter((l) => l.startsWith('  "') && !l.includes('->'))).toHaveLength(4);
    expect(dot).not.toContain('subgraph');
  });

  it('should quote identities with special characters', () => {
    const graph = new CallGraph();
    graph.ensureNode('main.main', { kind: 'function', label: 'main', packageName: 'main' });
    graph.ensureNode('unresolved:handlers["x"]', { kind: 'unresolved', label: 'handlers["x"]' });
    graph.addEdge('main.main', 'unresolved:handlers["x"]', 'external', { line: 2, invocation: 'go' });

    const dot = renderDot(graph);
    expect(dot).toContain(
      '  "unresolved:handlers[\\"x\\"]" [label="handlers[\\"x\\"]", shape="octagon", style="dashed"];'
    );
    expect(dot).toContain(
      '  "main.main" -> "unresolved:handlers[\\"x\\"]" [tooltip="lines 2", label="go"];'
    );
  });
});
