import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { CallGraph, assembleCallGraph, buildClusters } from '../src/analyzer/call-graph.js';
import { indexProject } from '../src/analyzer/go/indexer.js';
import { resolveCalls } from '../src/analyzer/go/call-resolver.js';
import { RegistryBuilder } from '../src/analyzer/registry.js';
import type { CallSite, FunctionDescriptor } from '../src/analyzer/types.js';
import { GO_BASIC_FIXTURE, createGoModule } from './helpers.js';

function createTestDescriptor(overrides: Partial<FunctionDescriptor> = {}): FunctionDescriptor {
  return {
    id: 'app.A',
    packageName: 'app',
    receiver: '',
    name: 'A',
    filePath: 'app.go',
    startLine: 1,
    endLine: 3,
    parameters: [],
    returns: [],
    unusedParameters: [],
    kind: 'function',
    visibility: 'exported',
    ...overrides,
  };
}

function localCall(target: string, line: number, nested: CallSite[] = []): CallSite {
  const name = target.slice(target.lastIndexOf('.') + 1);
  return {
    kind: 'local',
    name,
    target,
    line,
    expression: `${name}()`,
    arguments: [],
    nested,
    invocation: 'call',
  };
}

describe('CallGraph', () => {
  it('should merge repeated calls between the same pair into one edge', () => {
    const graph = new CallGraph();
    graph.ensureNode('app.A', { kind: 'function' });
    graph.ensureNode('app.B', { kind: 'function' });

    graph.addEdge('app.A', 'app.B', 'local', { line: 4, invocation: 'call' });
    const edge = graph.addEdge('app.A', 'app.B', 'local', { line: 6, invocation: 'defer' });

    expect(graph.edgeCount).toBe(1);
    expect(edge.sites).toEqual([
      { line: 4, invocation: 'call' },
      { line: 6, invocation: 'defer' },
    ]);
    expect(graph.callees('app.A')).toEqual(['app.B']);
    expect(graph.callers('app.B')).toEqual(['app.A']);
  });

  it('should refuse edges to unknown nodes', () => {
    const graph = new CallGraph();
    graph.ensureNode('app.A', { kind: 'function' });
    expect(() => graph.addEdge('app.A', 'app.Z', 'local', { line: 1, invocation: 'call' })).toThrow(
      'Cannot add edge app.A -> app.Z: unknown node'
    );
  });

  it('should return the existing node on repeated creation', () => {
    const graph = new CallGraph();
    const first = graph.ensureNode('app.A', { kind: 'function', label: 'A' });
    const second = graph.ensureNode('app.A', { kind: 'placeholder', label: 'other' });
    expect(second).toBe(first);
    expect(graph.nodeCount).toBe(1);
  });

  it('should walk transitive callers and callees through cycles', () => {
    const graph = new CallGraph();
    for (const id of ['A', 'B', 'C', 'D']) graph.ensureNode(id, { kind: 'function' });
    graph.addEdge('A', 'B', 'local', { line: 1, invocation: 'call' });
    graph.addEdge('B', 'C', 'local', { line: 2, invocation: 'call' });
    graph.addEdge('C', 'A', 'local', { line: 3, invocation: 'call' });
    graph.addEdge('D', 'C', 'local', { line: 4, invocation: 'call' });

    expect([...graph.downstream('A')].sort()).toEqual(['B', 'C']);
    expect([...graph.upstream('C')].sort()).toEqual(['A', 'B', 'D']);
    expect([...graph.downstream('missing')]).toEqual([]);
  });
});

describe('assembleCallGraph', () => {
  it('should create one node per descriptor and no edges without calls', () => {
    const builder = new RegistryBuilder();
    builder.add(createTestDescriptor({ id: 'app.A', name: 'A' }));
    builder.add(createTestDescriptor({ id: 'app.B', name: 'B' }));
    builder.add(createTestDescriptor({ id: 'app/T.C', name: 'C', receiver: 'T', kind: 'method' }));
    const registry = builder.freeze('example.com/app');

    const graph = assembleCallGraph(registry, new Map());
    expect(graph.nodeCount).toBe(3);
    expect(graph.edgeCount).toBe(0);
    expect(graph.node('app/T.C')!.label).toBe('T.C');
  });

  it('should attribute nested calls to the enclosing function', () => {
    const builder = new RegistryBuilder();
    builder.add(createTestDescriptor({ id: 'app.A', name: 'A' }));
    builder.add(createTestDescriptor({ id: 'app.B', name: 'B' }));
    builder.add(createTestDescriptor({ id: 'app.C', name: 'C' }));
    const registry = builder.freeze('example.com/app');

    const graph = assembleCallGraph(
      registry,
      new Map([['app.A', [localCall('app.B', 2, [localCall('app.C', 2)])]]])
    );

    expect(graph.callees('app.A')).toEqual(['app.B', 'app.C']);
    expect(graph.callers('app.C')).toEqual(['app.A']);
  });

  it('should create placeholder nodes for targets missing from the registry', () => {
    const builder = new RegistryBuilder();
    builder.add(createTestDescriptor());
    const registry = builder.freeze('example.com/app');

    const graph = assembleCallGraph(registry, new Map([['app.A', [localCall('lib/Pool.Get', 2)]]]));
    const placeholder = graph.node('lib/Pool.Get')!;
    expect(placeholder.kind).toBe('placeholder');
    expect(placeholder.packageName).toBe('lib');
    expect(placeholder.receiver).toBe('Pool');
    expect(placeholder.label).toBe('Pool.Get');
  });

  describe('shop fixture', () => {
    let graph: CallGraph;

    beforeAll(async () => {
      const index = await indexProject(GO_BASIC_FIXTURE);
      graph = assembleCallGraph(index.registry, resolveCalls(index.registry, index.units).callSites);
    });

    it('should add synthetic nodes after the functions', () => {
      expect(graph.nodeCount).toBe(17);
      expect(graph.nodes().slice(12).map((n) => [n.id, n.kind, n.label])).toEqual([
        [
          'unresolved:example.com/shop/internal/storage.Purge',
          'unresolved',
          'example.com/shop/internal/storage.Purge',
        ],
        ['external:fmt.Println', 'external', 'fmt.Println'],
        ['method:inv.Count', 'method', 'inv.Count'],
        ['literal:main.main@17', 'literal', 'func literal (main:17)'],
        ['external:fmt.Printf', 'external', 'fmt.Printf'],
      ]);
    });

    it('should record every call as an edge', () => {
      expect(graph.edgeCount).toBe(14);
      expect(graph.callees('main.main')).toEqual([
        'main.loadConfig',
        'inventory.New',
        'storage.Close',
        'external:fmt.Println',
        'method:inv.Count',
        'literal:main.main@17',
        'main.report',
      ]);
      expect(graph.callers('storage.connect')).toEqual(['storage.Open', 'storage.Save']);
    });

    it('should keep the scheduling of each edge', () => {
      const edge = graph.edges().find((e) => e.target === 'storage.Close')!;
      expect(edge).toEqual({
        source: 'main.main',
        target: 'storage.Close',
        kind: 'cross-module',
        sites: [{ line: 15, invocation: 'defer' }],
      });
    });

    it('should cluster by package and receiver type', () => {
      expect(buildClusters(graph)).toEqual([
        { id: 'pkg:inventory', label: 'inventory', kind: 'package', nodeIds: ['inventory.New'], parent: null },
        {
          id: 'pkg:main',
          label: 'main',
          kind: 'package',
          nodeIds: ['main.main', 'main.loadConfig', 'main.report', 'main.unusedHelper'],
          parent: null,
        },
        {
          id: 'pkg:storage',
          label: 'storage',
          kind: 'package',
          nodeIds: ['storage.Open', 'storage.Close', 'storage.Save', 'storage.connect'],
          parent: null,
        },
        {
          id: 'type:inventory.Inventory',
          label: 'inventory.Inventory',
          kind: 'type',
          nodeIds: ['inventory/Inventory.Count', 'inventory/Inventory.Add', 'inventory/Inventory.Missing'],
          parent: 'pkg:inventory',
        },
      ]);
    });
  });

  describe('files of one package', () => {
    let root: string | null = null;

    afterEach(() => {
      if (root) rmSync(root, { recursive: true, force: true });
      root = null;
    });

    it('should link calls across files regardless of resolution order', async () => {
      root = createGoModule({
        'a.go': 'package main\n\nfunc A() {\n\tB()\n}\n',
        'b.go': 'package main\n\nfunc B() {}\n',
      });
      const index = await indexProject(root);

      for (const units of [index.units, [...index.units].reverse()]) {
        const graph = assembleCallGraph(index.registry, resolveCalls(index.registry, units).callSites);
        expect(graph.nodes().map((n) => n.id)).toEqual(['main.A', 'main.B']);
        expect(graph.edges()).toEqual([
          { source: 'main.A', target: 'main.B', kind: 'local', sites: [{ line: 4, invocation: 'call' }] },
        ]);
      }
    });
  });
});
