import { describe, it, expect, beforeAll } from 'vitest';
import { resolve } from 'node:path';
import { indexProject } from '../../src/analyzer/go/indexer.js';
import {
  collectExternalReferences,
  flattenCallSites,
  resolveCalls,
  type ResolutionResult,
} from '../../src/analyzer/go/call-resolver.js';
import type { FunctionRegistry } from '../../src/analyzer/registry.js';
import type { SourceUnit } from '../../src/analyzer/types.js';
import { GO_BASIC_FIXTURE } from '../helpers.js';

const CALLS_FIXTURE = resolve(__dirname, '../fixtures/go-calls');

describe('resolveCalls', () => {
  describe('shop fixture', () => {
    let resolution: ResolutionResult;

    beforeAll(async () => {
      const index = await indexProject(GO_BASIC_FIXTURE);
      resolution = resolveCalls(index.registry, index.units);
    });

    it('should resolve a call site list for every function', () => {
      expect(resolution.callSites.size).toBe(12);
      expect(resolution.warnings).toEqual([]);
    });

    it('should classify every call of main in source order', () => {
      expect(resolution.callSites.get('main.main')).toEqual([
        {
          kind: 'local',
          name: 'loadConfig',
          target: 'main.loadConfig',
          line: 13,
          expression: 'loadConfig(os.Args)',
          arguments: ['os.Args'],
          nested: [],
          invocation: 'call',
        },
        {
          kind: 'cross-module',
          name: 'New',
          target: 'inventory.New',
          alias: 'inventory',
          importPath: 'example.com/shop/inventory',
          line: 14,
          expression: 'inventory.New(cfg)',
          arguments: ['cfg'],
          nested: [],
          invocation: 'call',
        },
        {
          kind: 'cross-module',
          name: 'Close',
          target: 'storage.Close',
          alias: 'store',
          importPath: 'example.com/shop/internal/storage',
          line: 15,
          expression: 'store.Close()',
          arguments: [],
          nested: [],
          invocation: 'defer',
        },
        {
          kind: 'external',
          name: 'Println',
          origin: 'package',
          alias: 'fmt',
          importPath: 'fmt',
          line: 16,
          expression: 'fmt.Println(inv.Count())',
          arguments: ['inv.Count()'],
          nested: [
            {
              kind: 'method',
              name: 'Count',
              receiver: 'inv',
              line: 16,
              expression: 'inv.Count()',
              arguments: [],
              nested: [],
              invocation: 'call',
            },
          ],
          invocation: 'call',
        },
        {
          kind: 'literal',
          line: 17,
          expression: 'func() {report(inv)}()',
          arguments: [],
          nested: [
            {
              kind: 'local',
              name: 'report',
              target: 'main.report',
              line: 18,
              expression: 'report(inv)',
              arguments: ['inv'],
              nested: [],
              invocation: 'call',
            },
          ],
          invocation: 'go',
        },
      ]);
    });

    it('should give empty lists for functions without calls', () => {
      expect(resolution.callSites.get('storage.Close')).toEqual([]);
      expect(resolution.callSites.get('storage.connect')).toEqual([]);
    });

    it('should not record built-in calls', () => {
      expect(resolution.callSites.get('main.loadConfig')).toEqual([]);
      expect(resolution.callSites.get('inventory/Inventory.Count')).toEqual([]);
      expect(resolution.callSites.get('inventory.New')!.map((s) => s.expression)).toEqual([
        'storage.Open(name)',
      ]);
    });

    it('should mark in-project imports without a registry hit as missing', () => {
      const [site] = resolution.callSites.get('inventory/Inventory.Missing')!;
      expect(site).toMatchObject({
        kind: 'external',
        name: 'Purge',
        origin: 'missing',
        alias: 'storage',
        importPath: 'example.com/shop/internal/storage',
        line: 26,
      });
    });
  });

  describe('call shapes', () => {
    let resolution: ResolutionResult;

    beforeAll(async () => {
      const index = await indexProject(CALLS_FIXTURE);
      resolution = resolveCalls(index.registry, index.units);
    });

    const sitesOf = (id: string) => resolution.callSites.get(id)!;

    it('should record each argument call once as nested', () => {
      const sites = sitesOf('app.Nested');
      expect(sites).toHaveLength(1);
      expect(sites[0].arguments).toEqual(['Inner1()', 'Inner2(x)']);
      expect(sites[0].nested.map((s) => [s.kind, s.kind === 'local' ? s.target : '', s.line])).toEqual([
        ['local', 'app.Inner1', 17],
        ['local', 'app.Inner2', 17],
      ]);
      expect(flattenCallSites(sites)).toHaveLength(3);
    });

    it('should keep a chained callee as the opaque receiver of one method call', () => {
      expect(sitesOf('app.Chains')).toEqual([
        {
          kind: 'method',
          name: 'C',
          receiver: 'a.B()',
          line: 21,
          expression: 'a.B().C()',
          arguments: [],
          nested: [],
          invocation: 'call',
        },
      ]);
    });

    it('should classify index and call callees as dynamic', () => {
      expect(sitesOf('app.Dynamic').map((s) => (s.kind === 'external' ? [s.origin, s.name] : s.kind))).toEqual([
        ['dynamic', 'handlers[0]'],
        ['dynamic', 'f()'],
      ]);
    });

    it('should classify unknown, dot-imported, external and missing calls', () => {
      const sites = sitesOf('app.Classified');
      expect(sites.map((s) => s.kind)).toEqual(['external', 'cross-module', 'external', 'external']);
      expect(sites[0]).toMatchObject({ name: 'undefinedFn', origin: 'unknown' });
      expect(sites[0]).not.toHaveProperty('importPath');
      expect(sites[1]).toMatchObject({
        target: 'dot.Shout',
        alias: '.',
        importPath: 'example.com/calls/dot',
      });
      expect(sites[2]).toMatchObject({ name: 'ToUpper', origin: 'package', importPath: 'strings' });
      expect(sites[3]).toMatchObject({ name: 'Missing', origin: 'missing', importPath: 'example.com/calls/util' });
    });

    it('should promote calls inside built-in arguments', () => {
      expect(sitesOf('app.Builtins')).toEqual([
        {
          kind: 'local',
          name: 'Inner1',
          target: 'app.Inner1',
          line: 37,
          expression: 'Inner1()',
          arguments: [],
          nested: [],
          invocation: 'call',
        },
      ]);
    });

    it('should resolve recursive calls to the caller itself', () => {
      expect(sitesOf('app.Recursive').map((s) => (s.kind === 'local' ? s.target : s.kind))).toEqual([
        'app.Recursive',
      ]);
    });

    it('should render multi-line calls on one line', () => {
      const [site] = sitesOf('app.Multiline');
      expect(site.line).toBe(48);
      expect(site.expression).toBe('Outer(Inner1(),2,)');
      expect(site.arguments).toEqual(['Inner1()', '2']);
      expect(site.nested.map((s) => s.line)).toEqual([49]);
    });

    it('should list external references including nested ones', () => {
      expect(collectExternalReferences(sitesOf('app.Classified'))).toEqual([
        { name: 'undefinedFn', origin: 'unknown' },
        { name: 'ToUpper', origin: 'package', alias: 'strings', importPath: 'strings' },
        { name: 'Missing', origin: 'missing', alias: 'util', importPath: 'example.com/calls/util' },
      ]);
    });
  });

  it('should warn and leave an empty list when a function cannot be found again', async () => {
    const index = await indexProject(GO_BASIC_FIXTURE);
    const units: SourceUnit[] = index.units.map((unit) =>
      unit.filePath === 'internal/storage/storage.go'
        ? { ...unit, source: 'package storage\n' }
        : unit
    );
    const registry: FunctionRegistry = index.registry;

    const resolution = resolveCalls(registry, units);
    expect(resolution.callSites.get('storage.Open')).toEqual([]);
    expect(resolution.warnings.map((w) => w.code)).toEqual([
      'FUNCTION_REPARSE',
      'FUNCTION_REPARSE',
      'FUNCTION_REPARSE',
      'FUNCTION_REPARSE',
    ]);
    expect(resolution.warnings[0]).toEqual({
      code: 'FUNCTION_REPARSE',
      message: 'Cannot re-read storage.Open in internal/storage/storage.go: no declaration at line 3',
      filePath: 'internal/storage/storage.go',
    });
  });
});
