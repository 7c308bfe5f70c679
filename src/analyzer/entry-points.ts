import { minimatch } from 'minimatch';
import { isInternalNode, type CallGraph } from './call-graph.js';
import type { EntryPointConfig, FunctionDescriptor } from './types.js';

/**
 * Matches descriptors against entry point configuration rules.
 * Returns the list of entry point identities.
 */
export function matchEntryPoints(
  functions: readonly FunctionDescriptor[],
  entryPointConfigs: readonly EntryPointConfig[]
): string[] {
  const entryIds: Set<string> = new Set();

  for (const fn of functions) {
    if (autoDetectEntryPoint(fn) || entryPointConfigs.some((config) => isEntryPoint(fn, config))) {
      entryIds.add(fn.id);
    }
  }

  return [...entryIds];
}

/** Check if a function matches a single entry point config rule */
function isEntryPoint(fn: FunctionDescriptor, config: EntryPointConfig): boolean {
  switch (config.type) {
    case 'file':
      // All exported functions in matched files
      return minimatch(fn.filePath, config.pattern) && fn.visibility === 'exported';

    case 'function':
      return (
        fn.name === config.name ||
        fn.id === config.name ||
        (fn.receiver !== '' && `${fn.receiver}.${fn.name}` === config.name)
      );

    default:
      return false;
  }
}

/** `main` of package main and every `init` run without a caller */
function autoDetectEntryPoint(fn: FunctionDescriptor): boolean {
  if (fn.receiver) return false;
  if (fn.name === 'init') return true;
  return fn.name === 'main' && fn.packageName === 'main';
}

/**
 * Propagate liveness from entry points through the call graph and set the
 * status of every internal node. Returns the ids of dead functions.
 */
export function propagateEntryPoints(graph: CallGraph, entryPointIds: readonly string[]): string[] {
  const reachable = new Set<string>();
  for (const id of entryPointIds) {
    for (const reached of graph.downstream(id)) {
      reachable.add(reached);
    }
  }

  const entries = new Set(entryPointIds);
  const dead: string[] = [];

  for (const node of graph.nodes()) {
    if (!isInternalNode(node)) continue;

    if (entries.has(node.id)) {
      node.status = 'entry';
    } else if (reachable.has(node.id)) {
      node.status = 'live';
    } else {
      node.status = 'dead';
      if (node.kind === 'function') dead.push(node.id);
    }
  }

  return dead;
}
