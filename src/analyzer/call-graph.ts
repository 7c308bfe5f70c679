import type { FunctionRegistry } from './registry.js';
import type {
  CallSite,
  CallSiteKind,
  CallSiteTable,
  Cluster,
  FunctionDescriptor,
  FunctionId,
  Invocation,
  NodeKind,
  NodeStatus,
} from './types.js';

/** A node of the call graph. Neighbours are addressed by identity, never by reference. */
export interface GraphNode {
  id: string;
  index: number;
  kind: NodeKind;
  label: string;
  packageName: string;
  receiver: string;
  descriptor?: FunctionDescriptor;
  /** Set on internal nodes once entry points have been propagated */
  status?: NodeStatus;
  /** callee identity -> edge index */
  calls: Map<string, number>;
  /** caller identity -> edge index */
  calledBy: Map<string, number>;
}

/** Where one edge was observed */
export interface EdgeSite {
  line: number;
  invocation: Invocation;
}

interface EdgeRecord {
  source: number;
  target: number;
  kind: CallSiteKind;
  sites: EdgeSite[];
}

/** Public view of an edge */
export interface GraphEdge {
  source: string;
  target: string;
  kind: CallSiteKind;
  sites: EdgeSite[];
}

/** Node creation options */
export interface NodeInit {
  kind: NodeKind;
  label?: string;
  packageName?: string;
  receiver?: string;
  descriptor?: FunctionDescriptor;
}

/**
 * Call graph stored as an arena: nodes live in one array addressed by an
 * interned identity, edges are index pairs. Recursion and mutual recursion
 * need no special handling.
 */
export class CallGraph {
  private readonly nodeList: GraphNode[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly edgeList: EdgeRecord[] = [];

  /** Return the node for `id`, creating it on first reference */
  ensureNode(id: string, init: NodeInit): GraphNode {
    const existing = this.node(id);
    if (existing) return existing;

    const node: GraphNode = {
      id,
      index: this.nodeList.length,
      kind: init.kind,
      label: init.label ?? id,
      packageName: init.packageName ?? '',
      receiver: init.receiver ?? '',
      calls: new Map(),
      calledBy: new Map(),
    };
    if (init.descriptor) node.descriptor = init.descriptor;

    this.nodeList.push(node);
    this.indexById.set(id, node.index);
    return node;
  }

  node(id: string): GraphNode | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.nodeList[index];
  }

  has(id: string): boolean {
    return this.indexById.has(id);
  }

  /**
   * Record a call from `sourceId` to `targetId`. Both nodes must exist.
   * Repeated calls between the same pair add a site to the existing edge.
   */
  addEdge(sourceId: string, targetId: string, kind: CallSiteKind, site: EdgeSite): GraphEdge {
    const source = this.node(sourceId);
    const target = this.node(targetId);
    if (!source || !target) {
      throw new Error(`Cannot add edge ${sourceId} -> ${targetId}: unknown node`);
    }

    const existing = source.calls.get(targetId);
    if (existing !== undefined) {
      this.edgeList[existing].sites.push(site);
      return this.toEdge(this.edgeList[existing]);
    }

    const record: EdgeRecord = { source: source.index, target: target.index, kind, sites: [site] };
    const index = this.edgeList.length;
    this.edgeList.push(record);
    source.calls.set(targetId, index);
    target.calledBy.set(sourceId, index);
    return this.toEdge(record);
  }

  get nodeCount(): number {
    return this.nodeList.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  nodes(): GraphNode[] {
    return [...this.nodeList];
  }

  edges(): GraphEdge[] {
    return this.edgeList.map((e) => this.toEdge(e));
  }

  /** Direct callees of a node */
  callees(id: string): string[] {
    return [...(this.node(id)?.calls.keys() ?? [])];
  }

  /** Direct callers of a node */
  callers(id: string): string[] {
    return [...(this.node(id)?.calledBy.keys() ?? [])];
  }

  /** Every node reachable from `id` by following calls, `id` excluded */
  downstream(id: string): Set<string> {
    return this.reach(id, (node) => node.calls);
  }

  /** Every node that can reach `id`, `id` excluded */
  upstream(id: string): Set<string> {
    return this.reach(id, (node) => node.calledBy);
  }

  private reach(id: string, next: (node: GraphNode) => Map<string, number>): Set<string> {
    const visited = new Set<string>();
    const start = this.node(id);
    if (!start) return visited;

    const queue: GraphNode[] = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      for (const neighbourId of next(current).keys()) {
        if (visited.has(neighbourId) || neighbourId === id) continue;
        visited.add(neighbourId);
        const neighbour = this.node(neighbourId);
        if (neighbour) queue.push(neighbour);
      }
    }
    return visited;
  }

  private toEdge(record: EdgeRecord): GraphEdge {
    return {
      source: this.nodeList[record.source].id,
      target: this.nodeList[record.target].id,
      kind: record.kind,
      sites: [...record.sites],
    };
  }
}

/** True for nodes that stand for code of the indexed project */
export function isInternalNode(node: GraphNode): boolean {
  return node.kind === 'function' || node.kind === 'placeholder';
}

/**
 * Fold every descriptor and its call sites into one call graph. Nested call
 * sites are attributed to the enclosing function.
 */
export function assembleCallGraph(registry: FunctionRegistry, callSites: CallSiteTable): CallGraph {
  const graph = new CallGraph();

  for (const descriptor of registry.values()) {
    graph.ensureNode(descriptor.id, functionNodeInit(descriptor));
  }

  for (const [sourceId, sites] of callSites) {
    const source = graph.node(sourceId);
    if (!source) continue;
    addSites(graph, registry, source, sites);
  }

  return graph;
}

function addSites(
  graph: CallGraph,
  registry: FunctionRegistry,
  source: GraphNode,
  sites: readonly CallSite[]
): void {
  for (const site of sites) {
    const targetId = ensureTarget(graph, registry, source, site);
    graph.addEdge(source.id, targetId, site.kind, { line: site.line, invocation: site.invocation });
    addSites(graph, registry, source, site.nested);
  }
}

/** Create (if needed) the node a call site points at and return its identity */
function ensureTarget(
  graph: CallGraph,
  registry: FunctionRegistry,
  source: GraphNode,
  site: CallSite
): string {
  switch (site.kind) {
    case 'local':
    case 'cross-module': {
      const descriptor = registry.get(site.target);
      if (descriptor) {
        graph.ensureNode(site.target, functionNodeInit(descriptor));
      } else {
        graph.ensureNode(site.target, { kind: 'placeholder', ...splitIdentity(site.target) });
      }
      return site.target;
    }

    case 'method': {
      const id = `method:${site.receiver}.${site.name}`;
      graph.ensureNode(id, { kind: 'method', label: `${site.receiver}.${site.name}` });
      return id;
    }

    case 'external': {
      if (site.origin === 'package') {
        const id = `external:${site.importPath}.${site.name}`;
        graph.ensureNode(id, {
          kind: 'external',
          label: `${site.importPath}.${site.name}`,
          packageName: site.importPath ?? '',
        });
        return id;
      }
      const scope =
        site.origin === 'missing'
          ? site.importPath
          : site.origin === 'unknown'
            ? source.packageName
            : undefined;
      const label = scope ? `${scope}.${site.name}` : site.name;
      const id = `unresolved:${label}`;
      graph.ensureNode(id, { kind: 'unresolved', label });
      return id;
    }

    case 'literal': {
      const id = `literal:${source.id}@${site.line}`;
      graph.ensureNode(id, { kind: 'literal', label: `func literal (${source.label}:${site.line})` });
      return id;
    }
  }
}

function functionNodeInit(descriptor: FunctionDescriptor): NodeInit {
  return {
    kind: 'function',
    label: descriptor.receiver ? `${descriptor.receiver}.${descriptor.name}` : descriptor.name,
    packageName: descriptor.packageName,
    receiver: descriptor.receiver,
    descriptor,
  };
}

/** Recover package, receiver and label from a canonical identity */
function splitIdentity(id: FunctionId): { label: string; packageName: string; receiver: string } {
  const slash = id.indexOf('/');
  if (slash >= 0) {
    const rest = id.slice(slash + 1);
    const dot = rest.indexOf('.');
    return { label: rest, packageName: id.slice(0, slash), receiver: dot >= 0 ? rest.slice(0, dot) : '' };
  }
  const dot = id.indexOf('.');
  return { label: id.slice(dot + 1), packageName: id.slice(0, Math.max(dot, 0)), receiver: '' };
}

/** Group internal nodes into package clusters with receiver-type sub-clusters */
export function buildClusters(graph: CallGraph): Cluster[] {
  const clusters = new Map<string, Cluster>();

  for (const node of graph.nodes()) {
    if (!isInternalNode(node)) continue;

    const pkgId = `pkg:${node.packageName}`;
    let pkg = clusters.get(pkgId);
    if (!pkg) {
      pkg = { id: pkgId, label: node.packageName, kind: 'package', nodeIds: [], parent: null };
      clusters.set(pkgId, pkg);
    }

    if (!node.receiver) {
      pkg.nodeIds.push(node.id);
      continue;
    }

    const typeId = `type:${node.packageName}.${node.receiver}`;
    let type = clusters.get(typeId);
    if (!type) {
      type = {
        id: typeId,
        label: `${node.packageName}.${node.receiver}`,
        kind: 'type',
        nodeIds: [],
        parent: pkgId,
      };
      clusters.set(typeId, type);
    }
    type.nodeIds.push(node.id);
  }

  return [...clusters.values()].sort((a, b) => compareStrings(a.id, b.id));
}

/** Locale-independent string ordering */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
