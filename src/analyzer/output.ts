import { writeFileSync } from 'node:fs';
import { compareStrings, type EdgeSite } from './call-graph.js';
import type { AnalysisResult } from './graph-builder.js';
import type {
  AnalysisMetadata,
  AnalysisWarning,
  CallSiteKind,
  Cluster,
  GraphStats,
  NodeKind,
  NodeStatus,
} from './types.js';

export interface DocumentNode {
  id: string;
  kind: NodeKind;
  label: string;
  packageName: string;
  receiver: string;
  status?: NodeStatus;
  tested?: boolean;
  filePath?: string;
  startLine?: number;
  endLine?: number;
  unusedParameters?: string[];
}

export interface DocumentEdge {
  source: string;
  target: string;
  kind: CallSiteKind;
  sites: EdgeSite[];
}

/** The JSON graph document */
export interface GraphDocument {
  metadata: AnalysisMetadata;
  nodes: DocumentNode[];
  edges: DocumentEdge[];
  clusters: Cluster[];
  stats: GraphStats;
  warnings: AnalysisWarning[];
}

/** Flatten an analysis result into a plain JSON-ready document */
export function toGraphDocument(result: AnalysisResult): GraphDocument {
  const nodes = result.graph.nodes().map((node): DocumentNode => {
    const doc: DocumentNode = {
      id: node.id,
      kind: node.kind,
      label: node.label,
      packageName: node.packageName,
      receiver: node.receiver,
    };
    if (node.status) doc.status = node.status;
    if (result.coverage && node.kind === 'function') {
      doc.tested = result.coverage.tested.has(node.id);
    }
    if (node.descriptor) {
      doc.filePath = node.descriptor.filePath;
      doc.startLine = node.descriptor.startLine;
      doc.endLine = node.descriptor.endLine;
      doc.unusedParameters = [...node.descriptor.unusedParameters];
    }
    return doc;
  });

  return {
    metadata: result.metadata,
    nodes: nodes.sort((a, b) => compareStrings(a.id, b.id)),
    edges: result.graph.edges(),
    clusters: result.clusters,
    stats: result.stats,
    warnings: result.warnings,
  };
}

/** Write the graph document to a JSON file */
export function writeOutput(result: AnalysisResult, outputPath: string): void {
  const json = JSON.stringify(toGraphDocument(result), null, 2);
  writeFileSync(outputPath, json, 'utf-8');
}

/** Serialize the graph document to a JSON string */
export function serializeGraph(result: AnalysisResult): string {
  return JSON.stringify(toGraphDocument(result));
}
