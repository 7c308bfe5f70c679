export { indexProject, listSourceFiles, parseSourceFile } from './analyzer/go/indexer.js';
export type { IndexOptions, IndexResult } from './analyzer/go/indexer.js';
export { buildImportTable } from './analyzer/go/imports.js';
export { findModuleManifest, parseModulePath } from './analyzer/go/manifest.js';
export {
  BUILTIN_FUNCTIONS,
  classifyCall,
  collectExternalReferences,
  extractCallSites,
  flattenCallSites,
  resolveCalls,
} from './analyzer/go/call-resolver.js';
export type { ResolutionResult } from './analyzer/go/call-resolver.js';
export { FunctionRegistry, RegistryBuilder, canonicalId, normalizeReceiver } from './analyzer/registry.js';
export { CallGraph, assembleCallGraph, buildClusters } from './analyzer/call-graph.js';
export type { GraphEdge, GraphNode } from './analyzer/call-graph.js';
export { matchEntryPoints, propagateEntryPoints } from './analyzer/entry-points.js';
export {
  analyzeCoverage,
  classifyCoverage,
  loadCoverageProfile,
  parseCoverageProfile,
} from './analyzer/coverage.js';
export type { CoverageProfile, CoverageReport } from './analyzer/coverage.js';
export { runAnalysis } from './analyzer/graph-builder.js';
export type { AnalysisResult } from './analyzer/graph-builder.js';
export { serializeGraph, toGraphDocument, writeOutput } from './analyzer/output.js';
export type { GraphDocument } from './analyzer/output.js';
export { renderDot, escapeDot } from './render/dot.js';
export { formatCallTree, formatTable, toCsv, toFunctionRecords, toJson } from './render/export.js';
export type { FunctionRecord } from './render/export.js';
export { resolveConfig } from './cli/config.js';
export * from './analyzer/errors.js';
export type * from './analyzer/types.js';
