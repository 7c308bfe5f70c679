import { resolve } from 'node:path';
import { assembleCallGraph, buildClusters, compareStrings, type CallGraph } from './call-graph.js';
import { analyzeCoverage, type CoverageReport } from './coverage.js';
import { matchEntryPoints, propagateEntryPoints } from './entry-points.js';
import { CoverageProfileOpenError, toWarning } from './errors.js';
import { collectExternalReferences, resolveCalls } from './go/call-resolver.js';
import { indexProject } from './go/indexer.js';
import type { FunctionRegistry } from './registry.js';
import type {
  AnalysisMetadata,
  AnalysisWarning,
  CallSite,
  Cluster,
  FunctionId,
  GraphStats,
  ProjectInfo,
  ResolvedConfig,
} from './types.js';

export const ANALYSIS_VERSION = '1.0.0';

/** Everything one run of the pipeline produces */
export interface AnalysisResult {
  metadata: AnalysisMetadata;
  project: ProjectInfo;
  registry: FunctionRegistry;
  callSites: Map<FunctionId, CallSite[]>;
  graph: CallGraph;
  entryPoints: string[];
  deadFunctions: string[];
  coverage: CoverageReport | null;
  clusters: Cluster[];
  stats: GraphStats;
  warnings: AnalysisWarning[];
}

/** Run the full analysis pipeline */
export async function runAnalysis(config: ResolvedConfig): Promise<AnalysisResult> {
  const startTime = Date.now();

  // 1. Index sources into a frozen registry
  const index = await indexProject(config.projectRoot, {
    include: config.include,
    exclude: config.exclude,
    vendorDir: config.vendorDir,
    includeTests: config.includeTests,
    modulePath: config.module,
  });
  const warnings: AnalysisWarning[] = [...index.warnings];

  // 2. Resolve call sites
  const resolution = resolveCalls(index.registry, index.units);
  warnings.push(...resolution.warnings);

  // 3. Assemble the graph
  const graph = assembleCallGraph(index.registry, resolution.callSites);

  // 4. Entry points and liveness
  const entryPoints = matchEntryPoints([...index.registry.values()], config.entryPoints);
  const deadFunctions = propagateEntryPoints(graph, entryPoints);

  // 5. Coverage overlay
  let coverage: CoverageReport | null = null;
  if (config.coverage) {
    try {
      coverage = await analyzeCoverage(resolve(config.projectRoot, config.coverage), index.registry, index.project);
      warnings.push(...coverage.warnings);
    } catch (err) {
      if (!(err instanceof CoverageProfileOpenError)) throw err;
      warnings.push(toWarning(err));
    }
  }

  // 6. Clusters and stats
  const clusters = buildClusters(graph);
  const stats = computeStats(graph, resolution.callSites, entryPoints, deadFunctions, coverage);

  const metadata: AnalysisMetadata = {
    version: ANALYSIS_VERSION,
    generatedAt: new Date().toISOString(),
    projectRoot: config.projectRoot,
    modulePath: index.project.modulePath,
    analysisTimeMs: Date.now() - startTime,
    totalFiles: index.files,
    totalFunctions: index.registry.size,
    totalNodes: graph.nodeCount,
    totalEdges: graph.edgeCount,
    totalDeadFunctions: deadFunctions.length,
    totalWarnings: warnings.length,
  };

  return {
    metadata,
    project: index.project,
    registry: index.registry,
    callSites: resolution.callSites,
    graph,
    entryPoints,
    deadFunctions,
    coverage,
    clusters,
    stats,
    warnings,
  };
}

/** Compute summary statistics */
export function computeStats(
  graph: CallGraph,
  callSites: ReadonlyMap<FunctionId, readonly CallSite[]>,
  entryPoints: readonly string[],
  deadFunctions: readonly string[],
  coverage: CoverageReport | null
): GraphStats {
  const functions = graph.nodes().filter((n) => n.kind === 'function');
  const total = functions.length;

  const deadByPackage: Record<string, number> = {};
  for (const id of deadFunctions) {
    const pkg = graph.node(id)?.packageName ?? '';
    deadByPackage[pkg] = (deadByPackage[pkg] || 0) + 1;
  }

  let externalReferences = 0;
  for (const sites of callSites.values()) {
    externalReferences += collectExternalReferences(sites).length;
  }

  const largestFunctions = functions
    .map((n) => ({
      id: n.id,
      linesOfCode: n.descriptor ? n.descriptor.endLine - n.descriptor.startLine + 1 : 0,
    }))
    .sort((a, b) => b.linesOfCode - a.linesOfCode || compareStrings(a.id, b.id))
    .slice(0, 10);

  return {
    deadFunctions: {
      count: deadFunctions.length,
      percentage: total > 0 ? Math.round((deadFunctions.length / total) * 10000) / 100 : 0,
      byPackage: deadByPackage,
    },
    entryPoints: {
      count: entryPoints.length,
      functions: [...entryPoints],
    },
    externalReferences,
    untestedFunctions: coverage ? coverage.untested.size : null,
    largestFunctions,
  };
}
