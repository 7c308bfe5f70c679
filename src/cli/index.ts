import { Command, Option } from 'commander';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { resolveConfig, type CliOptions } from './config.js';
import { startWatcher } from './watch.js';
import { runAnalysis, type AnalysisResult } from '../analyzer/graph-builder.js';
import { writeOutput } from '../analyzer/output.js';
import { compareStrings } from '../analyzer/call-graph.js';
import { errorMessage } from '../analyzer/errors.js';
import type { FunctionRegistry } from '../analyzer/registry.js';
import type { AnalysisWarning, FunctionDescriptor, ResolvedConfig } from '../analyzer/types.js';
import { renderDot } from '../render/dot.js';
import {
  RECORD_FORMATS,
  formatCallTree,
  formatRecords,
  toFunctionRecords,
  type RecordFormat,
} from '../render/export.js';

interface AnalysisFlags {
  root: string;
  include?: string[];
  exclude?: string[];
  entry?: string[];
  module?: string;
  vendorDir?: string;
  includeTests?: boolean;
  config?: string;
}

interface AnalyzeFlags extends AnalysisFlags {
  output?: string;
  json?: string;
  coverage?: string;
  watch?: boolean;
}

interface FunctionsFlags extends AnalysisFlags {
  format: RecordFormat;
  output?: string;
}

interface CallsFlags extends AnalysisFlags {
  callers?: boolean;
}

function withAnalysisOptions(command: Command): Command {
  return command
    .option('-i, --include <patterns...>', 'File patterns to include')
    .option('-x, --exclude <patterns...>', 'File patterns to exclude')
    .option('-e, --entry <functions...>', 'Additional entry point functions')
    .option('-m, --module <path>', 'Module path to use instead of reading go.mod')
    .option('--vendor-dir <dir>', 'Vendor directory to skip')
    .option('--include-tests', 'Index _test.go files')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --root <path>', 'Project root directory', '.');
}

function cliOptions(flags: AnalysisFlags, extra: Partial<CliOptions> = {}): CliOptions {
  return {
    include: flags.include,
    exclude: flags.exclude,
    entry: flags.entry,
    module: flags.module,
    vendorDir: flags.vendorDir,
    includeTests: flags.includeTests,
    config: flags.config,
    ...extra,
  };
}

function reportWarnings(warnings: readonly AnalysisWarning[]): void {
  for (const warning of warnings) {
    console.warn(`[${warning.code}] ${warning.message}`);
  }
}

function writeResults(result: AnalysisResult, config: ResolvedConfig): string[] {
  const written: string[] = [];

  const dotPath = resolve(config.projectRoot, config.output);
  const dot = renderDot(result.graph, {
    clusters: result.clusters,
    untested: result.coverage?.untested,
  });
  writeFileSync(dotPath, dot, 'utf-8');
  written.push(dotPath);

  if (config.json) {
    const jsonPath = resolve(config.projectRoot, config.json);
    writeOutput(result, jsonPath);
    written.push(jsonPath);
  }

  return written;
}

/** Look a function up by identity, `Receiver.name` or bare name */
export function findFunction(registry: FunctionRegistry, query: string): FunctionDescriptor[] {
  const exact = registry.get(query);
  if (exact) return [exact];

  return [...registry.values()].filter(
    (fn) => fn.name === query || (fn.receiver !== '' && `${fn.receiver}.${fn.name}` === query)
  );
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('callscope')
    .description('Static call-graph analyzer for Go modules with dead code and coverage reports')
    .version('1.0.0');

  withAnalysisOptions(
    program
      .command('analyze')
      .description('Build the call graph and write it as a DOT diagram')
      .option('-o, --output <path>', 'Output DOT file path')
      .option('--json <path>', 'Also write the graph as a JSON document')
      .option('--coverage <profile>', 'Coverage profile to overlay')
      .option('-w, --watch', 'Re-analyze on file changes')
  ).action(async (flags: AnalyzeFlags) => {
    try {
      const config = resolveConfig(
        resolve(flags.root),
        cliOptions(flags, { output: flags.output, json: flags.json, coverage: flags.coverage })
      );

      console.log(`Analyzing Go module at ${config.projectRoot}...`);
      console.log(`Include: ${config.include.join(', ')}`);
      console.log(`Exclude: ${config.exclude.length} patterns`);
      console.log(`Entry points: ${config.entryPoints.length} rules`);

      const result = await runAnalysis(config);
      reportWarnings(result.warnings);
      const written = writeResults(result, config);

      console.log(`\nAnalysis complete!`);
      console.log(`  Module: ${result.metadata.modulePath}`);
      console.log(`  Files: ${result.metadata.totalFiles}`);
      console.log(`  Functions: ${result.metadata.totalFunctions}`);
      console.log(`  Calls: ${result.metadata.totalEdges}`);
      console.log(`  Dead functions: ${result.metadata.totalDeadFunctions}`);
      if (result.stats.untestedFunctions !== null) {
        console.log(`  Untested functions: ${result.stats.untestedFunctions}`);
      }
      console.log(`  Warnings: ${result.metadata.totalWarnings}`);
      console.log(`  Time: ${result.metadata.analysisTimeMs}ms`);
      for (const path of written) {
        console.log(`\nOutput written to: ${path}`);
      }

      if (flags.watch) {
        startWatcher(config, (updated) => {
          reportWarnings(updated.warnings);
          for (const path of writeResults(updated, config)) {
            console.log(`[watch] Output written to: ${path}`);
          }
        });
      }
    } catch (err) {
      console.error('Analysis failed:', errorMessage(err));
      process.exit(1);
    }
  });

  withAnalysisOptions(
    program
      .command('functions')
      .description('List every function with its signature, externals and calls')
      .addOption(
        new Option('-f, --format <format>', 'Output format').choices(RECORD_FORMATS).default('table')
      )
      .option('-o, --output <path>', 'Write to a file instead of stdout')
  ).action(async (flags: FunctionsFlags) => {
    try {
      const config = resolveConfig(resolve(flags.root), cliOptions(flags));
      const result = await runAnalysis(config);
      reportWarnings(result.warnings);

      const text = formatRecords(toFunctionRecords(result.registry, result.callSites), flags.format);
      if (flags.output) {
        const outputPath = resolve(config.projectRoot, flags.output);
        writeFileSync(outputPath, text + '\n', 'utf-8');
        console.log(`Output written to: ${outputPath}`);
      } else {
        console.log(text);
      }
    } catch (err) {
      console.error('Listing failed:', errorMessage(err));
      process.exit(1);
    }
  });

  withAnalysisOptions(
    program
      .command('coverage')
      .description('List functions not exercised by a coverage profile')
      .argument('<profile>', 'Coverage profile written by go test -coverprofile')
  ).action(async (profile: string, flags: AnalysisFlags) => {
    try {
      const config = resolveConfig(resolve(flags.root), cliOptions(flags, { coverage: resolve(profile) }));
      const result = await runAnalysis(config);
      reportWarnings(result.warnings);

      const coverage = result.coverage;
      if (!coverage) {
        throw new Error(`No coverage data read from ${profile}`);
      }

      const untested = [...coverage.untested]
        .map((id) => result.registry.get(id))
        .filter((fn): fn is FunctionDescriptor => fn !== undefined)
        .sort((a, b) => compareStrings(a.id, b.id));

      console.log(`Untested functions: ${untested.length} of ${result.registry.size}`);
      for (const fn of untested) {
        console.log(`  ${fn.id} (${fn.filePath}:${fn.startLine})`);
      }
    } catch (err) {
      console.error('Coverage failed:', errorMessage(err));
      process.exit(1);
    }
  });

  withAnalysisOptions(
    program
      .command('calls')
      .description('Print the call sites of one function')
      .argument('<function>', 'Function identity, Receiver.name or name')
      .option('--callers', 'Also list every function that can reach it')
  ).action(async (query: string, flags: CallsFlags) => {
    try {
      const config = resolveConfig(resolve(flags.root), cliOptions(flags));
      const result = await runAnalysis(config);
      reportWarnings(result.warnings);

      const matches = findFunction(result.registry, query);
      if (matches.length === 0) {
        throw new Error(`Function not found: ${query}`);
      }

      for (const fn of matches) {
        console.log(`${fn.id} (${fn.filePath}:${fn.startLine})`);
        const tree = formatCallTree(result.callSites.get(fn.id) ?? [], '  ');
        console.log(tree || '  (no calls)');

        if (flags.callers) {
          const callers = [...result.graph.upstream(fn.id)].sort(compareStrings);
          console.log(`Callers (${callers.length}):`);
          for (const caller of callers) {
            console.log(`  ${caller}`);
          }
        }
      }
    } catch (err) {
      console.error('Lookup failed:', errorMessage(err));
      process.exit(1);
    }
  });

  return program;
}
