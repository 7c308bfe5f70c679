import { watch, type FSWatcher } from 'chokidar';
import { runAnalysis, type AnalysisResult } from '../analyzer/graph-builder.js';
import { errorMessage } from '../analyzer/errors.js';
import type { ResolvedConfig } from '../analyzer/types.js';

/** Paths chokidar should leave alone for this configuration */
export function watchIgnorePatterns(config: ResolvedConfig): string[] {
  const ignored = [...config.exclude, `**/${config.vendorDir}/**`, '**/node_modules/**'];
  if (!config.includeTests) {
    ignored.push('**/*_test.go');
  }
  return ignored;
}

/**
 * Watch Go sources and re-run the analysis when they change.
 *
 * Changes are debounced: several rapid edits are batched into one pass, and
 * edits made during a pass queue exactly one more.
 */
export function startWatcher(
  config: ResolvedConfig,
  onUpdate: (result: AnalysisResult) => void
): FSWatcher {
  const watcher = watch(config.include, {
    cwd: config.projectRoot,
    ignored: watchIgnorePatterns(config),
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 300,
      pollInterval: 100,
    },
  });

  let debounceTimer: NodeJS.Timeout | null = null;
  let analyzing = false;
  const pendingChanges = new Map<string, string>();

  const analyze = async (): Promise<void> => {
    analyzing = true;
    const changed = [...pendingChanges];
    pendingChanges.clear();

    try {
      console.log(`[watch] ${changed.length} file(s) changed, re-analyzing...`);
      for (const [file, event] of changed) {
        console.log(`[watch]   ${event}: ${file}`);
      }
      const result = await runAnalysis(config);
      console.log(
        `[watch] Analysis complete in ${result.metadata.analysisTimeMs}ms ` +
          `(${result.metadata.totalFunctions} functions)`
      );
      onUpdate(result);
    } catch (err) {
      console.error('[watch] Analysis failed:', errorMessage(err));
    } finally {
      analyzing = false;
      if (pendingChanges.size > 0) schedule();
    }
  };

  const schedule = (): void => {
    if (analyzing) return;
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      void analyze();
    }, 500);
  };

  const onChange = (event: string) => (filePath: string) => {
    pendingChanges.set(filePath, event);
    schedule();
  };

  watcher.on('change', onChange('changed'));
  watcher.on('add', onChange('added'));
  watcher.on('unlink', onChange('removed'));

  console.log('[watch] Watching for file changes...');
  return watcher;
}
