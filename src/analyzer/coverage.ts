import { readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { CoverageProfileOpenError, MalformedCoverageLineError, errorMessage, toWarning } from './errors.js';
import type { FunctionRegistry } from './registry.js';
import type { AnalysisWarning, CoverageBlock, FunctionDescriptor, FunctionId, ProjectInfo } from './types.js';

/** Coverage blocks per profile file name */
export interface CoverageProfile {
  mode: string | null;
  files: Map<string, CoverageBlock[]>;
  warnings: AnalysisWarning[];
}

export interface CoverageReport {
  mode: string | null;
  tested: Set<FunctionId>;
  untested: Set<FunctionId>;
  warnings: AnalysisWarning[];
}

// file:startLine.startCol,endLine.endCol
const BLOCK_PATTERN = /^(.+):(\d+)\.(\d+),(\d+)\.(\d+)$/;

/**
 * Parse a coverage profile. The `mode:` header and blank lines are ignored;
 * every other line is `file:sl.sc,el.ec [statements] count`. Lines that do
 * not fit are reported and skipped.
 */
export function parseCoverageProfile(content: string): CoverageProfile {
  const profile: CoverageProfile = { mode: null, files: new Map(), warnings: [] };
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const text = raw.trim();
    if (text === '') return;
    if (text.startsWith('mode:')) {
      profile.mode = text.slice('mode:'.length).trim() || null;
      return;
    }

    const fields = text.split(/\s+/);
    const match = fields.length === 2 || fields.length === 3 ? BLOCK_PATTERN.exec(fields[0]) : null;
    const count = Number(fields[fields.length - 1]);
    const statements = fields.length === 3 ? Number(fields[1]) : 0;

    if (!match || !isCount(count) || !isCount(statements)) {
      profile.warnings.push(toWarning(new MalformedCoverageLineError(i + 1, text)));
      return;
    }

    const block: CoverageBlock = {
      startLine: Number(match[2]),
      startCol: Number(match[3]),
      endLine: Number(match[4]),
      endCol: Number(match[5]),
      statements,
      count,
    };
    const blocks = profile.files.get(match[1]) || [];
    blocks.push(block);
    profile.files.set(match[1], blocks);
  });

  return profile;
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/** Read and parse a profile file. Throws CoverageProfileOpenError. */
export async function loadCoverageProfile(profilePath: string): Promise<CoverageProfile> {
  let content: string;
  try {
    content = await readFile(profilePath, 'utf-8');
  } catch (err) {
    throw new CoverageProfileOpenError(profilePath, errorMessage(err));
  }
  return parseCoverageProfile(content);
}

/**
 * Normalize a profile file name to a path relative to the module root.
 * Profiles name files by import path; absolute paths are accepted too.
 */
export function profileFileKey(fileName: string, project: ProjectInfo): string {
  if (fileName.startsWith(project.modulePath + '/')) {
    return fileName.slice(project.modulePath.length + 1);
  }
  if (isAbsolute(fileName)) {
    return toPosix(relative(project.moduleRoot, fileName));
  }
  return toPosix(fileName);
}

/** Module-root relative path of a descriptor's file */
function descriptorFileKey(descriptor: FunctionDescriptor, project: ProjectInfo): string {
  return toPosix(relative(project.moduleRoot, resolve(project.root, descriptor.filePath)));
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/** A block counts for a function when it was hit and overlaps the function's own lines */
export function isFunctionCovered(
  descriptor: Pick<FunctionDescriptor, 'startLine' | 'endLine'>,
  blocks: readonly CoverageBlock[]
): boolean {
  return blocks.some(
    (block) =>
      block.count > 0 && block.startLine <= descriptor.endLine && block.endLine >= descriptor.startLine
  );
}

/** Split registered functions into tested and untested using a parsed profile */
export function classifyCoverage(
  profile: CoverageProfile,
  registry: FunctionRegistry,
  project: ProjectInfo
): CoverageReport {
  const blocksByFile = new Map<string, CoverageBlock[]>();
  for (const [fileName, blocks] of profile.files) {
    const key = profileFileKey(fileName, project);
    blocksByFile.set(key, [...(blocksByFile.get(key) || []), ...blocks]);
  }

  const report: CoverageReport = {
    mode: profile.mode,
    tested: new Set(),
    untested: new Set(),
    warnings: [...profile.warnings],
  };

  for (const descriptor of registry.values()) {
    const blocks = blocksByFile.get(descriptorFileKey(descriptor, project));
    if (blocks && isFunctionCovered(descriptor, blocks)) {
      report.tested.add(descriptor.id);
    } else {
      report.untested.add(descriptor.id);
    }
  }

  return report;
}

/** Load a coverage profile and classify every registered function */
export async function analyzeCoverage(
  profilePath: string,
  registry: FunctionRegistry,
  project: ProjectInfo
): Promise<CoverageReport> {
  const profile = await loadCoverageProfile(profilePath);
  return classifyCoverage(profile, registry, project);
}
