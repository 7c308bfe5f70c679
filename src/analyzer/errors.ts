import type { AnalysisWarning } from './types.js';

/**
 * Base error class for all callscope errors.
 * Fatal errors are thrown; recoverable ones are turned into warnings with
 * {@link toWarning} and the phase carries on.
 */
export class CallscopeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CallscopeError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** No go.mod (or no module line in it) between the root and the filesystem root */
export class ManifestNotFoundError extends CallscopeError {
  constructor(startDir: string, manifestPath?: string) {
    super(
      'MANIFEST_NOT_FOUND',
      manifestPath
        ? `No module declaration in ${manifestPath}`
        : `go.mod not found in ${startDir} or any parent directory`,
      { startDir, manifestPath }
    );
    this.name = 'ManifestNotFoundError';
  }
}

/** The project root is missing or not a directory */
export class RootAccessError extends CallscopeError {
  constructor(root: string, reason: string) {
    super('ROOT_NOT_ACCESSIBLE', `Cannot read project root ${root}: ${reason}`, { root });
    this.name = 'RootAccessError';
  }
}

export class FileParseError extends CallscopeError {
  constructor(
    public readonly filePath: string,
    reason: string,
    public readonly line?: number
  ) {
    super('FILE_PARSE', `Failed to parse ${filePath}: ${reason}`, { filePath, line });
    this.name = 'FileParseError';
  }
}

export class FunctionReparseError extends CallscopeError {
  constructor(
    public readonly functionId: string,
    public readonly filePath: string,
    reason: string
  ) {
    super('FUNCTION_REPARSE', `Cannot re-read ${functionId} in ${filePath}: ${reason}`, {
      functionId,
      filePath,
    });
    this.name = 'FunctionReparseError';
  }
}

export class CoverageProfileOpenError extends CallscopeError {
  constructor(
    public readonly profilePath: string,
    reason: string
  ) {
    super('COVERAGE_PROFILE_OPEN', `Cannot open coverage profile ${profilePath}: ${reason}`, {
      profilePath,
    });
    this.name = 'CoverageProfileOpenError';
  }
}

export class MalformedCoverageLineError extends CallscopeError {
  constructor(
    public readonly line: number,
    text: string
  ) {
    super('MALFORMED_COVERAGE_LINE', `Malformed coverage line ${line}: ${text}`, { line, text });
    this.name = 'MalformedCoverageLineError';
  }
}

/** Convert a recoverable error into the warning record a phase returns */
export function toWarning(err: CallscopeError): AnalysisWarning {
  const warning: AnalysisWarning = { code: err.code, message: err.message };
  if (err instanceof FileParseError || err instanceof FunctionReparseError) {
    warning.filePath = err.filePath;
  }
  if (err instanceof FileParseError && err.line !== undefined) {
    warning.line = err.line;
  }
  if (err instanceof MalformedCoverageLineError) {
    warning.line = err.line;
  }
  return warning;
}

/** Message of anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
