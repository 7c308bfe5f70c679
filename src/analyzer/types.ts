/** Canonical identity of a function: `pkg.Name` or `pkg/Receiver.Name` */
export type FunctionId = string;

/** The kind of callable unit */
export type FunctionKind = 'function' | 'method';

/** Go visibility, decided by the case of the first letter */
export type Visibility = 'exported' | 'unexported';

/** Liveness of an internal node in the call graph */
export type NodeStatus = 'live' | 'dead' | 'entry';

/** A function parameter */
export interface Parameter {
  /** Empty for unnamed parameters */
  name: string;
  type: string;
  isUsed: boolean;
  position: number;
}

/** One declared function or method */
export interface FunctionDescriptor {
  id: FunctionId;
  packageName: string;
  /** Receiver type without pointer marker or type parameters; empty for free functions */
  receiver: string;
  name: string;
  filePath: string;
  startLine: number;
  endLine: number;
  parameters: Parameter[];
  returns: string[];
  unusedParameters: string[];
  kind: FunctionKind;
  visibility: Visibility;
  doc?: string;
}

/** Per-file import aliases */
export interface ImportTable {
  filePath: string;
  /** alias -> import path */
  aliases: Map<string, string>;
  /** Paths imported with `.` */
  dotImports: string[];
}

/** How the call is scheduled by the statement that contains it */
export type Invocation = 'call' | 'defer' | 'go';

/** Why an external call could not be tied to an indexed function */
export type ExternalOrigin = 'unknown' | 'missing' | 'package' | 'dynamic';

interface CallSiteBase {
  line: number;
  /** Rendered text of the whole call expression */
  expression: string;
  arguments: string[];
  /** Calls found inside the arguments (and, for literals, the body) */
  nested: CallSite[];
  invocation: Invocation;
}

export interface LocalCall extends CallSiteBase {
  kind: 'local';
  name: string;
  target: FunctionId;
}

export interface CrossModuleCall extends CallSiteBase {
  kind: 'cross-module';
  name: string;
  target: FunctionId;
  alias: string;
  importPath: string;
}

export interface MethodCall extends CallSiteBase {
  kind: 'method';
  name: string;
  /** Rendered selector operand, never decomposed */
  receiver: string;
}

export interface ExternalCall extends CallSiteBase {
  kind: 'external';
  name: string;
  origin: ExternalOrigin;
  alias?: string;
  importPath?: string;
}

export interface LiteralInvocation extends CallSiteBase {
  kind: 'literal';
}

export type CallSite = LocalCall | CrossModuleCall | MethodCall | ExternalCall | LiteralInvocation;

export type CallSiteKind = CallSite['kind'];

/** Call sites of every resolved function, keyed by identity */
export type CallSiteTable = ReadonlyMap<FunctionId, readonly CallSite[]>;

/** A call target outside the indexed tree */
export interface ExternalReference {
  name: string;
  origin: ExternalOrigin;
  alias?: string;
  importPath?: string;
}

/** Where the analyzed module lives */
export interface ProjectInfo {
  /** Absolute directory that was indexed */
  root: string;
  /** Absolute directory holding go.mod */
  moduleRoot: string;
  modulePath: string;
}

/** One parsed source file kept for the resolution phase */
export interface SourceUnit {
  filePath: string;
  absolutePath: string;
  packageName: string;
  /** Import path of the package the file belongs to */
  importPath: string;
  imports: ImportTable;
  source: string;
}

/** Non-fatal problem reported by a phase */
export interface AnalysisWarning {
  code: string;
  message: string;
  filePath?: string;
  line?: number;
}

/** Kind of a call graph node */
export type NodeKind = 'function' | 'placeholder' | 'external' | 'unresolved' | 'method' | 'literal';

/** A range of statements from a coverage profile */
export interface CoverageBlock {
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
  statements: number;
  count: number;
}

/** A cluster of nodes belonging to the same package or receiver type */
export interface Cluster {
  id: string;
  label: string;
  kind: 'package' | 'type';
  nodeIds: string[];
  parent: string | null;
}

/** Entry point config types */
export type EntryPointConfig =
  | { type: 'file'; pattern: string }
  | { type: 'function'; name: string };

/** Configuration file schema */
export interface CallscopeConfig {
  include: string[];
  exclude: string[];
  vendorDir: string;
  includeTests: boolean;
  entryPoints: EntryPointConfig[];
  output: string;
  json?: string;
  coverage?: string;
  module?: string;
}

/** Resolved config (with defaults applied) */
export interface ResolvedConfig extends CallscopeConfig {
  projectRoot: string;
}

/** Dead code statistics */
export interface DeadCodeStats {
  count: number;
  percentage: number;
  byPackage: Record<string, number>;
}

/** Large function info */
export interface LargeFunctionInfo {
  id: string;
  linesOfCode: number;
}

/** Summary statistics */
export interface GraphStats {
  deadFunctions: DeadCodeStats;
  entryPoints: { count: number; functions: string[] };
  externalReferences: number;
  untestedFunctions: number | null;
  largestFunctions: LargeFunctionInfo[];
}

/** Analysis metadata */
export interface AnalysisMetadata {
  version: string;
  generatedAt: string;
  projectRoot: string;
  modulePath: string;
  analysisTimeMs: number;
  totalFiles: number;
  totalFunctions: number;
  totalNodes: number;
  totalEdges: number;
  totalDeadFunctions: number;
  totalWarnings: number;
}
