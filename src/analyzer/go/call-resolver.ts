import { FunctionReparseError, errorMessage, toWarning } from '../errors.js';
import { canonicalId, type FunctionRegistry } from '../registry.js';
import type {
  AnalysisWarning,
  CallSite,
  ExternalReference,
  FunctionDescriptor,
  FunctionId,
  ImportTable,
  Invocation,
  SourceUnit,
} from '../types.js';
import {
  GoNodes,
  createGoParser,
  functionDeclarations,
  lineOf,
  parseGo,
  renderText,
  unwrapParentheses,
  type SyntaxNode,
} from './syntax.js';

/**
 * Go built-ins. Calls to these are not recorded; calls inside their
 * arguments still are.
 */
export const BUILTIN_FUNCTIONS: ReadonlySet<string> = new Set([
  'append', 'cap', 'clear', 'close', 'complex', 'copy', 'delete', 'imag', 'len',
  'make', 'max', 'min', 'new', 'panic', 'print', 'println', 'real', 'recover',
  // conversions to predeclared types look like calls
  'bool', 'byte', 'complex64', 'complex128', 'error', 'float32', 'float64',
  'int', 'int8', 'int16', 'int32', 'int64', 'rune', 'string',
  'uint', 'uint8', 'uint16', 'uint32', 'uint64', 'uintptr', 'any',
]);

export interface ResolutionResult {
  callSites: Map<FunctionId, CallSite[]>;
  warnings: AnalysisWarning[];
}

/** What classification needs to know about the function being scanned */
export interface ResolutionContext {
  registry: FunctionRegistry;
  imports: ImportTable;
  packageName: string;
}

/**
 * Resolve the call sites of every registered function. Each unit is
 * re-parsed once; a function that cannot be found again gets an empty list
 * and a warning.
 */
export function resolveCalls(registry: FunctionRegistry, units: readonly SourceUnit[]): ResolutionResult {
  const parser = createGoParser();
  const callSites = new Map<FunctionId, CallSite[]>();
  const warnings: AnalysisWarning[] = [];

  for (const unit of units) {
    const functions = registry.functionsInFile(unit.filePath);
    if (functions.length === 0) continue;

    let declarations: SyntaxNode[] = [];
    let parseFailure: string | null = null;
    try {
      declarations = functionDeclarations(parseGo(parser, unit.source).rootNode);
    } catch (err) {
      parseFailure = errorMessage(err);
    }

    const ctx: ResolutionContext = { registry, imports: unit.imports, packageName: unit.packageName };

    for (const descriptor of functions) {
      const decl = parseFailure ? undefined : findDeclaration(declarations, descriptor);
      if (!decl) {
        const reason = parseFailure ?? `no declaration at line ${descriptor.startLine}`;
        warnings.push(toWarning(new FunctionReparseError(descriptor.id, unit.filePath, reason)));
        callSites.set(descriptor.id, []);
        continue;
      }

      const body = decl.childForFieldName('body');
      callSites.set(descriptor.id, body ? extractCallSites(body, ctx) : []);
    }
  }

  return { callSites, warnings };
}

function findDeclaration(
  declarations: readonly SyntaxNode[],
  descriptor: FunctionDescriptor
): SyntaxNode | undefined {
  return declarations.find(
    (decl) => lineOf(decl) === descriptor.startLine && decl.childForFieldName('name')?.text === descriptor.name
  );
}

/**
 * Collect the call sites under `node`. Descends until it meets a call
 * expression, classifies it, and leaves the rest of that call to
 * {@link classifyCall}.
 */
export function extractCallSites(node: SyntaxNode, ctx: ResolutionContext): CallSite[] {
  const sites: CallSite[] = [];

  const visit = (current: SyntaxNode): void => {
    if (current.type === GoNodes.CALL_EXPRESSION) {
      sites.push(...classifyCall(current, ctx));
      return;
    }
    for (const child of current.namedChildren) {
      visit(child);
    }
  };

  visit(node);
  return sites;
}

/**
 * Classify one call expression. Returns a single call site, or for a
 * built-in the calls found in its arguments.
 */
export function classifyCall(call: SyntaxNode, ctx: ResolutionContext): CallSite[] {
  const functionNode = call.childForFieldName('function');
  const argumentNodes = (call.childForFieldName('arguments')?.namedChildren || []).filter(
    (c) => c.type !== GoNodes.COMMENT
  );
  const nested = argumentNodes.flatMap((arg) => extractCallSites(arg, ctx));

  const { line, invocation } = scheduling(call);
  const base = {
    line,
    expression: renderText(call),
    arguments: argumentNodes.map(renderText),
    nested,
    invocation,
  };

  if (!functionNode) {
    return [{ ...base, kind: 'external', name: base.expression, origin: 'dynamic' }];
  }
  const callee = unwrapParentheses(functionNode);

  if (callee.type === GoNodes.IDENTIFIER) {
    const name = callee.text;
    if (BUILTIN_FUNCTIONS.has(name)) {
      return nested;
    }
    return [{ ...base, ...resolveIdentifier(name, ctx) }];
  }

  if (callee.type === GoNodes.SELECTOR_EXPRESSION) {
    const operand = callee.childForFieldName('operand');
    const field = callee.childForFieldName('field');
    if (operand && field) {
      return [{ ...base, ...resolveSelector(unwrapParentheses(operand), field.text, ctx) }];
    }
  }

  if (callee.type === GoNodes.FUNC_LITERAL) {
    const body = callee.childForFieldName('body');
    const bodySites = body ? extractCallSites(body, ctx) : [];
    return [{ ...base, kind: 'literal', nested: [...bodySites, ...nested] }];
  }

  return [{ ...base, kind: 'external', name: renderText(callee), origin: 'dynamic' }];
}

type Classification =
  | { kind: 'local'; name: string; target: FunctionId }
  | { kind: 'cross-module'; name: string; target: FunctionId; alias: string; importPath: string }
  | { kind: 'method'; name: string; receiver: string }
  | { kind: 'external'; name: string; origin: 'unknown' | 'missing' | 'package'; alias?: string; importPath?: string };

function resolveIdentifier(name: string, ctx: ResolutionContext): Classification {
  const local = ctx.registry.lookup(ctx.packageName, name);
  if (local) {
    return { kind: 'local', name, target: local.id };
  }

  for (const importPath of ctx.imports.dotImports) {
    if (!ctx.registry.isProjectImport(importPath)) continue;
    const target = canonicalId(ctx.registry.packageForImport(importPath), '', name);
    if (ctx.registry.has(target)) {
      return { kind: 'cross-module', name, target, alias: '.', importPath };
    }
  }

  return { kind: 'external', name, origin: 'unknown' };
}

function resolveSelector(operand: SyntaxNode, name: string, ctx: ResolutionContext): Classification {
  const importPath =
    operand.type === GoNodes.IDENTIFIER ? ctx.imports.aliases.get(operand.text) : undefined;

  if (importPath === undefined) {
    return { kind: 'method', name, receiver: renderText(operand) };
  }

  const alias = operand.text;
  if (!ctx.registry.isProjectImport(importPath)) {
    return { kind: 'external', name, origin: 'package', alias, importPath };
  }

  const target = canonicalId(ctx.registry.packageForImport(importPath), '', name);
  if (ctx.registry.has(target)) {
    return { kind: 'cross-module', name, target, alias, importPath };
  }
  return { kind: 'external', name, origin: 'missing', alias, importPath };
}

/** Line and scheduling of a call; deferred and `go` calls take the statement's line */
function scheduling(call: SyntaxNode): { line: number; invocation: Invocation } {
  const parent = call.parent;
  if (parent?.type === GoNodes.DEFER_STATEMENT) {
    return { line: lineOf(parent), invocation: 'defer' };
  }
  if (parent?.type === GoNodes.GO_STATEMENT) {
    return { line: lineOf(parent), invocation: 'go' };
  }
  return { line: lineOf(call), invocation: 'call' };
}

/** Every call site of a list, nested ones included, in source order */
export function flattenCallSites(sites: readonly CallSite[]): CallSite[] {
  const flat: CallSite[] = [];
  const visit = (list: readonly CallSite[]): void => {
    for (const site of list) {
      flat.push(site);
      visit(site.nested);
    }
  };
  visit(sites);
  return flat;
}

/** External references made by a function, nested calls included */
export function collectExternalReferences(sites: readonly CallSite[]): ExternalReference[] {
  const refs: ExternalReference[] = [];
  for (const site of flattenCallSites(sites)) {
    if (site.kind !== 'external') continue;
    const ref: ExternalReference = { name: site.name, origin: site.origin };
    if (site.alias !== undefined) ref.alias = site.alias;
    if (site.importPath !== undefined) ref.importPath = site.importPath;
    refs.push(ref);
  }
  return refs;
}
