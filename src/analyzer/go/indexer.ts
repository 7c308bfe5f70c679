import { readFile, stat } from 'node:fs/promises';
import { resolve, relative, dirname, sep } from 'node:path';
import { glob } from 'glob';
import type Parser from 'tree-sitter';
import { mapWithConcurrency } from '../concurrency.js';
import { FileParseError, RootAccessError, errorMessage, toWarning } from '../errors.js';
import { RegistryBuilder, canonicalId, normalizeReceiver, type FunctionRegistry } from '../registry.js';
import type {
  AnalysisWarning,
  FunctionDescriptor,
  ImportTable,
  Parameter,
  ProjectInfo,
  SourceUnit,
} from '../types.js';
import { buildImportTable } from './imports.js';
import { findModuleManifest } from './manifest.js';
import {
  GoNodes,
  createGoParser,
  endLineOf,
  findSyntaxError,
  functionDeclarations,
  lineOf,
  parseGo,
  renderText,
  walkTree,
  type SyntaxNode,
} from './syntax.js';

export interface IndexOptions {
  include?: string[];
  exclude?: string[];
  vendorDir?: string;
  includeTests?: boolean;
  /** Module path to use instead of reading go.mod */
  modulePath?: string;
  /** Files read at once */
  concurrency?: number;
}

export interface IndexResult {
  project: ProjectInfo;
  registry: FunctionRegistry;
  units: SourceUnit[];
  warnings: AnalysisWarning[];
  files: number;
}

/** What one file contributes before it is merged into the registry */
export interface ParsedFile {
  packageName: string;
  imports: ImportTable;
  functions: FunctionDescriptor[];
}

const DEFAULT_INCLUDE = ['**/*.go'];

/** Default number of source files read at once */
export const READ_CONCURRENCY = 64;

/**
 * Index every Go file under `root` into a frozen function registry.
 *
 * Files are read by a fixed pool of workers and merged in sorted path order,
 * so the first-seen declaration of a duplicated identity is stable across runs.
 */
export async function indexProject(root: string, options: IndexOptions = {}): Promise<IndexResult> {
  const absRoot = resolve(root);
  await assertDirectory(absRoot);

  const project = await resolveProject(absRoot, options.modulePath);
  const files = await listSourceFiles(absRoot, options);

  const loaded = await mapWithConcurrency(
    files,
    options.concurrency ?? READ_CONCURRENCY,
    async (filePath) => {
      const absolutePath = resolve(absRoot, filePath);
      try {
        const source = await readFile(absolutePath, 'utf-8');
        return { filePath, absolutePath, source };
      } catch (err) {
        const warning: AnalysisWarning = {
          code: 'FILE_READ',
          message: `Failed to read ${filePath}: ${errorMessage(err)}`,
          filePath,
        };
        return warning;
      }
    }
  );

  const parser = createGoParser();
  const builder = new RegistryBuilder();
  const units: SourceUnit[] = [];
  const warnings: AnalysisWarning[] = [];

  for (const file of loaded) {
    if ('code' in file) {
      warnings.push(file);
      continue;
    }

    let parsed: ParsedFile;
    try {
      parsed = parseSourceFile(parser, file.source, file.filePath);
    } catch (err) {
      if (err instanceof FileParseError) {
        warnings.push(toWarning(err));
        continue;
      }
      throw err;
    }

    const importPath = packageImportPath(project, file.absolutePath);
    builder.registerPackage(importPath, parsed.packageName);

    for (const descriptor of parsed.functions) {
      const existing = builder.add(descriptor);
      if (existing) {
        warnings.push({
          code: 'DUPLICATE_FUNCTION',
          message:
            `${descriptor.id} at ${descriptor.filePath}:${descriptor.startLine} ` +
            `already declared at ${existing.filePath}:${existing.startLine}; skipped`,
          filePath: descriptor.filePath,
          line: descriptor.startLine,
        });
      }
    }

    units.push({
      filePath: file.filePath,
      absolutePath: file.absolutePath,
      packageName: parsed.packageName,
      importPath,
      imports: parsed.imports,
      source: file.source,
    });
  }

  return {
    project,
    registry: builder.freeze(project.modulePath),
    units,
    warnings,
    files: files.length,
  };
}

/** Parse one file and describe its functions. Throws FileParseError. */
export function parseSourceFile(parser: Parser, source: string, filePath: string): ParsedFile {
  let tree: Parser.Tree;
  try {
    tree = parseGo(parser, source);
  } catch (err) {
    throw new FileParseError(filePath, errorMessage(err));
  }
  const root = tree.rootNode;

  const syntaxError = findSyntaxError(root);
  if (syntaxError) {
    throw new FileParseError(filePath, `syntax error at line ${lineOf(syntaxError)}`, lineOf(syntaxError));
  }

  const packageName = readPackageName(root);
  if (!packageName) {
    throw new FileParseError(filePath, 'missing package clause');
  }

  const functions = functionDeclarations(root).map((decl) =>
    describeFunction(decl, packageName, filePath)
  );

  return {
    packageName,
    imports: buildImportTable(root, filePath),
    functions,
  };
}

/** List Go sources relative to the root, sorted, with vendor and test files left out */
export async function listSourceFiles(root: string, options: IndexOptions = {}): Promise<string[]> {
  const vendorDir = options.vendorDir ?? 'vendor';
  const ignore = [...(options.exclude || []), `${vendorDir}/**`, `**/${vendorDir}/**`];
  if (!options.includeTests) {
    ignore.push('**/*_test.go');
  }

  const included: string[] = [];
  for (const pattern of options.include?.length ? options.include : DEFAULT_INCLUDE) {
    const matches = await glob(pattern, {
      cwd: root,
      absolute: false,
      ignore,
      nodir: true,
      posix: true,
    });
    included.push(...matches);
  }

  return [...new Set(included)].filter((f) => f.endsWith('.go')).sort();
}

async function assertDirectory(root: string): Promise<void> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new RootAccessError(root, 'not a directory');
    }
  } catch (err) {
    if (err instanceof RootAccessError) throw err;
    throw new RootAccessError(root, errorMessage(err));
  }
}

async function resolveProject(root: string, modulePath?: string): Promise<ProjectInfo> {
  if (modulePath) {
    return { root, moduleRoot: root, modulePath };
  }
  const manifest = await findModuleManifest(root);
  return { root, moduleRoot: manifest.moduleRoot, modulePath: manifest.modulePath };
}

/** Import path of the package a file belongs to */
export function packageImportPath(project: ProjectInfo, absolutePath: string): string {
  const dir = relative(project.moduleRoot, dirname(absolutePath)).split(sep).join('/');
  return dir ? `${project.modulePath}/${dir}` : project.modulePath;
}

function readPackageName(root: SyntaxNode): string | null {
  const clause = root.children.find((c) => c.type === GoNodes.PACKAGE_CLAUSE);
  const ident = clause?.children.find((c) => c.type === GoNodes.PACKAGE_IDENTIFIER);
  return ident ? ident.text : null;
}

function describeFunction(decl: SyntaxNode, packageName: string, filePath: string): FunctionDescriptor {
  const nameNode = decl.childForFieldName('name');
  if (!nameNode) {
    throw new FileParseError(filePath, 'function declaration without a name', lineOf(decl));
  }
  const name = nameNode.text;

  const receiver =
    decl.type === GoNodes.METHOD_DECLARATION ? receiverType(decl.childForFieldName('receiver')) : '';

  const body = decl.childForFieldName('body');
  const parameters = extractParameters(decl.childForFieldName('parameters'), body);

  return {
    id: canonicalId(packageName, receiver, name),
    packageName,
    receiver,
    name,
    filePath,
    startLine: lineOf(decl),
    endLine: endLineOf(decl),
    parameters,
    returns: extractReturns(decl.childForFieldName('result')),
    unusedParameters: parameters.filter((p) => !p.isUsed).map((p) => p.name),
    kind: receiver ? 'method' : 'function',
    visibility: /^\p{Lu}/u.test(name) ? 'exported' : 'unexported',
    doc: docComment(decl),
  };
}

function receiverType(receiverList: SyntaxNode | null): string {
  const decl = receiverList?.namedChildren.find((c) => c.type === GoNodes.PARAMETER_DECLARATION);
  const type = decl?.childForFieldName('type');
  return type ? normalizeReceiver(type.text) : '';
}

function isParameterNode(node: SyntaxNode): boolean {
  return (
    node.type === GoNodes.PARAMETER_DECLARATION ||
    node.type === GoNodes.VARIADIC_PARAMETER_DECLARATION
  );
}

function parameterType(decl: SyntaxNode): string {
  const type = decl.childForFieldName('type');
  const text = type ? renderText(type) : '';
  return decl.type === GoNodes.VARIADIC_PARAMETER_DECLARATION ? `...${text}` : text;
}

/** Names declared by one parameter declaration; types are never plain identifiers */
function parameterNames(decl: SyntaxNode): string[] {
  return decl.namedChildren.filter((c) => c.type === GoNodes.IDENTIFIER).map((c) => c.text);
}

function extractParameters(list: SyntaxNode | null, body: SyntaxNode | null): Parameter[] {
  if (!list) return [];

  const referenced = new Set<string>();
  if (body) {
    walkTree(body, (node) => {
      if (node.type === GoNodes.IDENTIFIER) referenced.add(node.text);
    });
  }

  const params: Parameter[] = [];
  for (const decl of list.namedChildren.filter(isParameterNode)) {
    const type = parameterType(decl);
    const names = parameterNames(decl);
    for (const name of names.length > 0 ? names : ['']) {
      params.push({
        name,
        type,
        isUsed: !body || name === '' || name === '_' || referenced.has(name),
        position: params.length,
      });
    }
  }
  return params;
}

function extractReturns(result: SyntaxNode | null): string[] {
  if (!result) return [];
  if (result.type !== GoNodes.PARAMETER_LIST) return [renderText(result)];

  const returns: string[] = [];
  for (const decl of result.namedChildren.filter(isParameterNode)) {
    const type = parameterType(decl);
    const count = Math.max(1, parameterNames(decl).length);
    for (let i = 0; i < count; i++) returns.push(type);
  }
  return returns;
}

/** The `//` comment block directly above a declaration */
function docComment(decl: SyntaxNode): string | undefined {
  const lines: string[] = [];
  let expectedRow = decl.startPosition.row - 1;
  let prev = decl.previousSibling;

  while (
    prev &&
    prev.type === GoNodes.COMMENT &&
    prev.text.startsWith('//') &&
    prev.endPosition.row === expectedRow
  ) {
    lines.unshift(prev.text.replace(/^\/\/ ?/, ''));
    expectedRow = prev.startPosition.row - 1;
    prev = prev.previousSibling;
  }

  return lines.length > 0 ? lines.join('\n') : undefined;
}
