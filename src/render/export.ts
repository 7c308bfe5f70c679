import { compareStrings } from '../analyzer/call-graph.js';
import { collectExternalReferences, flattenCallSites } from '../analyzer/go/call-resolver.js';
import type { FunctionRegistry } from '../analyzer/registry.js';
import type { CallSite, CallSiteTable, Parameter } from '../analyzer/types.js';

/** One row of the function listing */
export interface FunctionRecord {
  id: string;
  file: string;
  function: string;
  line: number;
  parameters: string[];
  returns: string[];
  externals: string[];
  calls: string[];
}

export type RecordFormat = 'table' | 'csv' | 'json';

export const RECORD_FORMATS: readonly RecordFormat[] = ['table', 'csv', 'json'];

const EMPTY_LIST = 'None';
const LIST_SEPARATOR = '; ';

const COLUMNS = ['id', 'file', 'function', 'line', 'parameters', 'returns', 'externals', 'calls'] as const;

function formatParameter(param: Parameter): string {
  return param.name ? `${param.name} ${param.type}` : param.type;
}

function callTarget(site: CallSite): string | null {
  switch (site.kind) {
    case 'local':
    case 'cross-module':
      return site.target;
    case 'method':
      return `${site.receiver}.${site.name}`;
    default:
      return null;
  }
}

/** Build one record per registered function, ordered by identity */
export function toFunctionRecords(registry: FunctionRegistry, callSites: CallSiteTable): FunctionRecord[] {
  const records: FunctionRecord[] = [];

  for (const fn of registry.values()) {
    const sites = callSites.get(fn.id) ?? [];
    const externals = collectExternalReferences(sites).map((ref) =>
      ref.importPath ? `${ref.importPath}.${ref.name}` : ref.name
    );
    const calls: string[] = [];
    for (const site of flattenCallSites(sites)) {
      const target = callTarget(site);
      if (target !== null) calls.push(target);
    }

    records.push({
      id: fn.id,
      file: fn.filePath,
      function: fn.receiver ? `${fn.receiver}.${fn.name}` : fn.name,
      line: fn.startLine,
      parameters: fn.parameters.map(formatParameter),
      returns: [...fn.returns],
      externals: [...new Set(externals)],
      calls: [...new Set(calls)],
    });
  }

  return records.sort((a, b) => compareStrings(a.id, b.id));
}

function cell(record: FunctionRecord, column: (typeof COLUMNS)[number]): string {
  const value = record[column];
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return value;
  return value.length > 0 ? value.join(LIST_SEPARATOR) : EMPTY_LIST;
}

/** Plain-text table with aligned columns */
export function formatTable(records: readonly FunctionRecord[]): string {
  const rows: string[][] = [
    COLUMNS.map((c) => c.toUpperCase()),
    ...records.map((r) => COLUMNS.map((c) => cell(r, c))),
  ];
  const widths = COLUMNS.map((_, i) => Math.max(...rows.map((row) => row[i].length)));

  return rows
    .map((row) =>
      row
        .map((value, i) => value.padEnd(widths[i]))
        .join('  ')
        .trimEnd()
    )
    .join('\n');
}

function csvEscape(str: string): string {
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** CSV with a header row; list cells are joined with `; ` */
export function toCsv(records: readonly FunctionRecord[]): string {
  const rows = [COLUMNS.join(',')];
  for (const record of records) {
    rows.push(COLUMNS.map((c) => csvEscape(cell(record, c))).join(','));
  }
  return rows.join('\n');
}

export function toJson(records: readonly FunctionRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export function formatRecords(records: readonly FunctionRecord[], format: RecordFormat): string {
  switch (format) {
    case 'csv':
      return toCsv(records);
    case 'json':
      return toJson(records);
    case 'table':
      return formatTable(records);
  }
}

function describeSite(site: CallSite): string {
  switch (site.kind) {
    case 'local':
      return `${site.target} (local)`;
    case 'cross-module':
      return `${site.target} (cross-module via ${site.importPath})`;
    case 'method':
      return `${site.receiver}.${site.name} (method)`;
    case 'external':
      return `${site.importPath ? `${site.importPath}.${site.name}` : site.name} (external, ${site.origin})`;
    case 'literal':
      return 'func literal';
  }
}

/**
 * Render call sites as an indented tree, one line per site:
 * `line: [defer |go ]target (kind)`. Nested calls are indented below.
 */
export function formatCallTree(sites: readonly CallSite[], indent = ''): string {
  const lines: string[] = [];
  for (const site of sites) {
    const prefix = site.invocation === 'call' ? '' : `${site.invocation} `;
    lines.push(`${indent}${site.line}: ${prefix}${describeSite(site)}`);
    if (site.nested.length > 0) {
      lines.push(formatCallTree(site.nested, indent + '  '));
    }
  }
  return lines.join('\n');
}
