import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { createRequire } from 'node:module';
import type { CallscopeConfig, EntryPointConfig, ResolvedConfig } from '../analyzer/types.js';

const CONFIG_FILENAMES = ['callscope.config.json', 'callscope.config.yaml', 'callscope.config.yml'];

const DEFAULT_INCLUDE = ['**/*.go'];

const DEFAULT_EXCLUDE = ['.git/**', 'testdata/**', '**/testdata/**'];

const DEFAULT_OUTPUT = './callgraph.dot';

/** Find the config file in the project root */
export function findConfigFile(projectRoot: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const path = resolve(projectRoot, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/** Load config from a file */
export function loadConfigFile(configPath: string): Partial<CallscopeConfig> {
  const content = readFileSync(configPath, 'utf-8');

  let raw: unknown;
  if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
    const esmRequire = createRequire(import.meta.url);
    const yaml: typeof import('js-yaml') = esmRequire('js-yaml');
    raw = yaml.load(content);
  } else {
    raw = JSON.parse(content);
  }

  return validateConfig(raw, configPath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string, source: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`Invalid config ${source}: "${field}" must be a list of strings`);
  }
  return value;
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid config ${source}: "${field}" must be a string`);
  }
  return value;
}

function entryPointList(value: unknown, source: string): EntryPointConfig[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`Invalid config ${source}: "entryPoints" must be a list`);
  }
  return value.map((entry): EntryPointConfig => {
    if (isRecord(entry) && entry.type === 'file' && typeof entry.pattern === 'string') {
      return { type: 'file', pattern: entry.pattern };
    }
    if (isRecord(entry) && entry.type === 'function' && typeof entry.name === 'string') {
      return { type: 'function', name: entry.name };
    }
    throw new Error(`Invalid config ${source}: unrecognized entry point ${JSON.stringify(entry)}`);
  });
}

/** Check the shape of a parsed config document */
export function validateConfig(raw: unknown, source: string): Partial<CallscopeConfig> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new Error(`Invalid config ${source}: expected an object`);
  }

  const config: Partial<CallscopeConfig> = {};
  const include = stringList(raw.include, 'include', source);
  if (include) config.include = include;
  const exclude = stringList(raw.exclude, 'exclude', source);
  if (exclude) config.exclude = exclude;
  const entryPoints = entryPointList(raw.entryPoints, source);
  if (entryPoints) config.entryPoints = entryPoints;

  if (raw.includeTests !== undefined) {
    if (typeof raw.includeTests !== 'boolean') {
      throw new Error(`Invalid config ${source}: "includeTests" must be a boolean`);
    }
    config.includeTests = raw.includeTests;
  }

  const vendorDir = optionalString(raw.vendorDir, 'vendorDir', source);
  if (vendorDir !== undefined) config.vendorDir = vendorDir;
  const output = optionalString(raw.output, 'output', source);
  if (output !== undefined) config.output = output;
  const json = optionalString(raw.json, 'json', source);
  if (json !== undefined) config.json = json;
  const coverage = optionalString(raw.coverage, 'coverage', source);
  if (coverage !== undefined) config.coverage = coverage;
  const modulePath = optionalString(raw.module, 'module', source);
  if (modulePath !== undefined) config.module = modulePath;

  return config;
}

/** CLI options that can override config */
export interface CliOptions {
  include?: string[];
  exclude?: string[];
  entry?: string[];
  output?: string;
  json?: string;
  coverage?: string;
  module?: string;
  vendorDir?: string;
  includeTests?: boolean;
  config?: string;
}

/** Merge CLI options with config file and defaults to produce a resolved config */
export function resolveConfig(projectRoot: string, cliOptions: CliOptions = {}): ResolvedConfig {
  const absRoot = resolve(projectRoot);

  // Load config file
  let fileConfig: Partial<CallscopeConfig> = {};
  const configPath = cliOptions.config
    ? resolve(absRoot, cliOptions.config)
    : findConfigFile(absRoot);

  if (configPath) {
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = loadConfigFile(configPath);
  }

  // Merge include patterns (CLI > file > defaults)
  const include = cliOptions.include?.length
    ? cliOptions.include
    : fileConfig.include?.length
      ? fileConfig.include
      : DEFAULT_INCLUDE;

  // Merge exclude patterns (CLI appends to defaults + file)
  const exclude = [
    ...DEFAULT_EXCLUDE,
    ...(fileConfig.exclude || []),
    ...(cliOptions.exclude || []),
  ];

  // Merge entry points; CLI entries name functions
  const entryPoints = [...(fileConfig.entryPoints || [])];
  if (cliOptions.entry) {
    for (const name of cliOptions.entry) {
      entryPoints.push({ type: 'function', name });
    }
  }

  const config: ResolvedConfig = {
    include,
    exclude: [...new Set(exclude)],
    vendorDir: cliOptions.vendorDir || fileConfig.vendorDir || 'vendor',
    includeTests: cliOptions.includeTests ?? fileConfig.includeTests ?? false,
    entryPoints,
    output: cliOptions.output || fileConfig.output || DEFAULT_OUTPUT,
    projectRoot: absRoot,
  };

  const json = cliOptions.json || fileConfig.json;
  if (json) config.json = json;
  const coverage = cliOptions.coverage || fileConfig.coverage;
  if (coverage) config.coverage = coverage;
  const modulePath = cliOptions.module || fileConfig.module;
  if (modulePath) config.module = modulePath;

  return config;
}
