import type { FunctionDescriptor, FunctionId } from './types.js';

/** Build the canonical identity of a function or method */
export function canonicalId(packageName: string, receiver: string, name: string): FunctionId {
  return receiver ? `${packageName}/${receiver}.${name}` : `${packageName}.${name}`;
}

/**
 * Normalize receiver type text so `*Worker`, `Worker` and `Worker[T]`
 * share one identity.
 */
export function normalizeReceiver(typeText: string): string {
  return typeText
    .replace(/[()\s]/g, '')
    .replace(/^\*+/, '')
    .replace(/\[.*\]$/, '');
}

/** Last segment of an import path, the default package alias */
export function lastPathSegment(importPath: string): string {
  const parts = importPath.split('/');
  return parts[parts.length - 1] || importPath;
}

/**
 * Pick the package an import path resolves to when its files declare more
 * than one name: the name matching the last path segment, then the first
 * name that is neither `main` nor an external `_test` package, then the
 * first name seen.
 */
export function preferredPackageName(importPath: string, names: readonly string[]): string | undefined {
  const segment = lastPathSegment(importPath);
  return (
    names.find((name) => name === segment) ??
    names.find((name) => name !== 'main' && !name.endsWith('_test')) ??
    names[0]
  );
}

/**
 * Mutable registry used while indexing. Call {@link freeze} once every file
 * has been merged; only the frozen registry is accepted by call resolution.
 */
export class RegistryBuilder {
  private readonly functions = new Map<FunctionId, FunctionDescriptor>();
  private readonly packages = new Map<string, string[]>();
  private frozen = false;

  /**
   * Register a descriptor. Returns the descriptor already holding the
   * identity when there is a collision; the new one is then dropped.
   */
  add(descriptor: FunctionDescriptor): FunctionDescriptor | null {
    this.assertOpen();
    const existing = this.functions.get(descriptor.id);
    if (existing) return existing;
    this.functions.set(descriptor.id, descriptor);
    return null;
  }

  /** Record a package name declared by a file under an import path */
  registerPackage(importPath: string, packageName: string): void {
    this.assertOpen();
    const names = this.packages.get(importPath) || [];
    if (!names.includes(packageName)) {
      names.push(packageName);
    }
    this.packages.set(importPath, names);
  }

  get size(): number {
    return this.functions.size;
  }

  freeze(modulePath: string): FunctionRegistry {
    this.assertOpen();
    this.frozen = true;
    for (const descriptor of this.functions.values()) {
      Object.freeze(descriptor.parameters);
      Object.freeze(descriptor.returns);
      Object.freeze(descriptor.unusedParameters);
      Object.freeze(descriptor);
    }
    const packages = new Map<string, string>();
    for (const [importPath, names] of this.packages) {
      const name = preferredPackageName(importPath, names);
      if (name !== undefined) packages.set(importPath, name);
    }
    return new FunctionRegistry(new Map(this.functions), packages, modulePath);
  }

  private assertOpen(): void {
    if (this.frozen) {
      throw new Error('Function registry is frozen');
    }
  }
}

/** Read-only registry of every indexed function */
export class FunctionRegistry {
  private readonly byFile = new Map<string, FunctionDescriptor[]>();

  constructor(
    private readonly functions: ReadonlyMap<FunctionId, FunctionDescriptor>,
    private readonly packages: ReadonlyMap<string, string>,
    readonly modulePath: string
  ) {
    for (const descriptor of functions.values()) {
      const list = this.byFile.get(descriptor.filePath) || [];
      list.push(descriptor);
      this.byFile.set(descriptor.filePath, list);
    }
  }

  get size(): number {
    return this.functions.size;
  }

  get(id: FunctionId): FunctionDescriptor | undefined {
    return this.functions.get(id);
  }

  has(id: FunctionId): boolean {
    return this.functions.has(id);
  }

  lookup(packageName: string, name: string, receiver = ''): FunctionDescriptor | undefined {
    return this.functions.get(canonicalId(packageName, receiver, name));
  }

  values(): FunctionDescriptor[] {
    return [...this.functions.values()];
  }

  ids(): FunctionId[] {
    return [...this.functions.keys()];
  }

  functionsInFile(filePath: string): readonly FunctionDescriptor[] {
    return this.byFile.get(filePath) || [];
  }

  /** True when the import path belongs to the analyzed module */
  isProjectImport(importPath: string): boolean {
    if (!this.modulePath) return false;
    return importPath === this.modulePath || importPath.startsWith(this.modulePath + '/');
  }

  /** Package name declared under an in-project import path */
  packageForImport(importPath: string): string {
    return this.packages.get(importPath) || lastPathSegment(importPath);
  }
}
