import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { ManifestNotFoundError } from '../errors.js';

export const MANIFEST_FILENAME = 'go.mod';

export interface ModuleManifest {
  /** Absolute path of the go.mod file */
  path: string;
  /** Directory holding go.mod */
  moduleRoot: string;
  modulePath: string;
}

/** Read the module path from go.mod content, or null when there is none */
export function parseModulePath(content: string): string | null {
  const match = content.match(/^[ \t]*module[ \t]+("([^"]+)"|`([^`]+)`|(\S+))/m);
  if (!match) return null;
  return match[2] ?? match[3] ?? match[4] ?? null;
}

/**
 * Find the nearest go.mod walking upward from `startDir` and read its
 * module path.
 */
export async function findModuleManifest(startDir: string): Promise<ModuleManifest> {
  let dir = resolve(startDir);

  while (true) {
    const candidate = resolve(dir, MANIFEST_FILENAME);
    if (existsSync(candidate)) {
      const content = await readFile(candidate, 'utf-8');
      const modulePath = parseModulePath(content);
      if (!modulePath) {
        throw new ManifestNotFoundError(startDir, candidate);
      }
      return { path: candidate, moduleRoot: dir, modulePath };
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new ManifestNotFoundError(startDir);
}
