import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findModuleManifest, parseModulePath } from '../../src/analyzer/go/manifest.js';
import { ManifestNotFoundError } from '../../src/analyzer/errors.js';

describe('parseModulePath', () => {
  it('should read a bare module path', () => {
    expect(parseModulePath('module example.com/shop\n\ngo 1.21\n')).toBe('example.com/shop');
  });

  it('should read quoted module paths', () => {
    expect(parseModulePath('module "example.com/quoted"\n')).toBe('example.com/quoted');
    expect(parseModulePath('module `example.com/raw`\n')).toBe('example.com/raw');
  });

  it('should skip comments before the module line', () => {
    expect(parseModulePath('// Deprecated: use v2\nmodule example.com/old\n')).toBe('example.com/old');
  });

  it('should return null without a module line', () => {
    expect(parseModulePath('go 1.21\n')).toBeNull();
    expect(parseModulePath('module\ngo 1.21\n')).toBeNull();
  });
});

describe('findModuleManifest', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it('should walk upward to the nearest go.mod', async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'callscope-manifest-'));
    writeFileSync(join(tempDir, 'go.mod'), 'module example.com/walk\n');
    const nested = join(tempDir, 'cmd', 'server');
    mkdirSync(nested, { recursive: true });

    const manifest = await findModuleManifest(nested);
    expect(manifest.modulePath).toBe('example.com/walk');
    expect(manifest.moduleRoot).toBe(tempDir);
    expect(manifest.path).toBe(join(tempDir, 'go.mod'));
  });

  it('should reject a go.mod without a module line', async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'callscope-manifest-'));
    writeFileSync(join(tempDir, 'go.mod'), 'go 1.21\n');

    await expect(findModuleManifest(tempDir)).rejects.toBeInstanceOf(ManifestNotFoundError);
    await expect(findModuleManifest(tempDir)).rejects.toThrow(
      `No module declaration in ${join(tempDir, 'go.mod')}`
    );
  });
});
