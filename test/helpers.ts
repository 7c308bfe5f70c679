import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';

export const GO_BASIC_FIXTURE = resolve(__dirname, 'fixtures/go-basic');

/** Write a throwaway Go module and return its root */
export function createGoModule(files: Record<string, string>, modulePath = 'example.com/tmp'): string {
  const root = mkdtempSync(join(tmpdir(), 'callscope-'));
  writeFileSync(join(root, 'go.mod'), `module ${modulePath}\n\ngo 1.21\n`);
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
}
