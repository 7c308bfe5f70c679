#!/usr/bin/env node
import { createCli } from '../src/cli/index.js';

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
