#!/usr/bin/env node
import { runCli } from './run.js';

void runCli(process.argv.slice(2)).then(
  result => process.exit(result.exitCode),
  (err: unknown) => {
    console.error('Unexpected error:', err);
    process.exit(1);
  },
);
