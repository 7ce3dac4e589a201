#!/usr/bin/env node
/**
 * Executable wrapper; the exit status carries the filter's verdict.
 */
import { runCli } from '../src/runner.js';

process.stdout.on('error', (error: NodeJS.ErrnoException) => {
  // The pager quit before reading everything.
  if (error.code === 'EPIPE') {
    process.exit(0);
  }
  console.error(error.message);
  process.exit(1);
});

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
