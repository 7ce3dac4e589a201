/**
 * Public entry point for the pagerfilter CLI package.
 *
 * Re-exports the core library alongside the argv parser and runner so the
 * filter can be embedded in other tools.
 */
export * from '@pagerfilter/core';
export { parseFilterArgs, SUPPORTS_FLAG } from './src/args.js';
export type { FilterArgs } from './src/args.js';
export { runCli, USAGE_LINES } from './src/runner.js';
