import type { FilterMode } from '@pagerfilter/core';

export interface FilterArgs {
  mode: FilterMode;
  /** Null when no filename was given. */
  path: string | null;
}

export const SUPPORTS_FLAG = '--supports';

/**
 * Reads `[--supports] <filename>` from a full `process.argv`. The flag is
 * only recognised in first position; anything after the filename is ignored.
 */
export function parseFilterArgs(argv: readonly string[] = process.argv): FilterArgs {
  const positional = argv.slice(2);
  let mode: FilterMode = 'render';
  if (positional[0] === SUPPORTS_FLAG) {
    mode = 'check-support';
    positional.shift();
  }
  const path = positional[0];
  return { mode, path: path ? path : null };
}
