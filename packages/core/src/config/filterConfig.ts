import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

import { colourLevelForTerm, type ColourLevel } from '../colour/palette.js';
import { CACHE_DIRECTORY_NAME, DEFAULT_COLUMNS, DEFAULT_PYGMENTS_STYLE } from '../constants.js';

const optionalSetting = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const FilterEnvSchema = z.object({
  TERM: optionalSetting,
  XDG_CACHE_HOME: optionalSetting,
  HOME: optionalSetting,
  COLUMNS: optionalSetting,
  PAGERFILTER_DEBUG: optionalSetting,
  PAGERFILTER_STYLE: optionalSetting,
});

export type FilterEnv = z.infer<typeof FilterEnvSchema>;

const ColumnsSchema = z.coerce.number().int().positive();

export interface FilterConfig {
  readonly term: string | undefined;
  readonly colourLevel: ColourLevel;
  readonly cacheDir: string;
  readonly homeDir: string;
  /** Wrap width for reflowed prose. */
  readonly columns: number;
  readonly debug: boolean;
  readonly pygmentsStyle: string;
  readonly platform: NodeJS.Platform;
  readonly cwd: string;
}

export interface LoadFilterConfigOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  cwd?: string;
  /** Column count reported by the output terminal, if any. */
  terminalColumns?: number;
}

const isTruthy = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());

function resolveColumns(raw: string | undefined, terminalColumns: number | undefined): number {
  const fromEnv = ColumnsSchema.safeParse(raw);
  if (raw !== undefined && fromEnv.success) {
    return fromEnv.data;
  }
  const fromTerminal = ColumnsSchema.safeParse(terminalColumns);
  return terminalColumns !== undefined && fromTerminal.success ? fromTerminal.data : DEFAULT_COLUMNS;
}

export function loadFilterConfig(options: LoadFilterConfigOptions = {}): FilterConfig {
  const env = FilterEnvSchema.parse(options.env ?? process.env);
  const homeDir = env.HOME ?? homedir();
  const cacheRoot = env.XDG_CACHE_HOME ?? join(homeDir, '.cache');

  return Object.freeze({
    term: env.TERM,
    colourLevel: colourLevelForTerm(env.TERM),
    cacheDir: join(cacheRoot, CACHE_DIRECTORY_NAME),
    homeDir,
    columns: resolveColumns(env.COLUMNS, options.terminalColumns),
    debug: isTruthy(env.PAGERFILTER_DEBUG),
    pygmentsStyle: env.PAGERFILTER_STYLE ?? DEFAULT_PYGMENTS_STYLE,
    platform: options.platform ?? process.platform,
    cwd: options.cwd ?? process.cwd(),
  });
}
