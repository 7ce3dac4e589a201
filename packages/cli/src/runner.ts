/**
 * CLI wiring: turns argv and the process environment into a single filter
 * run and maps the outcome onto an exit status.
 */
import chalk from 'chalk';
import {
  ScratchAreaError,
  createConsoleLogger,
  createProcessToolRunner,
  createStreamSink,
  describeError,
  loadFilterConfig,
  runFilter,
  type OutputSink,
  type ProcessLike,
  type ToolRunner,
} from '@pagerfilter/core';

import { SUPPORTS_FLAG, parseFilterArgs } from './args.js';

export const USAGE_LINES = ['No filename supplied', `Syntax: pagerfilter [${SUPPORTS_FLAG}] <filename>`];

type CliIo = {
  stdout?: OutputSink;
  stderr?: (message: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  terminalColumns?: number;
  tools?: ToolRunner;
  process?: ProcessLike;
  scratchRoot?: string;
};

type ResolvedCliIo = {
  stdout: OutputSink;
  stderr: (message: string) => void;
  env: NodeJS.ProcessEnv;
};

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = target.stdout ?? createStreamSink(process.stdout);
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr, env: target.env ?? process.env };
}

/** The pager closed its end of the pipe before reading everything. */
const isBrokenPipe = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EPIPE';

export async function runCli(argv: string[] = process.argv, io?: CliIo): Promise<number> {
  const { stdout, stderr, env } = resolveIo(io);
  const args = parseFilterArgs(argv);
  if (args.path === null) {
    for (const line of USAGE_LINES) {
      stderr(line);
    }
    return 0;
  }

  const config = loadFilterConfig({
    env,
    cwd: io?.cwd,
    platform: io?.platform,
    terminalColumns: io?.terminalColumns ?? process.stdout.columns,
  });
  const ink = new chalk.Instance({ level: config.colourLevel });
  const logger = createConsoleLogger({ debug: config.debug, write: stderr, colourLevel: config.colourLevel });
  const tools = io?.tools ?? createProcessToolRunner({ env, platform: config.platform });

  try {
    const result = await runFilter({
      mode: args.mode,
      path: args.path,
      config,
      tools,
      output: stdout,
      logger,
      process: io?.process,
      scratchRoot: io?.scratchRoot,
    });
    logger.debug(`handled by ${result.handledBy ?? 'nothing'} (exit ${result.exitCode})`);
    return result.exitCode;
  } catch (error: unknown) {
    if (isBrokenPipe(error)) {
      return 0;
    }
    if (error instanceof ScratchAreaError) {
      stderr(ink.red(error.message));
      return 1;
    }
    stderr(ink.red(`pagerfilter: ${describeError(error)}`));
    return 1;
  }
}
