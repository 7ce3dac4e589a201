import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { delimiter, join } from 'node:path';

import { describeError } from '../errors.js';
import { appendLine } from '../utils/text.js';
import type { ToolInvocation, ToolResult, ToolRunner } from './toolTypes.js';

export interface ProcessToolRunnerOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

function resolvePathExtensions(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  if (platform !== 'win32') {
    return [''];
  }
  const raw = env.PATHEXT;
  const candidates = raw ? raw.split(';') : ['.COM', '.EXE', '.BAT', '.CMD'];
  const normalized = candidates
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => (value.startsWith('.') ? value : `.${value}`).toLowerCase());
  return ['', ...new Set(normalized)];
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const info = await stat(candidate);
    if (!info.isFile()) {
      return false;
    }
    await access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs real subprocesses. `locate` scans PATH on every call so a tool
 * installed or removed between invocations is noticed.
 */
export function createProcessToolRunner(options: ProcessToolRunnerOptions = {}): ToolRunner {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const pathExtensions = resolvePathExtensions(env, platform);

  const locate = async (command: string): Promise<string | null> => {
    if (!command) {
      return null;
    }
    if (command.includes('/')) {
      return (await isExecutableFile(command)) ? command : null;
    }
    const directories = (env.PATH ?? '').split(delimiter).filter(Boolean);
    for (const directory of directories) {
      for (const extension of pathExtensions) {
        const candidate = join(directory, `${command}${extension}`);
        if (await isExecutableFile(candidate)) {
          return candidate;
        }
      }
    }
    return null;
  };

  const run = (command: string, args: readonly string[], invocation: ToolInvocation = {}): Promise<ToolResult> =>
    new Promise((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stderrExtras = '';
      let settled = false;

      const finish = (exitCode: number | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        resolve({
          stdout: Buffer.concat(stdout),
          stderr: appendLine(Buffer.concat(stderr).toString('utf8'), stderrExtras),
          exitCode,
        });
      };

      const child = spawn(command, [...args], {
        cwd: invocation.cwd,
        env,
      });

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.stdin.on('error', (error) => {
        // Tools that never read stdin close it early; keep the note for debugging.
        stderrExtras = appendLine(stderrExtras, `stdin: ${describeError(error)}`);
      });
      child.on('error', (error) => {
        stderrExtras = appendLine(stderrExtras, `Failed to start ${command}: ${describeError(error)}`);
        finish(null);
      });
      child.on('close', (code) => finish(code));

      if (invocation.input !== undefined) {
        child.stdin.end(invocation.input);
      } else {
        child.stdin.end();
      }
    });

  return { locate, run };
}
