import { EventEmitter } from 'node:events';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { jest } from '@jest/globals';

import { createPalette } from '../colour/palette.js';
import { loadFilterConfig, type FilterConfig } from '../config/filterConfig.js';
import type { InferredKind } from '../identify/kinds.js';
import { findLexer } from '../lexers/lexerCatalog.js';
import type { LexerCatalogEntry, LexerResolver } from '../lexers/lexerTypes.js';
import type { OutputSink } from '../pipeline/output.js';
import { subjectFromPath, type SubjectFile } from '../pipeline/subject.js';
import type { TransformContext, TransformOutcome } from '../pipeline/transformerTypes.js';
import type { ProcessLike, ScratchArea } from '../scratch/scratchArea.js';
import type { ToolInvocation, ToolResult, ToolRunner } from '../tools/toolTypes.js';
import type { FilterLogger } from '../utils/logger.js';

export type FakeTool = (args: readonly string[], invocation: ToolInvocation) => ToolResult | Promise<ToolResult>;

export interface ToolCall {
  command: string;
  args: string[];
  input: string | undefined;
}

export interface FakeToolRunner extends ToolRunner {
  calls: ToolCall[];
  callsTo(command: string): ToolCall[];
}

export const ok = (stdout: string | Uint8Array = ''): ToolResult => ({
  stdout: typeof stdout === 'string' ? Buffer.from(stdout, 'utf8') : Buffer.from(stdout),
  stderr: '',
  exitCode: 0,
});

export const failed = (stderr: string, exitCode = 1): ToolResult => ({ stdout: Buffer.alloc(0), stderr, exitCode });

/** A `file` stand-in that always reports the same description. */
export const describesAs =
  (description: string): FakeTool =>
  () =>
    ok(`/dev/stdin: ${description}\n`);

const inputText = (input: string | Uint8Array | undefined): string | undefined => {
  if (input === undefined) {
    return undefined;
  }
  return typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
};

/** In-process tool runner: only the named tools exist, each answered by its handler. */
export function createFakeToolRunner(tools: Record<string, FakeTool> = {}): FakeToolRunner {
  const handlers = new Map(Object.entries(tools));
  const calls: ToolCall[] = [];
  return {
    calls,
    callsTo: (command) => calls.filter((call) => call.command === command),
    async locate(command) {
      return handlers.has(command) ? `/fake/bin/${command}` : null;
    },
    async run(command, args, invocation = {}) {
      calls.push({ command, args: [...args], input: inputText(invocation.input) });
      const handler = handlers.get(command);
      if (!handler) {
        return { stdout: Buffer.alloc(0), stderr: `Failed to start ${command}: not found`, exitCode: null };
      }
      return handler(args, invocation);
    },
  };
}

export interface BufferSink extends OutputSink {
  text(): string;
  bytes(): number[];
}

export function createBufferSink(): BufferSink {
  const parts: Buffer[] = [];
  return {
    async write(chunk) {
      parts.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    },
    text: () => Buffer.concat(parts).toString('utf8'),
    bytes: () => [...Buffer.concat(parts)],
  };
}

export function createTempDir(label = 'test'): { path: string; remove(): void } {
  const path = mkdtempSync(join(tmpdir(), `pagerfilter-${label}-`));
  return { path, remove: () => rmSync(path, { recursive: true, force: true }) };
}

export function testConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  const base = loadFilterConfig({
    env: { TERM: 'xterm', HOME: '/home/tester' },
    platform: 'linux',
    cwd: '/work',
    terminalColumns: 80,
  });
  return { ...base, ...overrides };
}

const messageRecorder = () => jest.fn<(message: string) => void>();
type MessageRecorder = ReturnType<typeof messageRecorder>;

export function createRecordingLogger(): FilterLogger & { debug: MessageRecorder; warn: MessageRecorder } {
  return { debug: messageRecorder(), warn: messageRecorder() };
}

/** Resolver backed by an in-memory catalog. */
export function staticLexers(entries: LexerCatalogEntry[], version: string | null = '2.17.2'): LexerResolver {
  return {
    engineVersion: async () => version,
    lexerFor: async (name) => (version ? findLexer(entries, name) : null),
  };
}

export function createFakeProcess() {
  const exit = jest.fn<(code?: number) => void>();
  const proc: ProcessLike & EventEmitter & { exit: typeof exit } = Object.assign(new EventEmitter(), { exit });
  return proc;
}

export interface ContextOptions {
  subject?: SubjectFile;
  path?: string;
  kind?: InferredKind | null;
  config?: Partial<FilterConfig>;
  tools?: ToolRunner;
  lexers?: LexerResolver;
  logger?: FilterLogger;
}

export function createTestContext(scratch: ScratchArea, options: ContextOptions = {}): TransformContext {
  const config = testConfig(options.config);
  return {
    subject: options.subject ?? subjectFromPath(options.path ?? '/work/input'),
    kind: options.kind ?? null,
    config,
    tools: options.tools ?? createFakeToolRunner(),
    scratch,
    palette: createPalette(config.colourLevel),
    logger: options.logger ?? createRecordingLogger(),
    lexers: options.lexers ?? staticLexers([]),
  };
}

export function readArtifact(outcome: TransformOutcome | undefined): string {
  if (outcome?.type !== 'artifact') {
    throw new Error(`expected an artifact, got ${outcome?.type ?? 'nothing'}`);
  }
  return readFileSync(outcome.subject.path, 'utf8');
}

/** Text of an output outcome, whichever form the transform produced it in. */
export function renderedText(outcome: TransformOutcome | undefined): string {
  if (outcome?.type !== 'output') {
    throw new Error(`expected output, got ${outcome?.type ?? 'nothing'}`);
  }
  const { content } = outcome;
  if (typeof content === 'string') {
    return content;
  }
  if (content instanceof Uint8Array) {
    return Buffer.from(content).toString('utf8');
  }
  return content.map((line) => `${line}\n`).join('');
}

// Escape sequences as produced at colour level 1.
const wrap = (open: string, close: string) => (text: string) => `\u001b[${open}m${text}\u001b[${close}m`;
export const ansi = {
  red: wrap('31', '39'),
  green: wrap('32', '39'),
  yellow: wrap('33', '39'),
  magenta: wrap('35', '39'),
  cyan: wrap('36', '39'),
  white: wrap('37', '39'),
  gray: wrap('90', '39'),
  boldBlue: (text: string) => `\u001b[1m\u001b[34m${text}\u001b[39m\u001b[22m`,
};
