import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import {
  ansi,
  createBufferSink,
  createFakeProcess,
  createFakeToolRunner,
  createTempDir,
  describesAs,
  ok,
  staticLexers,
  testConfig,
  type FakeTool,
} from '../../__testUtils__/filterHarness.js';
import { ScratchAreaError } from '../../errors.js';
import type { LexerCatalogEntry } from '../../lexers/lexerTypes.js';
import type { OutputSink } from '../output.js';
import { runFilter, type RunFilterOptions } from '../runFilter.js';

const CATALOG: LexerCatalogEntry[] = [
  { lexer: 'groff', patterns: ['*.[1-9]'] },
  { lexer: 'bash', patterns: ['*.sh'] },
  { lexer: 'json', patterns: ['*.json'] },
  { lexer: 'bbcbasic', patterns: ['*.bas'] },
];

describe('runFilter', () => {
  let files: ReturnType<typeof createTempDir>;
  let scratchRoot: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    files = createTempDir('input');
    scratchRoot = createTempDir('scratch-root');
  });

  afterEach(() => {
    files.remove();
    scratchRoot.remove();
  });

  const fixture = (name: string, content: string): string => {
    const path = join(files.path, name);
    writeFileSync(path, content);
    return path;
  };

  const run = async (path: string, tools: Record<string, FakeTool>, overrides: Partial<RunFilterOptions> = {}) => {
    const output = createBufferSink();
    const runner = createFakeToolRunner(tools);
    const proc = createFakeProcess();
    const result = await runFilter({
      mode: 'render',
      path,
      config: testConfig({ columns: 40 }),
      tools: runner,
      output,
      lexers: staticLexers(CATALOG),
      scratchRoot: scratchRoot.path,
      process: proc,
      ...overrides,
    });
    return { result, output: output.text(), tools: runner, proc };
  };

  test('pretty-prints JSON with jq and cleans up the scratch area', async () => {
    const path = fixture('data.json', '{"a":1}');

    const { result, output, proc } = await run(path, {
      file: describesAs('JSON text data'),
      jq: () => ok('{\n  "a": 1\n}\n'),
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'jq', reformattedBy: [] });
    expect(output).toBe('{\n  "a": 1\n}\n');
    expect(readdirSync(scratchRoot.path)).toEqual([]);
    expect(proc.listenerCount('SIGINT')).toBe(0);
    expect(proc.listenerCount('exit')).toBe(0);
  });

  test('highlights JSON with pygmentize when jq is missing', async () => {
    const path = fixture('data.json', '{"a":1}');

    const { result, tools } = await run(path, {
      file: describesAs('JSON text data'),
      pygmentize: () => ok('highlighted\n'),
    });

    expect(result.handledBy).toBe('pygments');
    expect(tools.callsTo('pygmentize')[0]?.args).toEqual(['-f', 'terminal', '-O', 'style=rrt', '-l', 'json', path]);
  });

  test('disassembles AArch64 executables found by content', async () => {
    const path = fixture('hello', '\u007fELF');

    const { result, output } = await run(path, {
      file: describesAs('ELF 64-bit LSB executable, ARM aarch64, version 1 (SYSV), statically linked'),
      'aarch64-unknown-linux-gnu-objdump': () => ok('Disassembly of section .text:\n'),
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'objdump', reformattedBy: [] });
    expect(output).toBe(`${ansi.green('Disassembly of section .text:')}\n`);
  });

  test('re-wraps markdown and emits it when nothing else applies', async () => {
    const path = fixture('guide.md', '# Guide\n\nSome words\nhere\n```\nx [^1]\n```\n');

    const { result, output } = await run(path, { file: describesAs('ASCII text') });

    expect(result).toEqual({ exitCode: 0, handledBy: 'markdown', reformattedBy: ['markdown'] });
    expect(output).toBe(
      [ansi.boldBlue('# Guide'), '', 'Some words here', '```', ansi.yellow('x [^1]'), '```', ''].join('\n'),
    );
  });

  test('detokenises BASIC and highlights the listing as BASIC', async () => {
    const path = fixture('prog,ffb', '\r\u0000\u000a');

    const { result, output, tools } = await run(path, {
      file: describesAs('data'),
      bastotxt: (args) => {
        writeFileSync(args[3], '10 PRINT "HI"\n');
        return ok();
      },
      pygmentize: () => ok('HIGHLIGHTED\n'),
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'pygments', reformattedBy: ['basic-detokenise'] });
    expect(output).toBe('HIGHLIGHTED\n');
    expect(tools.callsTo('pygmentize')[0]?.args).toEqual([
      '-f',
      'terminal256',
      '-O',
      'style=rrt',
      '-l',
      'bbcbasic',
      expect.stringMatching(/\/prog,ffb:formatted:\.bbc$/),
    ]);
  });

  test('renders what a support check promised when the detokeniser writes nothing', async () => {
    const path = fixture('prog,ffb', '\r\u0000\u000a');
    const tools = { file: describesAs('data'), bastotxt: () => ok() };

    const checked = await run(path, tools, { mode: 'check-support' });
    const rendered = await run(path, tools);

    expect([checked.result.exitCode, rendered.result.exitCode]).toEqual([0, 0]);
    expect(rendered.result).toEqual({ exitCode: 0, handledBy: 'basic-detokenise', reformattedBy: ['basic-detokenise'] });
    expect(rendered.output).toBe('');
  });

  test('uses the inferred kind for names ending in a version number', async () => {
    const path = fixture('wrapper-2.1.7', '#!/bin/sh\nexec true\n');

    const { tools } = await run(path, {
      file: describesAs('POSIX shell script, ASCII text executable'),
      pygmentize: () => ok('highlighted\n'),
    });

    expect(tools.callsTo('pygmentize')[0]?.args?.slice(4)).toEqual(['-l', 'bash', path]);
  });

  test('reports unsupported files with exit code 1 and no output', async () => {
    const path = fixture('blob.bin', '\u0000\u0001');

    const { result, output } = await run(path, { file: describesAs('data') });

    expect(result).toEqual({ exitCode: 1, handledBy: null, reformattedBy: [] });
    expect(output).toBe('');
    expect(readdirSync(scratchRoot.path)).toEqual([]);
  });

  test('checks support without running the renderer', async () => {
    const path = fixture('data.json', '{}');

    const { result, output, tools } = await run(
      path,
      { file: describesAs('JSON text data'), jq: () => ok('unused') },
      { mode: 'check-support' },
    );

    expect(result.exitCode).toBe(0);
    expect(output).toBe('');
    expect(tools.callsTo('jq')).toEqual([]);
  });

  test('releases the scratch area when writing the output fails', async () => {
    const path = fixture('data.json', '{}');
    const failingOutput: OutputSink = {
      write: async () => {
        throw new Error('write EPIPE');
      },
    };

    await expect(
      run(path, { file: describesAs('JSON text data'), jq: () => ok('{}\n') }, { output: failingOutput }),
    ).rejects.toThrow('write EPIPE');
    expect(readdirSync(scratchRoot.path)).toEqual([]);
  });

  test('rejects unreadable input after releasing the scratch area', async () => {
    await expect(run(join(files.path, 'missing.json'), { file: describesAs('data') })).rejects.toThrow(/ENOENT/);
    expect(readdirSync(scratchRoot.path)).toEqual([]);
  });

  test('fails with a ScratchAreaError when the scratch root is missing', async () => {
    const path = fixture('data.json', '{}');

    await expect(run(path, {}, { scratchRoot: join(scratchRoot.path, 'absent') })).rejects.toBeInstanceOf(
      ScratchAreaError,
    );
  });
});
