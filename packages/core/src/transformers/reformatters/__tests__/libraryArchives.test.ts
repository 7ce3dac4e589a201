import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';

import { ansi, createFakeToolRunner, createTestContext, ok, readArtifact } from '../../../__testUtils__/filterHarness.js';
import { createScratchArea, type ScratchArea } from '../../../scratch/scratchArea.js';
import { alfLibraryReformatter, arArchiveReformatter, formatArchiveReport } from '../libraryArchives.js';

describe('formatArchiveReport', () => {
  test('underlines the title and separates the sections', () => {
    expect(formatArchiveReport({ title: 'Library', files: 'a.o\n', symbols: 'main\n' })).toBe(
      'Library\n-------\n\nArchived files:\na.o\n\n\nSymbols:\nmain\n',
    );
  });
});

describe('archive reformatters', () => {
  let scratch: ScratchArea;

  beforeEach(() => {
    scratch = createScratchArea();
  });

  afterEach(() => {
    scratch.release();
  });

  test('lists ar archives on Linux without undefined symbols', async () => {
    const tools = createFakeToolRunner({
      ar: () => ok('rw-r--r-- 0/0 1234 Jan  1 00:00 2030 alpha.o\n'),
      nm: () => ok('0000000000000000 T alpha\n                 U printf\n'),
    });
    const context = createTestContext(scratch, { path: '/work/libdemo.a', tools });

    const prepared = await arArchiveReformatter.match(context);
    expect(prepared?.tool).toBe('ar');
    const outcome = await prepared?.apply();

    expect(readArtifact(outcome)).toBe(
      [
        "'ar' archive",
        '------------',
        '',
        ansi.magenta('Archived files:'),
        `rw-r--r-- 0/0 1234 Jan  1 00:00 2030 ${ansi.yellow('alpha.o')}`,
        '',
        '',
        ansi.magenta('Symbols:'),
        '0000000000000000 T alpha',
        '',
      ].join('\n'),
    );
    expect(tools.calls.map((call) => [call.command, ...call.args])).toEqual([
      ['ar', 'tOv', '/work/libdemo.a'],
      ['nm', '-g', '/work/libdemo.a'],
    ]);
    expect(outcome).toEqual({
      type: 'artifact',
      subject: { path: scratch.artifactPath('/work/libdemo.a', 'a-text'), isTemporary: true, formatHint: null },
    });
  });

  test('uses the macOS flags on darwin', async () => {
    const tools = createFakeToolRunner({ ar: () => ok(), nm: () => ok() });
    const context = createTestContext(scratch, { path: '/work/libdemo.a', tools, config: { platform: 'darwin' } });

    await (await arArchiveReformatter.match(context))?.apply();

    expect(tools.calls.map((call) => [call.command, ...call.args])).toEqual([
      ['ar', '-tLv', '/work/libdemo.a'],
      ['nm', '-gU', '/work/libdemo.a'],
    ]);
  });

  test('declines ar archives on platforms without a listing recipe', async () => {
    const tools = createFakeToolRunner({ ar: () => ok(), nm: () => ok() });
    const context = createTestContext(scratch, { path: '/work/libdemo.a', tools, config: { platform: 'win32' } });

    await expect(arArchiveReformatter.match(context)).resolves.toBeNull();
  });

  test('prefers the RISC OS librarian for ar archives when present', async () => {
    const tools = createFakeToolRunner({ 'riscos64-libfile': () => ok(), ar: () => ok() });
    const context = createTestContext(scratch, { path: '/work/libdemo.a', tools });

    await (await arArchiveReformatter.match(context))?.apply();

    expect(tools.calls.map((call) => [call.command, ...call.args])).toEqual([
      ['riscos64-libfile', '-l', '/work/libdemo.a'],
      ['riscos64-libfile', '-s', '/work/libdemo.a'],
    ]);
  });

  test('lists ALF libraries with coloured headings', async () => {
    const tools = createFakeToolRunner({
      'riscos-libfile': (args) => ok(args[0] === '-l' ? 'alpha.o\n' : 'alpha\n'),
    });
    const context = createTestContext(scratch, { path: '/work/clib', kind: 'alf', tools });

    const outcome = await (await alfLibraryReformatter.match(context))?.apply();

    expect(readArtifact(outcome)).toBe(
      [
        'RISC OS library archive',
        '-'.repeat(23),
        '',
        ansi.magenta('Archived files:'),
        'alpha.o',
        '',
        '',
        ansi.magenta('Symbols:'),
        'alpha',
        '',
      ].join('\n'),
    );
  });
});
