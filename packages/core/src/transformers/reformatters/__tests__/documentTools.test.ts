import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import {
  ansi,
  createFakeToolRunner,
  createTempDir,
  createTestContext,
  failed,
  ok,
  readArtifact,
  renderedText,
} from '../../../__testUtils__/filterHarness.js';
import { createPalette } from '../../../colour/palette.js';
import { applySubstitutions } from '../../../colour/substitution.js';
import { createScratchArea, type ScratchArea } from '../../../scratch/scratchArea.js';
import { armDissReformatter, armDumpiReformatter } from '../armCode.js';
import { junitXmlReformatter } from '../junitXml.js';
import { machoRules } from '../macho.js';
import { markdownReformatter } from '../markdown.js';
import { plistReformatter, showEscapes } from '../plist.js';
import { riscosDumpReformatter } from '../riscosDump.js';
import { xmlLintReformatter } from '../xmlLint.js';

describe('document reformatters', () => {
  let temp: ReturnType<typeof createTempDir>;
  let scratch: ScratchArea;

  beforeEach(() => {
    temp = createTempDir('documents');
    scratch = createScratchArea();
  });

  afterEach(() => {
    scratch.release();
    temp.remove();
  });

  test('summarises JUnit reports that declare a test suite early on', async () => {
    const report = join(temp.path, 'report.xml');
    writeFileSync(report, '<?xml version="1.0"?>\n<testsuite name="unit">\n</testsuite>\n');
    const tools = createFakeToolRunner({ junitxml: () => ok('2 tests, 0 failures\n') });
    const context = createTestContext(scratch, { path: report, tools });

    const outcome = await (await junitXmlReformatter.match(context))?.apply();

    expect(readArtifact(outcome)).toBe('2 tests, 0 failures\n');
    expect(tools.callsTo('junitxml')[0]?.args).toEqual(['--show', '--summarise', report]);
  });

  test('leaves other XML to later reformatters', async () => {
    const document = join(temp.path, 'pom.xml');
    writeFileSync(document, '<project>\n</project>\n');
    const tools = createFakeToolRunner({ junitxml: () => ok() });

    await expect(junitXmlReformatter.match(createTestContext(scratch, { path: document, tools }))).resolves.toBeNull();
  });

  test('pretty-prints well-formed XML and SVG', async () => {
    const tools = createFakeToolRunner({
      xmllint: (args) => ok(args.includes('--format') ? '<svg>\n  <g/>\n</svg>\n' : ''),
    });
    const context = createTestContext(scratch, { path: '/work/logo.svg', tools });

    const outcome = await (await xmlLintReformatter.match(context))?.apply();

    expect(readArtifact(outcome)).toBe('<svg>\n  <g/>\n</svg>\n');
    expect(outcome?.type === 'artifact' && outcome.subject.path).toBe(scratch.artifactPath('/work/logo.svg', 'svg'));
  });

  test('skips XML that xmllint rejects', async () => {
    const tools = createFakeToolRunner({ xmllint: () => failed('parser error') });

    await expect(
      xmlLintReformatter.match(createTestContext(scratch, { path: '/work/broken.xml', tools })),
    ).resolves.toBeNull();
  });

  test('shows escape bytes in property lists', async () => {
    expect(showEscapes('a\u001bb')).toBe('a<ESC>b');

    const tools = createFakeToolRunner({ plutil: () => ok('{\n  "Title" => "\u001b[1m"\n}\n') });
    const context = createTestContext(scratch, { path: '/work/Info', kind: 'plist', tools });

    expect(readArtifact(await (await plistReformatter.match(context))?.apply())).toBe(
      '{\n  "Title" => "<ESC>[1m"\n}\n',
    );
  });

  test('re-wraps and colours markdown', async () => {
    const notes = join(temp.path, 'notes.md');
    writeFileSync(notes, '# Title\n\nalpha\nbeta\n');
    const context = createTestContext(scratch, { path: notes, config: { columns: 40 } });

    const prepared = await markdownReformatter.match(context);

    expect(prepared?.tool).toBeNull();
    expect(readArtifact(await prepared?.apply())).toBe(`${ansi.boldBlue('# Title')}\n\nalpha beta\n`);
  });

  test('lists ARM code with the colour depth of the terminal', async () => {
    const tools = createFakeToolRunner({ 'riscos-dumpi': () => ok('listing\n') });
    const context = createTestContext(scratch, { path: '/work/prog,ffa', tools, config: { colourLevel: 2 } });

    expect(renderedText(await (await armDumpiReformatter.match(context))?.apply())).toBe('listing\n');
    expect(tools.callsTo('riscos-dumpi')[0]?.args).toEqual(['--colour-8bit', '/work/prog,ffa']);
  });

  test('disassembles ARM code into an artifact when only armdiss exists', async () => {
    const tools = createFakeToolRunner({ armdiss: () => ok('MOV r0, #1\n') });
    const context = createTestContext(scratch, { path: '/work/boot', kind: 'arm', tools });

    await expect(armDumpiReformatter.match(context)).resolves.toBeNull();
    expect(readArtifact(await (await armDissReformatter.match(context))?.apply())).toBe('MOV r0, #1\n');
  });

  test('hex dumps RISC OS data files', async () => {
    const tools = createFakeToolRunner({ 'riscos-dump': () => ok('00000000 : 01 02\n') });
    const context = createTestContext(scratch, { path: '/work/blob,ffd', tools });

    expect(readArtifact(await (await riscosDumpReformatter.match(context))?.apply())).toBe('00000000 : 01 02\n');
  });
});

describe('machoRules', () => {
  test('colours the text section', () => {
    const listing = '(__TEXT,__text) section\n0000000100003f80\tpushq\t%rbp\n';

    expect(applySubstitutions(listing, machoRules(createPalette(1))).split('\n')).toEqual([
      '(__TEXT,__text) section',
      `${ansi.cyan('0000000100003f80')}        ${ansi.yellow('pushq')}\t${ansi.red('%rbp')}`,
      '',
    ]);
  });
});
