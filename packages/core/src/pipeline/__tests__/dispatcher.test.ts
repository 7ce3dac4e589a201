import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { writeFileSync } from 'node:fs';

import { createBufferSink, createRecordingLogger, createTestContext } from '../../__testUtils__/filterHarness.js';
import { createScratchArea, type ScratchArea } from '../../scratch/scratchArea.js';
import { dispatch } from '../dispatcher.js';
import { defaultTransformers } from '../registry.js';
import { artifactSubject } from '../subject.js';
import type { TransformContext, TransformOutcome, Transformer, TransformerStage } from '../transformerTypes.js';

const transformer = (id: string, stage: TransformerStage, match: Transformer['match']): Transformer => ({
  id,
  stage,
  description: `${id} for tests`,
  match,
});

const producing =
  (outcome: (context: TransformContext) => TransformOutcome) =>
  async (context: TransformContext) => ({
    tool: null,
    apply: async () => outcome(context),
  });

const printing = (content: string) => producing(() => ({ type: 'output', content }));

const never = async () => null;

describe('dispatch', () => {
  let scratch: ScratchArea;

  beforeEach(() => {
    scratch = createScratchArea();
  });

  afterEach(() => {
    scratch.release();
  });

  const writing = (suffix: string, content: string) =>
    producing((context) => {
      const path = scratch.artifactPath(context.subject.path, suffix);
      writeFileSync(path, content);
      return { type: 'artifact', subject: artifactSubject(path) };
    });

  test('stops at the first colourizer that matches', async () => {
    const output = createBufferSink();
    const second = jest.fn(printing('second'));

    const result = await dispatch({
      mode: 'render',
      context: createTestContext(scratch),
      transformers: [transformer('first', 'colourize', printing('first')), transformer('second', 'colourize', second)],
      output,
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'first', reformattedBy: [] });
    expect(output.text()).toBe('first');
    expect(second).not.toHaveBeenCalled();
  });

  test('runs reformatters before colourizers and hands them the artifact', async () => {
    const output = createBufferSink();
    const seen: string[] = [];
    const colourizer = transformer('colour', 'colourize', async (context) => {
      seen.push(context.subject.path);
      return printing('coloured')(context);
    });

    const result = await dispatch({
      mode: 'render',
      context: createTestContext(scratch, { path: '/work/input.md' }),
      transformers: [colourizer, transformer('reformat', 'reformat', writing('md', 'reformatted'))],
      output,
    });

    expect(seen).toEqual([scratch.artifactPath('/work/input.md', 'md')]);
    expect(result).toEqual({ exitCode: 0, handledBy: 'colour', reformattedBy: ['reformat'] });
    expect(output.text()).toBe('coloured');
  });

  test('emits the last artifact when no colourizer takes it', async () => {
    const output = createBufferSink();
    const second = transformer('second', 'reformat', async (context) =>
      context.subject.isTemporary ? writing('txt', 'second pass\n')(context) : null,
    );

    const result = await dispatch({
      mode: 'render',
      context: createTestContext(scratch, { path: '/work/input' }),
      transformers: [transformer('first', 'reformat', writing('data', 'first pass\n')), second],
      output,
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'second', reformattedBy: ['first', 'second'] });
    expect(output.text()).toBe('second pass\n');
  });

  test('reports support without applying anything', async () => {
    const output = createBufferSink();
    const apply = jest.fn(async (): Promise<TransformOutcome> => ({ type: 'output', content: 'unused' }));

    const result = await dispatch({
      mode: 'check-support',
      context: createTestContext(scratch),
      transformers: [transformer('candidate', 'reformat', async () => ({ tool: 'tool', apply }))],
      output,
    });

    expect(result).toEqual({ exitCode: 0, handledBy: 'candidate', reformattedBy: [] });
    expect(apply).not.toHaveBeenCalled();
    expect(output.text()).toBe('');
  });

  test('returns 1 and writes nothing when no transformer matches', async () => {
    const output = createBufferSink();

    for (const mode of ['render', 'check-support'] as const) {
      const result = await dispatch({
        mode,
        context: createTestContext(scratch),
        transformers: [transformer('none', 'colourize', never)],
        output,
      });
      expect(result).toEqual({ exitCode: 1, handledBy: null, reformattedBy: [] });
    }
    expect(output.text()).toBe('');
  });

  test('moves on when a match fails', async () => {
    const output = createBufferSink();
    const logger = createRecordingLogger();
    const failingMatch = transformer('broken-match', 'colourize', async () => {
      throw new Error('lookup crashed');
    });

    const result = await dispatch({
      mode: 'render',
      context: createTestContext(scratch, { logger }),
      transformers: [failingMatch, transformer('fallback', 'colourize', printing('ok'))],
      output,
    });

    expect(result.handledBy).toBe('fallback');
    expect(output.text()).toBe('ok');
    expect(logger.debug).toHaveBeenCalledWith('broken-match: match failed: lookup crashed');
  });

  test('rejects when a matched transformer fails to apply', async () => {
    const output = createBufferSink();
    const logger = createRecordingLogger();
    const failingApply = transformer(
      'broken-apply',
      'colourize',
      producing(() => {
        throw new Error('boom');
      }),
    );
    const fallback = jest.fn(printing('unused'));

    await expect(
      dispatch({
        mode: 'render',
        context: createTestContext(scratch, { logger }),
        transformers: [failingApply, transformer('fallback', 'colourize', fallback)],
        output,
      }),
    ).rejects.toThrow('boom');
    expect(fallback).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
    expect(output.text()).toBe('');
  });

  test('writes raw bytes and line lists as they are', async () => {
    const bytes = createBufferSink();
    const lines = createBufferSink();
    const raw = Uint8Array.from([99, 97, 102, 233, 10]);

    await dispatch({
      mode: 'render',
      context: createTestContext(scratch),
      transformers: [transformer('bytes', 'colourize', producing(() => ({ type: 'output', content: raw })))],
      output: bytes,
    });
    await dispatch({
      mode: 'render',
      context: createTestContext(scratch),
      transformers: [transformer('lines', 'colourize', producing(() => ({ type: 'output', content: ['one', '', 'two'] })))],
      output: lines,
    });

    expect(bytes.bytes()).toEqual([99, 97, 102, 233, 10]);
    expect(lines.text()).toBe('one\n\ntwo\n');
  });
});

describe('defaultTransformers', () => {
  test('lists every reformatter ahead of the colourizers', () => {
    const ids = defaultTransformers().map((entry) => `${entry.stage}:${entry.id}`);

    expect(ids).toEqual([
      'reformat:junit-xml',
      'reformat:xmllint',
      'reformat:basic-detokenise',
      'reformat:arm-dumpi',
      'reformat:armdiss',
      'reformat:decaof',
      'reformat:alf-libfile',
      'reformat:ar-archive',
      'reformat:riscos-dump',
      'reformat:objdump',
      'reformat:macho',
      'reformat:markdown',
      'reformat:plist',
      'reformat:openssl',
      'reformat:pyc',
      'colourize:csvkit',
      'colourize:grc',
      'colourize:jq',
      'colourize:pygments',
    ]);
  });
});
