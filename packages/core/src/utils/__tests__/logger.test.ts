import { describe, expect, jest, test } from '@jest/globals';

import { ansi } from '../../__testUtils__/filterHarness.js';
import { createConsoleLogger } from '../logger.js';

describe('createConsoleLogger', () => {
  test('writes dimmed debug lines only when debugging', () => {
    const write = jest.fn<(line: string) => void>();

    createConsoleLogger({ debug: true, write }).debug('inferred kind: sh');
    createConsoleLogger({ debug: false, write }).debug('hidden');

    expect(write.mock.calls).toEqual([[ansi.gray('pagerfilter: inferred kind: sh')]]);
  });

  test('always writes warnings', () => {
    const write = jest.fn<(line: string) => void>();

    createConsoleLogger({ debug: false, write }).warn('xmllint failed: boom');

    expect(write).toHaveBeenCalledWith('pagerfilter: xmllint failed: boom');
  });
});
