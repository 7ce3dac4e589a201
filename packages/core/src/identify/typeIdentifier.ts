import { open } from 'node:fs/promises';

import { SNIFF_BYTE_LIMIT } from '../constants.js';
import { stdoutText, type ToolRunner } from '../tools/toolTypes.js';
import { matchesCasePattern } from '../utils/casePattern.js';
import { silentLogger, type FilterLogger } from '../utils/logger.js';
import { DESCRIPTION_RULES, NAME_RULES, type InferredKind } from './kinds.js';

export interface IdentifyOptions {
  tools: ToolRunner;
  logger?: FilterLogger;
  byteLimit?: number;
}

export async function readHead(path: string, limit: number = SNIFF_BYTE_LIMIT): Promise<Buffer> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(limit);
    const { bytesRead } = await handle.read(buffer, 0, limit, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

const looksLikeYaml = (firstLine: string): boolean => firstLine === '---' || firstLine.startsWith('%YAML');

export function kindFromDescription(description: string, firstLine: string): InferredKind | null {
  for (const rule of DESCRIPTION_RULES) {
    if (rule.pattern.test(description)) {
      return rule.kind;
    }
  }
  if (description.includes('ASCII text') && looksLikeYaml(firstLine)) {
    return 'yaml';
  }
  return null;
}

export function refineKindByName(path: string, kind: InferredKind | null): InferredKind | null {
  for (const rule of NAME_RULES) {
    if (matchesCasePattern(path, rule.patterns)) {
      return rule.kind === 'keep' ? kind : rule.kind;
    }
  }
  return kind;
}

/**
 * Infers the kind of `path` from its leading bytes via `file -`, then lets
 * a handful of filename conventions override the result.
 */
export async function identifyKind(path: string, options: IdentifyOptions): Promise<InferredKind | null> {
  const logger = options.logger ?? silentLogger;
  const head = await readHead(path, options.byteLimit ?? SNIFF_BYTE_LIMIT);
  const firstLine = head.toString('utf8').split('\n', 1)[0] ?? '';

  let description = '';
  if (await options.tools.locate('file')) {
    const result = await options.tools.run('file', ['-'], { input: head });
    description = stdoutText(result).trim();
    logger.debug(`file: ${description}`);
  } else {
    logger.debug('file: not available');
  }

  return refineKindByName(path, kindFromDescription(description, firstLine));
}
