import { access } from 'node:fs/promises';

import { overrideLexerFor } from '../../lexers/lexerOverrides.js';
import type { TransformContext, Transformer } from '../../pipeline/transformerTypes.js';
import { candidateNames, outputOutcome, runTool, selectTool } from '../support.js';

// Names ending in a version number (wrapper-2.1.7) are taken for groff pages.
const VERSIONED_NAME = /[0-9]\.[0-9]$/;
const FORCE_256_COLOUR = new Set(['python', 'sh', 'ini', 'c', 'bbcbasic']);
const MARKDOWN_LEXERS = new Set(['markdown', 'md']);

/** Last release for Python 2.7, which only has `material` when it was backported. */
const LEGACY_ENGINE_VERSION = '2.5.2';
export const LEGACY_MATERIAL_STYLE = '/usr/local/lib/python2.7/dist-packages/pygments/styles/material.py';

export interface RenderingOptions {
  format: 'terminal' | 'terminal256';
  style: string;
}

const fileExists = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

async function chooseLexer(context: TransformContext): Promise<string | null> {
  const names = candidateNames(context);
  const override = overrideLexerFor(names);
  if (override) {
    return override;
  }
  const [path, ...inferred] = names;
  if (!VERSIONED_NAME.test(path)) {
    const byName = await context.lexers.lexerFor(path);
    if (byName) {
      return byName;
    }
  }
  for (const name of inferred) {
    const lexer = await context.lexers.lexerFor(name);
    if (lexer) {
      return lexer;
    }
  }
  return null;
}

export async function renderingOptions(lexer: string, context: TransformContext): Promise<RenderingOptions> {
  const format = context.config.colourLevel >= 2 || FORCE_256_COLOUR.has(lexer) ? 'terminal256' : 'terminal';
  if (!MARKDOWN_LEXERS.has(lexer)) {
    return { format, style: context.config.pygmentsStyle };
  }
  if ((await context.lexers.engineVersion()) !== LEGACY_ENGINE_VERSION) {
    return { format, style: 'material' };
  }
  return { format, style: (await fileExists(LEGACY_MATERIAL_STYLE)) ? 'material' : 'monokai' };
}

export const pygmentsColourizer: Transformer = {
  id: 'pygments',
  stage: 'colourize',
  description: 'Syntax highlighting by pygmentize',
  async match(context) {
    const tool = await selectTool(context, ['pygmentize']);
    if (!tool) {
      return null;
    }
    const lexer = await chooseLexer(context);
    if (!lexer) {
      return null;
    }
    return {
      tool,
      async apply() {
        const { format, style } = await renderingOptions(lexer, context);
        const result = await runTool(context, tool, ['-f', format, '-O', `style=${style}`, '-l', lexer, context.subject.path]);
        return outputOutcome(result.stdout);
      },
    };
  },
};
