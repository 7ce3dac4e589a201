import { readFile } from 'node:fs/promises';

import type { Transformer } from '../../pipeline/transformerTypes.js';
import { colourMarkdown } from '../markdown/markdownColour.js';
import { rewrapMarkdown } from '../markdown/markdownWrap.js';
import { artifactOutcome, matchesAnyCandidate, writeArtifact } from '../support.js';

export const markdownReformatter: Transformer = {
  id: 'markdown',
  stage: 'reformat',
  description: 'Markdown re-wrapped to the terminal width and coloured',
  async match(context) {
    if (!matchesAnyCandidate(context, ['*.md'])) {
      return null;
    }
    return {
      tool: null,
      async apply() {
        const source = await readFile(context.subject.path, 'utf8');
        const wrapped = rewrapMarkdown(source, context.config.columns);
        return artifactOutcome(await writeArtifact(context, 'md', colourMarkdown(wrapped, context.palette)));
      },
    };
  },
};
