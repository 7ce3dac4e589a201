import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutText } from '../../tools/toolTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

/** Raw ESC bytes inside plist strings would otherwise drive the terminal. */
export const showEscapes = (text: string): string => text.replace(/\u001b/g, '<ESC>');

export const plistReformatter: Transformer = {
  id: 'plist',
  stage: 'reformat',
  description: 'Property lists printed by plutil',
  async match(context) {
    const tool = await selectTool(context, ['plutil']);
    if (!tool || !matchesAnyCandidate(context, ['*.plist'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['-p', context.subject.path]);
        return artifactOutcome(await writeArtifact(context, 'plist', showEscapes(stdoutText(result))));
      },
    };
  },
};
