import { access } from 'node:fs/promises';

import { artifactSubject } from '../../pipeline/subject.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

/** Later stages highlight the listing as BASIC. */
export const BASIC_FORMAT_HINT = '.bas';

const exists = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

export const basicDetokeniseReformatter: Transformer = {
  id: 'basic-detokenise',
  stage: 'reformat',
  description: 'Tokenised BBC BASIC turned back into text',
  async match(context) {
    const tool = await selectTool(context, ['riscos-basicdetokenise', 'bastotxt']);
    if (!tool || !matchesAnyCandidate(context, ['*,ffb'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const target = context.scratch.artifactPath(context.subject.path, 'bbc');
        await runTool(context, tool, ['-i', context.subject.path, '-o', target]);
        if (!(await exists(target))) {
          context.logger.debug(`${tool} produced no listing`);
          return artifactOutcome(await writeArtifact(context, 'bbc', '', BASIC_FORMAT_HINT));
        }
        return artifactOutcome(artifactSubject(target, BASIC_FORMAT_HINT));
      },
    };
  },
};
