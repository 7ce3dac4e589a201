import type { Transformer } from '../../pipeline/transformerTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

export const riscosDumpReformatter: Transformer = {
  id: 'riscos-dump',
  stage: 'reformat',
  description: 'RISC OS data files shown as a hex dump',
  async match(context) {
    const tool = await selectTool(context, ['riscos-dump']);
    if (!tool || !matchesAnyCandidate(context, ['*,ffd'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, [context.subject.path]);
        return artifactOutcome(await writeArtifact(context, 'data', result.stdout));
      },
    };
  },
};
