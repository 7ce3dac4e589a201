import type { Transformer } from '../../pipeline/transformerTypes.js';
import { artifactOutcome, matchesAnyCandidate, outputOutcome, runTool, selectTool, writeArtifact } from '../support.js';

const ARM_CODE_PATTERNS = ['*,ffa', '*,ff8', '*,ffc', '*,f95', '*.arm'];

/** riscos-dumpi colours its own output, so the listing goes straight to the terminal. */
export const armDumpiReformatter: Transformer = {
  id: 'arm-dumpi',
  stage: 'reformat',
  description: 'ARM code listed by riscos-dumpi',
  async match(context) {
    const tool = await selectTool(context, ['riscos-dumpi']);
    if (!tool || !matchesAnyCandidate(context, ARM_CODE_PATTERNS)) {
      return null;
    }
    const colourFlag = context.config.colourLevel >= 2 ? '--colour-8bit' : '--colour';
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, [colourFlag, context.subject.path]);
        return outputOutcome(result.stdout);
      },
    };
  },
};

export const armDissReformatter: Transformer = {
  id: 'armdiss',
  stage: 'reformat',
  description: 'ARM code disassembled by armdiss',
  async match(context) {
    const tool = await selectTool(context, ['armdiss']);
    if (!tool || !matchesAnyCandidate(context, ARM_CODE_PATTERNS)) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, [context.subject.path]);
        return artifactOutcome(await writeArtifact(context, 'arm', result.stdout));
      },
    };
  },
};
