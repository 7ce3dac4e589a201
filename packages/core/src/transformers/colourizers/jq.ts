import type { Transformer } from '../../pipeline/transformerTypes.js';
import { matchesAnyCandidate, outputOutcome, runTool, selectTool } from '../support.js';

export const jqColourizer: Transformer = {
  id: 'jq',
  stage: 'colourize',
  description: 'JSON documents pretty-printed by jq',
  async match(context) {
    if (!matchesAnyCandidate(context, ['*.json', '*.jsonl'], { inferred: false })) {
      return null;
    }
    const tool = await selectTool(context, ['jq']);
    if (!tool) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['--color-output', '.', context.subject.path]);
        return outputOutcome(result.stdout);
      },
    };
  },
};
