import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import type { Transformer } from '../../pipeline/transformerTypes.js';
import { matchesAnyCandidate, outputOutcome, runTool, selectTool } from '../support.js';

const isFile = (path: string): Promise<boolean> =>
  stat(path).then(
    (info) => info.isFile(),
    () => false,
  );

export const grcColourizer: Transformer = {
  id: 'grc',
  stage: 'colourize',
  description: 'Graphviz sources coloured by grcat',
  async match(context) {
    if (!matchesAnyCandidate(context, ['*.dot', '*.gv', '*.gv-dot'], { inferred: false })) {
      return null;
    }
    const tool = await selectTool(context, ['grcat']);
    if (!tool) {
      return null;
    }
    const configuration = join(context.config.homeDir, '.grc', 'conf.graphviz');
    if (!(await isFile(configuration))) {
      context.logger.debug(`grcat configuration ${configuration} missing`);
      return null;
    }
    return {
      tool,
      async apply() {
        const source = await readFile(context.subject.path);
        const result = await runTool(context, tool, [configuration], { input: source });
        return outputOutcome(result.stdout);
      },
    };
  },
};
