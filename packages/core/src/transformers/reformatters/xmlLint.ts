import type { Transformer } from '../../pipeline/transformerTypes.js';
import { artifactOutcome, firstMatchingRule, runTool, selectTool, writeArtifact } from '../support.js';

const SUFFIX_RULES = [
  { patterns: ['*.svg'], value: 'svg' },
  { patterns: ['*.xml'], value: 'xml' },
];

export const xmlLintReformatter: Transformer = {
  id: 'xmllint',
  stage: 'reformat',
  description: 'Well-formed XML and SVG pretty-printed by xmllint',
  async match(context) {
    const tool = await selectTool(context, ['xmllint']);
    if (!tool) {
      return null;
    }
    const suffix = firstMatchingRule(context, SUFFIX_RULES);
    if (!suffix) {
      return null;
    }
    const check = await context.tools.run(tool, ['--nonet', context.subject.path]);
    if (check.exitCode !== 0) {
      context.logger.debug(`xmllint rejected ${context.subject.path}`);
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['--nonet', '--format', context.subject.path]);
        return artifactOutcome(await writeArtifact(context, suffix, result.stdout));
      },
    };
  },
};
