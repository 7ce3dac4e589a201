import { JUNIT_SNIFF_LINES } from '../../constants.js';
import { readHead } from '../../identify/typeIdentifier.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

async function mentionsTestSuite(path: string): Promise<boolean> {
  const head = (await readHead(path)).toString('utf8');
  return head
    .split('\n')
    .slice(0, JUNIT_SNIFF_LINES)
    .some((line) => line.includes('<testsuite'));
}

export const junitXmlReformatter: Transformer = {
  id: 'junit-xml',
  stage: 'reformat',
  description: 'JUnit XML reports summarised by junitxml',
  async match(context) {
    const tool = await selectTool(context, ['junitxml']);
    if (!tool || !matchesAnyCandidate(context, ['*.xml'])) {
      return null;
    }
    if (!(await mentionsTestSuite(context.subject.path))) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['--show', '--summarise', context.subject.path]);
        return artifactOutcome(await writeArtifact(context, 'junitxml', result.stdout));
      },
    };
  },
};
