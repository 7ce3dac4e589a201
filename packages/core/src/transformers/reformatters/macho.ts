import type { Palette } from '../../colour/palette.js';
import { substituteLines, type LineRange, type SubstitutionRule } from '../../colour/substitution.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutLines } from '../../tools/toolTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

const TEXT_SECTION: LineRange = { start: /^\(__TEXT.* section/, end: /^$/ };

export function machoRules(palette: Palette): SubstitutionRule[] {
  return [
    { pattern: /\r/, replace: () => '' },
    {
      within: TEXT_SECTION,
      pattern: /^([0-9a-f]{8,})\t([a-z][a-z0-9]*)/g,
      replace: ([, address, opcode]) => `${palette.location(address)}        ${palette.opcode(opcode)}`,
    },
    {
      within: TEXT_SECTION,
      pattern: /(%[rec][a-z0-9]*)/g,
      replace: ([, register]) => palette.register(register),
    },
    {
      within: TEXT_SECTION,
      pattern: /(\$(?:0x[0-9a-f]*|[0-9]+))/g,
      replace: ([, immediate]) => palette.hex(immediate),
    },
    { within: TEXT_SECTION, pattern: /(## .*)/g, replace: ([, comment]) => palette.comment(comment) },
    { pattern: /^([_A-Z][_A-Za-z .]*:)$/, replace: ([, heading]) => palette.heading(heading) },
  ];
}

export const machoReformatter: Transformer = {
  id: 'macho',
  stage: 'reformat',
  description: 'Mach-O binaries dumped by otool',
  async match(context) {
    const tool = await selectTool(context, ['otool']);
    if (!tool || !matchesAnyCandidate(context, ['*.macho'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['-htV', context.subject.path]);
        const listing = substituteLines(stdoutLines(result), machoRules(context.palette));
        return artifactOutcome(await writeArtifact(context, 'otool', listing));
      },
    };
  },
};
