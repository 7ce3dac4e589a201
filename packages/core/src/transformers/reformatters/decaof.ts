import type { Palette } from '../../colour/palette.js';
import { substituteLines, type LineRange, type SubstitutionRule } from '../../colour/substitution.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutLines } from '../../tools/toolTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

const SYMBOL_TABLE: LineRange = { start: /^\*\* Symbol Table/, end: /^\*\*/ };
const CODE_AREA: LineRange = { start: /Attributes: Code/, end: /^\s*$/ };

export function decaofRules(palette: Palette): SubstitutionRule[] {
  return [
    { pattern: /\r/, replace: () => '' },
    {
      within: SYMBOL_TABLE,
      pattern: /^([_!A-Za-z][^ ]*)/,
      replace: ([, name]) => palette.symbol(name),
    },
    { pattern: /^\*\* (.*)$/, replace: ([, title]) => palette.heading(`** ${title}`) },
    {
      within: CODE_AREA,
      pattern: / : (BL|BX|B)( {2}|[A-Z]{2})( +)([_a-zA-Z][_a-zA-Z0-9$]*)$/g,
      replace: ([, branch, condition, gap, target]) => ` : ${branch}${condition}${gap}${palette.symbol(target)}`,
    },
    {
      within: CODE_AREA,
      pattern: /^ {2}0x([0-9a-f]{6}): {2}([0-9a-f]{8}) {2}(....) : (B|[A-Z]{2,})( +)/,
      replace: ([, address, word, chars, opcode, gap]) =>
        `    ${palette.address(address)}:  ${palette.bytes(word)}  ${chars} : ${palette.opcode(opcode)}${gap}`,
    },
    {
      within: CODE_AREA,
      pattern: /^ {2}0x([0-9a-f]{6}): {2}([0-9a-f]{8}) {2}(....) : (Undefined instruction)/,
      replace: ([, address, word, chars, fault]) =>
        `    ${palette.address(address)}:  ${palette.bytes(word)}  ${chars} : ${palette.fault(fault)}`,
    },
    { within: CODE_AREA, pattern: /( ; .*)/, replace: ([, comment]) => palette.comment(comment) },
    {
      within: CODE_AREA,
      pattern: /([ ,[{])(r1[0-5]|r[0-9]|lr|pc|sp|[cs]psr_[a-z]*)/g,
      replace: ([, lead, register]) => `${lead}${palette.register(register)}`,
    },
    {
      within: CODE_AREA,
      pattern: /(,)(LSL|LSR|ASR|ROR)/g,
      replace: ([, comma, shift]) => `${comma}${palette.shift(shift)}`,
    },
    {
      pattern: /(0x[A-Fa-f0-9]{2,8})([^)a-f0-9]|$)/g,
      replace: ([, hex, next]) => `${palette.hex(hex)}${next}`,
    },
    {
      pattern: /(^At |\[)([A-Fa-f0-9]{6,8})(:|\])/g,
      replace: ([, lead, address, tail]) => `${lead}${palette.address(address)}${tail}`,
    },
    {
      pattern: /(symbol )([_!A-Za-z][^ ]*)/g,
      replace: ([, lead, name]) => `${lead}${palette.symbol(name)}`,
    },
    {
      pattern: /(area ")([_!A-Za-z][^ ]*)(")/g,
      replace: ([, lead, name, quote]) => `${lead}${palette.area(name)}${quote}`,
    },
  ];
}

export const decaofReformatter: Transformer = {
  id: 'decaof',
  stage: 'reformat',
  description: 'AOF object files decoded by riscos-decaof',
  async match(context) {
    const tool = await selectTool(context, ['riscos-decaof']);
    if (!tool || !matchesAnyCandidate(context, ['*.aof'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['-drmsc', context.subject.path]);
        const listing = substituteLines(stdoutLines(result), decaofRules(context.palette));
        return artifactOutcome(await writeArtifact(context, 'data', listing));
      },
    };
  },
};
