import type { Palette } from '../../colour/palette.js';
import { substituteLines, type LineRange, type SubstitutionRule } from '../../colour/substitution.js';
import type { TransformContext, Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutLines } from '../../tools/toolTypes.js';
import { expandTabs } from '../../utils/text.js';
import { matchesAnyCandidate, outputOutcome, runTool, selectTool } from '../support.js';

const SYMBOL_TABLE: LineRange = { start: /^SYMBOL TABLE:/, end: /^$/ };
// Stays open across consecutive "Disassembly of section" blocks.
const DISASSEMBLY: LineRange = { start: /^Disassembly of section/, end: /^(?!Disassembly of section)[A-Z]/ };

/**
 * Colouring for `objdump -r -d -x`. Tolerates both the GNU layout
 * (`937c:  97fffc62  bl  8504 <f>`, `//` comments) and the LLVM one
 * (`937c: 62 fc ff 97  bl  0x8504 <f>`, `;` comments).
 */
export function objdumpRules(palette: Palette): SubstitutionRule[] {
  return [
    { pattern: /\r/, replace: () => '' },
    {
      within: SYMBOL_TABLE,
      pattern: /( {2}F \.[a-zA-Z][a-zA-Z0-9_.-]* +[0-9a-f]{16} )([A-Za-z_][A-Za-z_0-9]*)/g,
      replace: ([, lead, name]) => `${lead}${palette.symbol(name)}`,
    },
    {
      within: SYMBOL_TABLE,
      pattern: /( \.[a-zA-Z][a-zA-Z0-9_.-]*)/g,
      replace: ([, section]) => palette.section(section),
    },
    {
      within: DISASSEMBLY,
      pattern: /^([0-9a-f]{8,}) <([^>]*)>:/,
      replace: ([, address, label]) => `${palette.address(address)} <${palette.symbol(label)}>:`,
    },
    {
      within: DISASSEMBLY,
      pattern:
        /^( *)([0-9a-f]+):( +)([0-9a-f]{2} [0-9a-f ]{2} [0-9a-f ]{2} [0-9a-f ]{2}|[0-9a-f ]{8})( {2}[^a-z.]+)([a-z.]+)/,
      replace: ([, indent, address, gap, bytes, spacing, opcode]) =>
        `${indent}${palette.address(address)}:${gap}${palette.bytes(bytes)}${spacing}${palette.opcode(opcode)}`,
    },
    {
      within: DISASSEMBLY,
      pattern: /^( *)([0-9a-f]+):( +)([0-9a-f]{8} [0-9a-f ]{8} [0-9a-f ]{8} [0-9a-f ]{8})/,
      replace: ([, indent, address, gap, words]) => `${indent}${palette.address(address)}:${gap}${palette.bytes(words)}`,
    },
    {
      within: DISASSEMBLY,
      pattern: /([ ,[{])([xw][1-3][0-9]|[xw][0-9]|[wx]?lr|pc|w?sp|[wx]zr)/g,
      replace: ([, lead, register]) => `${lead}${palette.register(register)}`,
    },
    {
      within: DISASSEMBLY,
      pattern: /<([_a-zA-Z][_a-zA-Z0-9.]*)([+>])/g,
      replace: ([, name, tail]) => `<${palette.symbol(name)}${tail}`,
    },
    { within: DISASSEMBLY, pattern: /<unknown>/g, replace: ([unknown]) => palette.fault(unknown) },
    {
      within: DISASSEMBLY,
      pattern: / (;|\/\/) (.*)/g,
      replace: ([, leader, text]) => ` ${palette.comment(`${leader} ${text}`)}`,
    },
    {
      pattern: /(0x[A-Fa-f0-9]{2,16})([^)a-f0-9]|$)/g,
      replace: ([, hex, next]) => `${palette.hex(hex)}${next}`,
    },
    { pattern: /#(0x[A-Fa-f0-9]{1,16})/g, replace: ([, hex]) => `#${palette.hex(hex)}` },
    { pattern: /^([A-Z][A-Za-z .]*:)$/, replace: ([, heading]) => palette.heading(heading) },
  ];
}

async function selectDisassembler(context: TransformContext): Promise<string | null> {
  const crossTool = await selectTool(context, ['aarch64-unknown-linux-gnu-objdump', 'riscos64-objdump']);
  if (crossTool) {
    return crossTool;
  }
  // Only the macOS objdump understands AArch64 without a cross toolchain.
  return context.config.platform === 'darwin' ? selectTool(context, ['objdump']) : null;
}

export const objdumpReformatter: Transformer = {
  id: 'objdump',
  stage: 'reformat',
  description: 'AArch64 ELF binaries disassembled by objdump',
  async match(context) {
    if (!matchesAnyCandidate(context, ['*.elf-arm64'])) {
      return null;
    }
    const tool = await selectDisassembler(context);
    if (!tool) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['-r', '-d', '-x', context.subject.path]);
        const expanded = stdoutLines(result).map((line) => expandTabs(line));
        return outputOutcome(substituteLines(expanded, objdumpRules(context.palette)));
      },
    };
  },
};
