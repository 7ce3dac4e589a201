import type { Palette } from '../../colour/palette.js';
import { applySubstitutions, type LineRange, type SubstitutionRule } from '../../colour/substitution.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutText } from '../../tools/toolTypes.js';
import { firstMatchingRule, outputOutcome, runTool, selectTool } from '../support.js';

const PEM_BLOCK: LineRange = { start: /^--+BEGIN.*/, end: /^--+END.*/ };

const SUBCOMMAND_RULES = [
  { patterns: ['*.csr'], value: 'req' },
  { patterns: ['*.crt'], value: 'x509' },
];

export function certificateRules(palette: Palette): SubstitutionRule[] {
  return [
    { pattern: /^( *)(Validity)$/, replace: ([, indent, field]) => `${indent}${field}:` },
    {
      pattern: /^( *)([A-Z][A-Z0-9a-z -]*)(: )([0-9A-Za-z(].*)$/,
      replace: ([, indent, field, separator, value]) =>
        `${indent}${palette.fieldName(field)}${separator}${palette.fieldValue(value)}`,
    },
    {
      pattern: /^( *)([A-Z][A-Z0-9a-z -]*)(: ?)$/,
      replace: ([, indent, field, separator]) => `${indent}${palette.fieldName(field)}${separator}`,
    },
    { pattern: /^( *)(\(none\))$/, replace: ([, indent, none]) => `${indent}${palette.fieldValue(none)}` },
    { within: PEM_BLOCK, pattern: /^([^-]*)$/, replace: ([, body]) => palette.pemBody(body) },
    { within: PEM_BLOCK, pattern: /^(--+.*)$/, replace: ([, delimiter]) => palette.pemDelimiter(delimiter) },
  ];
}

export const opensslReformatter: Transformer = {
  id: 'openssl',
  stage: 'reformat',
  description: 'Certificates and signing requests decoded by openssl',
  async match(context) {
    const tool = await selectTool(context, ['openssl']);
    if (!tool) {
      return null;
    }
    const subcommand = firstMatchingRule(context, SUBCOMMAND_RULES);
    if (!subcommand) {
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, [subcommand, '-in', context.subject.path, '-text']);
        return outputOutcome(applySubstitutions(stdoutText(result), certificateRules(context.palette)));
      },
    };
  },
};
