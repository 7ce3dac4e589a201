import type { Palette } from '../../colour/palette.js';
import { CSV_DELIMITER } from '../../constants.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutLines } from '../../tools/toolTypes.js';
import { matchesAnyCandidate, outputOutcome, runTool, selectTool } from '../support.js';

const QUOTED_NUMBER = /^"([0-9][0-9.]*)"$/;

/** Splits on the delimiter wherever it sits outside double quotes. */
export function splitDelimitedFields(line: string, delimiter: string = CSV_DELIMITER): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') {
      quoted = !quoted;
    }
    if (ch === delimiter && !quoted) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function colourField(field: string, index: number, palette: Palette): string {
  const quotedNumber = QUOTED_NUMBER.exec(field);
  if (quotedNumber && index > 0) {
    return palette.number(quotedNumber[1]);
  }
  if (field.length >= 2 && field.startsWith('"') && field.endsWith('"')) {
    return `${palette.quote('"')}${palette.string(field.slice(1, -1))}${palette.quote('"')}`;
  }
  return index > 0 ? palette.number(field) : field;
}

/**
 * Colours csvformat output written with `-D£ -U 2`: every non-numeric field
 * arrives quoted, so quoted fields are strings and bare ones are numbers.
 * Fields are re-joined with commas.
 */
export const colourDelimitedLine = (line: string, palette: Palette): string =>
  splitDelimitedFields(line)
    .map((field, index) => colourField(field, index, palette))
    .join(',');

export const csvkitColourizer: Transformer = {
  id: 'csvkit',
  stage: 'colourize',
  description: 'CSV tables normalised by csvformat',
  async match(context) {
    if (!matchesAnyCandidate(context, ['*.csv'], { inferred: false })) {
      return null;
    }
    const tool = await selectTool(context, ['csvformat']);
    if (!tool) {
      return null;
    }
    // Builds without UTF-8 support reject the delimiter outright.
    const check = await context.tools.run(tool, [`-D${CSV_DELIMITER}`], { input: '' });
    if (check.exitCode !== 0) {
      context.logger.debug('csvformat cannot handle a non-ASCII delimiter');
      return null;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, [`-D${CSV_DELIMITER}`, '-U', '2', context.subject.path]);
        return outputOutcome(stdoutLines(result).map((line) => colourDelimitedLine(line, context.palette)));
      },
    };
  },
};
