import chalk from 'chalk';

export type ColourLevel = 1 | 2 | 3;

type StyleName = 'bold' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

export type Paint = (text: string) => string;

const theme = {
  // disassembly and object listings
  heading: ['green'],
  address: ['magenta'],
  hex: ['magenta'],
  bytes: ['white'],
  opcode: ['yellow'],
  symbol: ['cyan'],
  location: ['cyan'],
  section: ['yellow'],
  area: ['yellow'],
  register: ['red'],
  shift: ['yellow'],
  comment: ['green'],
  fault: ['red'],
  // archives
  reportHeading: ['magenta'],
  objectName: ['yellow'],
  // certificates
  fieldName: ['magenta'],
  fieldValue: ['cyan'],
  pemBody: ['cyan'],
  pemDelimiter: ['yellow'],
  // csv
  quote: ['bold', 'blue'],
  string: ['cyan'],
  number: ['yellow'],
  // markdown
  markdownHeading: ['bold', 'blue'],
  code: ['yellow'],
  tableRule: ['gray'],
  tableCell: ['cyan'],
  footnote: ['magenta'],
  frontMatterKey: ['yellow'],
  frontMatterValue: ['cyan'],
} as const satisfies Record<string, readonly StyleName[]>;

export type PaletteRole = keyof typeof theme;

export type Palette = Readonly<Record<PaletteRole, Paint>>;

export const colourLevelForTerm = (term: string | undefined): ColourLevel =>
  term !== undefined && term.includes('256') ? 2 : 1;

/**
 * Builds the colour roles used by every transformer. The level is explicit
 * because stdout is normally a pipe into the pager, where chalk's own
 * detection would switch colour off.
 */
export function createPalette(level: ColourLevel): Palette {
  const ink = new chalk.Instance({ level });
  const paint = (styles: readonly StyleName[]): Paint => {
    const styled = styles.reduce<chalk.Chalk>((current, style) => current[style], ink);
    return (text) => styled(text);
  };

  return {
    heading: paint(theme.heading),
    address: paint(theme.address),
    hex: paint(theme.hex),
    bytes: paint(theme.bytes),
    opcode: paint(theme.opcode),
    symbol: paint(theme.symbol),
    location: paint(theme.location),
    section: paint(theme.section),
    area: paint(theme.area),
    register: paint(theme.register),
    shift: paint(theme.shift),
    comment: paint(theme.comment),
    fault: paint(theme.fault),
    reportHeading: paint(theme.reportHeading),
    objectName: paint(theme.objectName),
    fieldName: paint(theme.fieldName),
    fieldValue: paint(theme.fieldValue),
    pemBody: paint(theme.pemBody),
    pemDelimiter: paint(theme.pemDelimiter),
    quote: paint(theme.quote),
    string: paint(theme.string),
    number: paint(theme.number),
    markdownHeading: paint(theme.markdownHeading),
    code: paint(theme.code),
    tableRule: paint(theme.tableRule),
    tableCell: paint(theme.tableCell),
    footnote: paint(theme.footnote),
    frontMatterKey: paint(theme.frontMatterKey),
    frontMatterValue: paint(theme.frontMatterValue),
  };
}
