import stripAnsi from 'strip-ansi';

import type { Palette } from '../../colour/palette.js';
import { joinLines, splitLines } from '../../utils/text.js';
import { FENCE, FRONT_MATTER_END, FRONT_MATTER_KEY, FRONT_MATTER_LINE, TABLE_END, TABLE_ROW } from './markdownPatterns.js';

const HEADING_OR_RULE = /^(#|---+)/;
const BULLET_ITEM = /^( *)([*-]) /;
const NUMBERED_ITEM = /^( *)\d\. /;
const INDENTED_CODE = /^ {4}[^ ]/;
const FRONT_MATTER_PAIR = /^( *)(-?[a-z_0-9.-]+):(?:( +)(.*))?/;
const FOOTNOTE_MARKER = /(\[\^[^\]]+\])/g;

interface ListItem {
  indent: string;
  isMarker(ch: string): boolean;
}

const bulletItem = (indent: string, marker: string): ListItem => ({
  indent,
  isMarker: (ch) => ch === marker,
});

const numberedItem = (indent: string): ListItem => ({
  indent,
  isMarker: (ch) => /[1-9]/.test(ch),
});

const charAfterIndent = (line: string, item: ListItem): string | null =>
  line.startsWith(item.indent) && line.length > item.indent.length ? line[item.indent.length] : null;

/**
 * Second markdown pass: colours headings, table cells, code and front
 * matter, and indents wrapped list-item text under its marker.
 */
export function colourMarkdown(text: string, palette: Palette): string {
  let item: ListItem | null = null;
  let itemIndented = false;
  let inIndentedCode = false;
  let inFence = false;
  let inTable = false;
  let inFrontMatter = false;
  let maybeFrontMatter = true;

  const colourWords = (line: string): string => line.replace(/[^ ]+/g, (word) => palette.code(word));

  const colourTable = (line: string): string => line.replace(/\|/g, () => palette.tableRule('|'));

  const colourFrontMatter = (line: string): string => {
    if (FRONT_MATTER_END.test(line)) {
      inFrontMatter = false;
      return line;
    }
    const match = FRONT_MATTER_PAIR.exec(line);
    if (!match) {
      return line;
    }
    const [whole, indent, key, gap = '', value = ''] = match;
    return `${indent}${palette.frontMatterKey(key)}:${gap}${palette.frontMatterValue(value)}${line.slice(whole.length)}`;
  };

  const colourLine = (line: string): string => {
    if (inFence) {
      if (FENCE.test(line)) {
        inFence = false;
        return line;
      }
      return palette.code(stripAnsi(line));
    }
    if (inTable) {
      if (TABLE_END.test(line)) {
        inTable = false;
      }
      return colourTable(line);
    }
    if (TABLE_ROW.test(line)) {
      inTable = true;
      const cells = line.replace(/(\| *)([^|]+)/g, (_match, lead: string, cell: string) => `${lead}${palette.tableCell(cell)}`);
      return colourTable(cells);
    }
    if (HEADING_OR_RULE.test(line)) {
      itemIndented = false;
      item = null;
      inFrontMatter = false;
      if (line.startsWith('---')) {
        maybeFrontMatter = true;
      }
      return line.startsWith('#') ? palette.markdownHeading(line) : line;
    }
    if (maybeFrontMatter && FRONT_MATTER_KEY.test(line)) {
      inFrontMatter = true;
      maybeFrontMatter = false;
      return colourFrontMatter(line);
    }
    if (inFrontMatter && FRONT_MATTER_LINE.test(line)) {
      return colourFrontMatter(line);
    }
    if (item) {
      const next = charAfterIndent(line, item);
      if (next !== null && !item.isMarker(next)) {
        itemIndented = true;
        return `${item.indent}  ${line}`;
      }
      if (next !== null && itemIndented) {
        itemIndented = false;
        return `\n${item.indent}${line}`;
      }
    }
    if (inIndentedCode && !line.startsWith('    ') && line !== '') {
      return `        ${colourWords(line)}`;
    }
    const bullet = BULLET_ITEM.exec(line);
    if (bullet) {
      item = bulletItem(bullet[1], bullet[2]);
      itemIndented = false;
      return line;
    }
    const numbered = NUMBERED_ITEM.exec(line);
    if (numbered) {
      item = numberedItem(numbered[1]);
      itemIndented = false;
      return line;
    }
    if (FENCE.test(line)) {
      inFence = true;
      return line;
    }
    if (INDENTED_CODE.test(line)) {
      inIndentedCode = true;
      return `    ${colourWords(line.slice(4))}`;
    }
    item = null;
    inIndentedCode = false;
    return line;
  };

  const lines = splitLines(text).map((line) => {
    const fenced = inFence;
    const coloured = colourLine(line);
    return fenced && inFence
      ? coloured
      : coloured.replace(FOOTNOTE_MARKER, (marker) => palette.footnote(marker));
  });
  return joinLines(lines);
}
