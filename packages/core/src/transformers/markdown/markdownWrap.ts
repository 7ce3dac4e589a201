import { joinLines, splitLines } from '../../utils/text.js';
import {
  FENCE,
  FENCE_CLOSE,
  FOOTNOTE,
  FRONT_MATTER_END,
  FRONT_MATTER_KEY,
  FRONT_MATTER_LINE,
  TABLE_END,
  TABLE_ROW,
} from './markdownPatterns.js';

const RULE = /^---+$/;
const BLOCK_START = /^ +|^[*-]|^#|^\[\^|^ *\d\. /;

/** Space-split that keeps inner empty words but drops trailing ones. */
function splitWords(line: string): string[] {
  const words = line.split(' ');
  while (words.length > 0 && words[words.length - 1] === '') {
    words.pop();
  }
  return words;
}

/**
 * Re-flows prose paragraphs to `columns`. Fenced blocks, tables and front
 * matter pass through untouched; indented lines, list items, headings and
 * footnotes each start a new output line.
 */
export function rewrapMarkdown(text: string, columns: number): string {
  const output: string[] = [];
  let words: string[] = [];
  let length = 0;
  let inFence = false;
  let inTable = false;
  let inFrontMatter = false;
  let maybeFrontMatter = true;

  const flush = (): void => {
    if (words.length > 0) {
      output.push(words.join(' '));
    }
    words = [];
    length = 0;
  };

  const regularLine = (line: string): void => {
    let indent = '';
    if (BLOCK_START.test(line) || line === '') {
      flush();
      if (line === '') {
        output.push('');
      }
      if (FOOTNOTE.test(line)) {
        indent = '  ';
      }
    }
    for (const original of splitWords(line)) {
      let word = original;
      if (length + 1 + word.length >= columns) {
        flush();
        word = `${indent}${word}`;
      }
      length += 1 + word.length;
      words.push(word);
    }
    maybeFrontMatter = false;
  };

  const frontMatterLine = (line: string): void => {
    if (FRONT_MATTER_END.test(line)) {
      inFrontMatter = false;
      regularLine(line);
      return;
    }
    output.push(line);
  };

  for (const line of splitLines(text)) {
    if (inFence) {
      if (FENCE_CLOSE.test(line)) {
        inFence = false;
        maybeFrontMatter = false;
      }
      output.push(line);
    } else if (FENCE.test(line)) {
      inFence = true;
      flush();
      output.push(line);
    } else if (inTable) {
      if (TABLE_END.test(line)) {
        inTable = false;
        regularLine(line);
      } else {
        output.push(line);
      }
    } else if (TABLE_ROW.test(line)) {
      inTable = true;
      flush();
      output.push(line);
    } else if (maybeFrontMatter && FRONT_MATTER_KEY.test(line)) {
      inFrontMatter = true;
      maybeFrontMatter = false;
      flush();
      frontMatterLine(line);
    } else if (RULE.test(line)) {
      maybeFrontMatter = true;
      inFrontMatter = false;
      flush();
      output.push(line);
    } else if (inFrontMatter && FRONT_MATTER_LINE.test(line)) {
      frontMatterLine(line);
    } else {
      regularLine(line);
    }
  }
  flush();

  return joinLines(output);
}
