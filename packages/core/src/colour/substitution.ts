import { joinLines, splitLines } from '../utils/text.js';

/** Inclusive line range; the end pattern is first tested on the line after the start. */
export interface LineRange {
  start: RegExp;
  end: RegExp;
}

export interface SubstitutionRule {
  /** Use the `g` flag to replace every occurrence on a line. */
  pattern: RegExp;
  /** Receives the whole match followed by each capture group ('' when unset). */
  replace: (groups: string[]) => string;
  within?: LineRange;
}

function collectGroups(args: unknown[]): string[] {
  const groups: string[] = [];
  for (const arg of args) {
    if (typeof arg === 'number') {
      break;
    }
    groups.push(typeof arg === 'string' ? arg : '');
  }
  return groups;
}

const substituteLine = (line: string, rule: SubstitutionRule): string =>
  line.replace(rule.pattern, (...args: unknown[]) => rule.replace(collectGroups(args)));

/**
 * Runs each rule over every line in turn, line-editor style: later rules see
 * the output of earlier ones, and each ranged rule tracks whether it is
 * inside its range independently of the others.
 */
export function substituteLines(lines: readonly string[], rules: readonly SubstitutionRule[]): string[] {
  const active = rules.map(() => false);
  return lines.map((original) => {
    let line = original;
    rules.forEach((rule, index) => {
      const range = rule.within;
      if (!range) {
        line = substituteLine(line, rule);
        return;
      }
      if (!active[index]) {
        if (!range.start.test(line)) {
          return;
        }
        active[index] = true;
        line = substituteLine(line, rule);
        return;
      }
      const closes = range.end.test(line);
      line = substituteLine(line, rule);
      if (closes) {
        active[index] = false;
      }
    });
    return line;
  });
}

export const applySubstitutions = (text: string, rules: readonly SubstitutionRule[]): string =>
  joinLines(substituteLines(splitLines(text), rules));
