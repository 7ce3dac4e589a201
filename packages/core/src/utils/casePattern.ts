/**
 * Shell `case` glob matching. `*` and `?` match any character including `/`,
 * bracket expressions accept `!` or `^` for negation, and the whole subject
 * must match.
 */

const compiled = new Map<string, RegExp>();

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');

function compileBracket(pattern: string, start: number): { source: string; end: number } | null {
  let index = start + 1;
  let negate = false;
  if (pattern[index] === '!' || pattern[index] === '^') {
    negate = true;
    index += 1;
  }
  let body = '';
  if (pattern[index] === ']') {
    body = '\\]';
    index += 1;
  }
  const close = pattern.indexOf(']', index);
  if (close === -1) {
    return null;
  }
  body += pattern.slice(index, close).replace(/[\\\]]/g, '\\$&');
  return { source: `[${negate ? '^' : ''}${body}]`, end: close };
}

export function compileCasePattern(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) {
    return cached;
  }
  let source = '';
  for (let index = 0; index < pattern.length; index += 1) {
    const ch = pattern[index];
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const bracket = compileBracket(pattern, index);
      if (bracket) {
        source += bracket.source;
        index = bracket.end;
      } else {
        source += '\\[';
      }
    } else {
      source += escapeRegExp(ch);
    }
  }
  const regex = new RegExp(`^${source}$`, 's');
  compiled.set(pattern, regex);
  return regex;
}

export const matchesCasePattern = (subject: string, patterns: readonly string[]): boolean =>
  patterns.some((pattern) => compileCasePattern(pattern).test(subject));
