import { matchesCasePattern } from '../utils/casePattern.js';
import { splitLines } from '../utils/text.js';
import type { LexerCatalogEntry } from './lexerTypes.js';

const IGNORED_PATTERNS = new Set(['*.txt']);

// Lexers the engine lists without filenames that still deserve a match.
const SPECIAL_PATTERNS: Readonly<Record<string, readonly string[]>> = {
  'git-ignore': ['.gitignore', '*/.gitignore'],
  'git-attributes': ['.gitattributes', '*/.gitattributes'],
  'git-commit-edit-msg': ['COMMIT_EDITMSG', '*/COMMIT_EDITMSG'],
  'git-blame-ignore-revs': ['.git-blame-ignore-revs', '*/.git-blame-ignore-revs'],
};

const LEXER_HEADER = /^\* ([a-z0-9+-]+)(?:, [a-z0-9+-]+)*:$/;
const WITH_FILENAMES = /^ *(.*) \(filenames ([^)]+)\)/;
const WITHOUT_FILENAMES = /^ +([^(*]*?) *$/;

/**
 * Drops `*.<base>` from a `base+other` lexer so that, for example,
 * `html+php` does not claim every `*.html` file.
 */
function withoutBaseLexerPatterns(lexer: string, patterns: string[]): string[] {
  const plus = /^(.*?)\+[A-Za-z]/.exec(lexer);
  if (!plus) {
    return patterns;
  }
  const baseExtension = `*.${plus[1]}`;
  return patterns.filter((pattern) => pattern !== baseExtension);
}

/** Parses the listing printed by `pygmentize -L lexers`. */
export function parseLexerListing(listing: string): LexerCatalogEntry[] {
  const entries: LexerCatalogEntry[] = [];
  let lexer: string | null = null;

  for (const line of splitLines(listing)) {
    const header = LEXER_HEADER.exec(line);
    if (header) {
      lexer = header[1];
    }
    if (lexer === null) {
      continue;
    }

    let patterns: string[] = [];
    const described = WITH_FILENAMES.exec(line);
    if (described) {
      patterns = withoutBaseLexerPatterns(lexer, described[2].split(', ')).filter(
        (pattern) => !IGNORED_PATTERNS.has(pattern),
      );
    } else if (WITHOUT_FILENAMES.test(line)) {
      patterns = [...(SPECIAL_PATTERNS[lexer] ?? [])];
    }

    if (patterns.length > 0) {
      entries.push({ lexer, patterns });
    }
  }
  return entries;
}

/** First entry, in catalog order, with a pattern matching `name`. */
export function findLexer(entries: readonly LexerCatalogEntry[], name: string): string | null {
  if (!name) {
    return null;
  }
  const entry = entries.find((candidate) => matchesCasePattern(name, candidate.patterns));
  return entry ? entry.lexer : null;
}
