import { matchesCasePattern } from '../utils/casePattern.js';

export interface LexerOverride {
  patterns: readonly string[];
  lexer: string;
}

/** Names the engine's own filename table gets wrong or does not know. */
export const LEXER_OVERRIDES: readonly LexerOverride[] = [
  { patterns: ['.bashrc', '.bash_aliases', '.bash_environment'], lexer: 'sh' },
  { patterns: ['*.svg'], lexer: 'xml' },
  { patterns: ['*.gitconfig'], lexer: 'ini' },
  { patterns: ['*.tfvars'], lexer: 'ini' },
  { patterns: ['Jenkinsfile', '*/Jenkinsfile', '*.jenkinsfile'], lexer: 'groovy' },
  { patterns: ['Dockerfile', '*/Dockerfile', '*.dockerfile', '*.Dockerfile'], lexer: 'docker' },
  // otherwise claimed by cplint
  { patterns: ['*.pl'], lexer: 'perl' },
  { patterns: ['*.kts'], lexer: 'kotlin' },
  { patterns: ['c/*', '*/c/*', 'h/*', '*/h/*'], lexer: 'c' },
  { patterns: ['s/*', '*/s/*', 'hdr/*', '*/hdr/*'], lexer: 'arm' },
  { patterns: ['p/*', '*/p/*', 'pas/*', '*/pas/*', 'imp/*', '*/imp/*'], lexer: 'pascal' },
  { patterns: ['f/*', '*/f/*', 'for/*', '*/for/*', 'f77/*', '*/f77/*'], lexer: 'fortranfixed' },
  { patterns: ['f90/*', '*/f90/*'], lexer: 'fortran' },
  { patterns: ['*,fe1'], lexer: 'make' },
  { patterns: ['*,fd1'], lexer: 'bbcbasic' },
];

/** Checks each name in turn against the whole table. */
export function overrideLexerFor(names: readonly string[]): string | null {
  for (const name of names) {
    const override = LEXER_OVERRIDES.find((entry) => matchesCasePattern(name, entry.patterns));
    if (override) {
      return override.lexer;
    }
  }
  return null;
}
