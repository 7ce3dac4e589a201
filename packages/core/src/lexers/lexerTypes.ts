export interface LexerCatalogEntry {
  lexer: string;
  patterns: string[];
}

export interface LexerResolver {
  /** Installed highlighter version, or null when it is unavailable. */
  engineVersion(): Promise<string | null>;
  /** First lexer whose filename patterns match `name`. */
  lexerFor(name: string): Promise<string | null>;
}
