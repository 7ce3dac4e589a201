import { stat } from 'node:fs/promises';

import { describeError } from '../errors.js';
import { stdoutText, type ToolRunner } from '../tools/toolTypes.js';
import { silentLogger, type FilterLogger } from '../utils/logger.js';
import { createLexerCache, type LexerCache } from './lexerCache.js';
import { findLexer, parseLexerListing } from './lexerCatalog.js';
import type { LexerCatalogEntry, LexerResolver } from './lexerTypes.js';

const HIGHLIGHTER = 'pygmentize';
const VERSION_PATTERN = /[0-9]+(\.[0-9]*)+/;

export interface PygmentsLexerResolverOptions {
  tools: ToolRunner;
  cacheDir: string;
  logger?: FilterLogger;
  cache?: LexerCache;
}

const modificationStamp = (path: string): Promise<string> =>
  stat(path).then(
    (info) => info.mtime.toISOString(),
    () => '',
  );

/**
 * Resolves lexers through the engine's filename table. The version and the
 * catalog are kept on disk and memoised for the life of the resolver;
 * a failure to write the cache only costs a regeneration next time.
 */
export function createPygmentsLexerResolver(options: PygmentsLexerResolverOptions): LexerResolver {
  const { tools } = options;
  const logger = options.logger ?? silentLogger;
  const cache = options.cache ?? createLexerCache(options.cacheDir);
  let versionPromise: Promise<string | null> | undefined;
  const catalogs = new Map<string, Promise<LexerCatalogEntry[]>>();

  const persist = async (label: string, write: () => Promise<void>): Promise<void> => {
    try {
      await write();
    } catch (error) {
      logger.debug(`could not cache ${label}: ${describeError(error)}`);
    }
  };

  const detectVersion = async (): Promise<string | null> => {
    const binary = await tools.locate(HIGHLIGHTER);
    if (!binary) {
      return null;
    }
    const stamp = await modificationStamp(binary);
    const memo = await cache.readVersionMemo();
    if (memo && memo.stamp === stamp) {
      return memo.version || null;
    }
    const result = await tools.run(HIGHLIGHTER, ['-V']);
    const version = VERSION_PATTERN.exec(stdoutText(result))?.[0] ?? '';
    await persist('highlighter version', () => cache.writeVersionMemo({ stamp, version }));
    return version || null;
  };

  const buildCatalog = async (version: string): Promise<LexerCatalogEntry[]> => {
    const cached = await cache.readCatalog(version);
    if (cached) {
      return cached;
    }
    logger.debug(`building lexer catalog for ${HIGHLIGHTER} ${version}`);
    const result = await tools.run(HIGHLIGHTER, ['-L', 'lexers']);
    const entries = parseLexerListing(stdoutText(result));
    if (result.exitCode !== 0) {
      // A failed listing serves this run only.
      logger.debug(`${HIGHLIGHTER} -L lexers exited with ${result.exitCode ?? 'no status'}; not caching`);
      return entries;
    }
    await persist('lexer catalog', () => cache.writeCatalog(version, entries));
    return entries;
  };

  const engineVersion = (): Promise<string | null> => {
    if (!versionPromise) {
      versionPromise = detectVersion();
    }
    return versionPromise;
  };

  return {
    engineVersion,
    async lexerFor(name) {
      const version = await engineVersion();
      if (!version || !name) {
        return null;
      }
      let catalog = catalogs.get(version);
      if (!catalog) {
        catalog = buildCatalog(version);
        catalogs.set(version, catalog);
      }
      return findLexer(await catalog, name);
    },
  };
}
