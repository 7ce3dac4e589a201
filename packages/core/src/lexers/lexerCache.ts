import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { LEXER_CATALOG_EPOCH } from '../constants.js';
import type { LexerCatalogEntry } from './lexerTypes.js';

const STAMP_FILE = 'pygmentize-stat';
const VERSION_FILE = 'pygmentize-version';

export const LexerCatalogSchema = z.object({
  epoch: z.literal(LEXER_CATALOG_EPOCH),
  version: z.string(),
  entries: z.array(
    z.object({
      lexer: z.string().min(1),
      patterns: z.array(z.string().min(1)),
    }),
  ),
});

export interface VersionMemo {
  /** Modification stamp of the highlighter binary when the version was read. */
  stamp: string;
  version: string;
}

export interface LexerCache {
  readonly directory: string;
  catalogPath(version: string): string;
  readVersionMemo(): Promise<VersionMemo | null>;
  writeVersionMemo(memo: VersionMemo): Promise<void>;
  /** Null when the catalog is missing, unreadable or malformed. */
  readCatalog(version: string): Promise<LexerCatalogEntry[] | null>;
  writeCatalog(version: string, entries: readonly LexerCatalogEntry[]): Promise<void>;
}

const readOptional = (path: string): Promise<string | null> => readFile(path, 'utf8').catch(() => null);

/**
 * Writes through a uniquely named sibling and renames it into place, so a
 * reader never sees a partial file and the last concurrent writer wins.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const temporary = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
  try {
    await writeFile(temporary, content, 'utf8');
    await rename(temporary, path);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
}

export function createLexerCache(directory: string): LexerCache {
  const catalogPath = (version: string): string =>
    join(directory, `pygmentize-lexer-${LEXER_CATALOG_EPOCH}-${version}.json`);

  return {
    directory,
    catalogPath,
    async readVersionMemo() {
      const [stamp, version] = await Promise.all([
        readOptional(join(directory, STAMP_FILE)),
        readOptional(join(directory, VERSION_FILE)),
      ]);
      if (stamp === null || version === null) {
        return null;
      }
      return { stamp, version };
    },
    async writeVersionMemo({ stamp, version }) {
      await mkdir(directory, { recursive: true });
      await writeFileAtomic(join(directory, VERSION_FILE), version);
      await writeFileAtomic(join(directory, STAMP_FILE), stamp);
    },
    async readCatalog(version) {
      const raw = await readOptional(catalogPath(version));
      if (raw === null) {
        return null;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        return null;
      }
      const result = LexerCatalogSchema.safeParse(parsed);
      if (!result.success || result.data.version !== version) {
        return null;
      }
      return result.data.entries;
    },
    async writeCatalog(version, entries) {
      await mkdir(directory, { recursive: true });
      const body = { epoch: LEXER_CATALOG_EPOCH, version, entries };
      await writeFileAtomic(catalogPath(version), `${JSON.stringify(body, null, 2)}\n`);
    },
  };
}
