import { readlink } from 'node:fs/promises';

import { REALPATH_MAX_DEPTH } from '../constants.js';
import { SymlinkLoopError } from '../errors.js';

export interface RealPathOptions {
  cwd?: string;
  maxDepth?: number;
  /** Returns the link target, or null when the path is not a symlink. */
  readLink?: (path: string) => Promise<string | null>;
}

const readLinkOrNull = (path: string): Promise<string | null> =>
  // ENOENT and EINVAL both mean "not a link" here.
  readlink(path).catch(() => null);

const toPath = (segments: readonly string[]): string => `/${segments.join('/')}`;

/**
 * Resolves every symlink along `target`, segment by segment. Relative link
 * targets resolve against the directory holding the link. Nested resolutions
 * beyond `maxDepth` raise a SymlinkLoopError.
 */
export async function resolveRealPath(target: string, options: RealPathOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const readLink = options.readLink ?? readLinkOrNull;
  const maxDepth = options.maxDepth ?? REALPATH_MAX_DEPTH;

  const walk = async (path: string, depth: number): Promise<string[]> => {
    if (depth > maxDepth) {
      throw new SymlinkLoopError(path, maxDepth);
    }
    const absolute = path.startsWith('/') ? path : `${cwd}/${path}`;
    let resolved: string[] = [];
    for (const segment of absolute.split('/')) {
      if (segment === '' || segment === '.') {
        continue;
      }
      if (segment === '..') {
        resolved = resolved.slice(0, -1);
        continue;
      }
      const candidate = [...resolved, segment];
      const link = await readLink(toPath(candidate));
      if (link === null) {
        resolved = candidate;
      } else if (link.startsWith('/')) {
        resolved = await walk(link, depth + 1);
      } else {
        resolved = await walk(`${toPath(resolved)}/${link}`, depth + 1);
      }
    }
    return resolved;
  };

  const resolved = toPath(await walk(target, 1));
  return target.endsWith('/') && resolved !== '/' ? `${resolved}/` : resolved;
}
