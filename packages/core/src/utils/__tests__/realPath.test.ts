import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { mkdirSync, realpathSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempDir } from '../../__testUtils__/filterHarness.js';
import { SymlinkLoopError } from '../../errors.js';
import { resolveRealPath } from '../realPath.js';

const linkTable =
  (links: Record<string, string>) =>
  async (path: string): Promise<string | null> =>
    links[path] ?? null;

describe('resolveRealPath', () => {
  test('follows an absolute link in the middle of the path', async () => {
    const readLink = linkTable({ '/home/user/link': '/data/real' });
    await expect(resolveRealPath('/home/user/link/file.pyc', { readLink })).resolves.toBe('/data/real/file.pyc');
  });

  test('resolves relative link targets against the directory holding the link', async () => {
    const readLink = linkTable({ '/a/b': '../c' });
    await expect(resolveRealPath('/a/b/x', { readLink })).resolves.toBe('/c/x');
  });

  test('anchors relative input at the working directory and folds dot segments', async () => {
    const readLink = linkTable({});
    await expect(resolveRealPath('x/./y/../z', { cwd: '/w', readLink })).resolves.toBe('/w/x/z');
  });

  test('keeps a trailing slash', async () => {
    const readLink = linkTable({});
    await expect(resolveRealPath('/a/b/', { readLink })).resolves.toBe('/a/b/');
    await expect(resolveRealPath('/', { readLink })).resolves.toBe('/');
  });

  test('reports a loop once the nesting limit is exceeded', async () => {
    const readLink = linkTable({ '/l/a': '/l/b', '/l/b': '/l/a' });
    const pending = resolveRealPath('/l/a/f', { readLink });
    await expect(pending).rejects.toBeInstanceOf(SymlinkLoopError);
    await expect(pending).rejects.toThrow("Too many iterations in realpath (20) processing '/l/a'");
  });

  test('honours a custom depth limit', async () => {
    const readLink = linkTable({ '/l/a': '/l/b', '/l/b': '/l/a' });
    await expect(resolveRealPath('/l/a', { readLink, maxDepth: 3 })).rejects.toThrow(
      "Too many iterations in realpath (3) processing '/l/b'",
    );
  });

  describe('on the real filesystem', () => {
    let temp: ReturnType<typeof createTempDir>;

    beforeEach(() => {
      temp = createTempDir('realpath');
    });

    afterEach(() => {
      temp.remove();
    });

    test('matches the platform realpath for a linked directory', async () => {
      mkdirSync(join(temp.path, 'real'));
      writeFileSync(join(temp.path, 'real', 'mod.pyc'), '');
      symlinkSync(join(temp.path, 'real'), join(temp.path, 'link'));

      await expect(resolveRealPath(join(temp.path, 'link', 'mod.pyc'))).resolves.toBe(
        realpathSync(join(temp.path, 'real', 'mod.pyc')),
      );
    });

    test('rejects a pair of links pointing at each other', async () => {
      symlinkSync(join(temp.path, 'two.pyc'), join(temp.path, 'one.pyc'));
      symlinkSync(join(temp.path, 'one.pyc'), join(temp.path, 'two.pyc'));

      await expect(resolveRealPath(join(temp.path, 'one.pyc'))).rejects.toBeInstanceOf(SymlinkLoopError);
    });
  });
});
