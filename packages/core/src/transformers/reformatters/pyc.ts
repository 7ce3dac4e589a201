import { PYSOURCE_PLACEHOLDER } from '../../constants.js';
import { SymlinkLoopError } from '../../errors.js';
import type { Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutText } from '../../tools/toolTypes.js';
import { resolveRealPath } from '../../utils/realPath.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

// Prints a short header followed by `dis` output for the module's code object.
// Headers differ by interpreter: 3.7+ adds a flags word, and hash-based pycs
// carry a source hash instead of a timestamp.
export const DISASSEMBLE_SCRIPT = [
  'import binascii',
  'import dis',
  'import marshal',
  'import platform',
  'import struct',
  'import sys',
  'import time',
  '',
  '',
  'def describe(path):',
  '    with open(path, "rb") as handle:',
  '        magic = handle.read(4)',
  '        flags = 0',
  '        if sys.version_info >= (3, 7):',
  '            flags = struct.unpack("<I", handle.read(4))[0]',
  '        stamp = handle.read(4)',
  '        size = handle.read(4) if sys.version_info >= (3, 3) else None',
  '        code = marshal.load(handle)',
  '    print("Python version: {}".format(platform.python_version()))',
  '    print("Magic code: {}".format(binascii.hexlify(magic).decode("ascii")))',
  '    if flags & 1:',
  '        print("Source hash: {}".format(binascii.hexlify(stamp + size).decode("ascii")))',
  '    else:',
  '        print("Timestamp: {}".format(time.asctime(time.localtime(struct.unpack("<I", stamp)[0]))))',
  '        print("Size: {}".format(struct.unpack("<I", size)[0] if size else "not known"))',
  '    print("-" * 80)',
  '    dis.disassemble(code)',
  '',
  '',
  'if __name__ == "__main__":',
  '    describe(sys.argv[1])',
  '',
].join('\n');

/** Replaces every mention of the compiled file's sibling `.py` with a placeholder. */
export function maskSourcePath(listing: string, realPath: string): string {
  const sourcePath = `${realPath.replace(/\.pyc$/, '')}.py`;
  return listing.split(sourcePath).join(PYSOURCE_PLACEHOLDER);
}

export const pycReformatter: Transformer = {
  id: 'pyc',
  stage: 'reformat',
  description: 'Python bytecode disassembled with dis',
  async match(context) {
    const tool = await selectTool(context, ['python', 'python3']);
    if (!tool || !matchesAnyCandidate(context, ['*.pyc'])) {
      return null;
    }
    let realPath: string;
    try {
      realPath = await resolveRealPath(context.subject.path, { cwd: context.config.cwd });
    } catch (error) {
      if (error instanceof SymlinkLoopError) {
        context.logger.warn(error.message);
        return null;
      }
      throw error;
    }
    return {
      tool,
      async apply() {
        const result = await runTool(context, tool, ['-c', DISASSEMBLE_SCRIPT, realPath]);
        return artifactOutcome(await writeArtifact(context, 'pyc', maskSourcePath(stdoutText(result), realPath)));
      },
    };
  },
};
