import { mkdtempSync, rmSync } from 'node:fs';
import { constants, tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { ARTIFACT_MARKER, SCRATCH_PREFIX } from '../constants.js';
import { ScratchAreaError, describeError } from '../errors.js';

export interface ScratchArea {
  readonly directory: string;
  /** `<basename>:formatted:.<suffix>` inside the scratch directory. */
  artifactPath(sourcePath: string, suffix: string): string;
  /** Removes the directory. Safe to call more than once. */
  release(): void;
}

export type ProcessLike = Pick<NodeJS.EventEmitter, 'on' | 'removeListener'> & {
  exit(code?: number): void;
};

const RELEASE_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

export const artifactName = (sourcePath: string, suffix: string): string =>
  `${basename(sourcePath)}${ARTIFACT_MARKER}.${suffix}`;

export function createScratchArea(root: string = tmpdir()): ScratchArea {
  let directory: string;
  try {
    directory = mkdtempSync(join(root, SCRATCH_PREFIX));
  } catch (error) {
    throw new ScratchAreaError(`Cannot create temporary directory in ${root}: ${describeError(error)}`, {
      cause: error,
    });
  }

  let released = false;
  return {
    directory,
    artifactPath(sourcePath, suffix) {
      return join(directory, artifactName(sourcePath, suffix));
    },
    release() {
      if (released) {
        return;
      }
      released = true;
      rmSync(directory, { recursive: true, force: true });
    },
  };
}

/**
 * Releases the scratch area when the process exits or is interrupted. A
 * signal ends the process with status 128+n once the directory is gone.
 * Returns a function that detaches the handlers again.
 */
export function bindScratchToProcess(area: ScratchArea, proc: ProcessLike = process): () => void {
  const onExit = (): void => area.release();
  const signalHandlers = RELEASE_SIGNALS.map((signal) => {
    const handler = (): void => {
      area.release();
      proc.exit(128 + constants.signals[signal]);
    };
    proc.on(signal, handler);
    return { signal, handler };
  });
  proc.on('exit', onExit);

  return () => {
    proc.removeListener('exit', onExit);
    for (const { signal, handler } of signalHandlers) {
      proc.removeListener(signal, handler);
    }
  };
}
