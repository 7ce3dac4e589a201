export class ScratchAreaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScratchAreaError';
  }
}

export class SymlinkLoopError extends Error {
  readonly path: string;
  readonly depth: number;

  constructor(path: string, depth: number) {
    super(`Too many iterations in realpath (${depth}) processing '${path}'`);
    this.name = 'SymlinkLoopError';
    this.path = path;
    this.depth = depth;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
