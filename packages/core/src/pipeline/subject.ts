/**
 * The file the pipeline is currently working on. It starts as the user's
 * path and is replaced each time a reformatter writes an artifact.
 */
export interface SubjectFile {
  /** Also the name transformers match against. */
  readonly path: string;
  readonly isTemporary: boolean;
  /** Extension-like hint (for example `.bas`) attached by the producer of an artifact. */
  readonly formatHint: string | null;
}

export const subjectFromPath = (path: string): SubjectFile => ({
  path,
  isTemporary: false,
  formatHint: null,
});

export const artifactSubject = (path: string, formatHint: string | null = null): SubjectFile => ({
  path,
  isTemporary: true,
  formatHint,
});
