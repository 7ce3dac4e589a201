import type { Palette } from '../colour/palette.js';
import type { FilterConfig } from '../config/filterConfig.js';
import type { InferredKind } from '../identify/kinds.js';
import type { LexerResolver } from '../lexers/lexerTypes.js';
import type { ScratchArea } from '../scratch/scratchArea.js';
import type { ToolRunner } from '../tools/toolTypes.js';
import type { FilterLogger } from '../utils/logger.js';
import type { SubjectFile } from './subject.js';

export type FilterMode = 'check-support' | 'render';

export type TransformerStage = 'reformat' | 'colourize';

/** Text, raw tool bytes, or lines without their terminating newline. */
export type RenderedContent = string | Uint8Array | readonly string[];

export type TransformOutcome =
  | { type: 'artifact'; subject: SubjectFile }
  | { type: 'output'; content: RenderedContent };

export interface PreparedTransform {
  /** Program that `apply` will run, or null when the work happens in-process. */
  tool: string | null;
  apply(): Promise<TransformOutcome>;
}

export interface TransformContext {
  subject: SubjectFile;
  kind: InferredKind | null;
  config: FilterConfig;
  tools: ToolRunner;
  scratch: ScratchArea;
  palette: Palette;
  logger: FilterLogger;
  lexers: LexerResolver;
}

export interface Transformer {
  id: string;
  stage: TransformerStage;
  description: string;
  /**
   * Decides applicability without side effects beyond probing tools and
   * the filesystem. Returns null to decline; once a transform is returned,
   * `apply` must produce an outcome.
   */
  match(context: TransformContext): Promise<PreparedTransform | null>;
}
