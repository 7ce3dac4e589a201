import { createPalette } from '../colour/palette.js';
import type { FilterConfig } from '../config/filterConfig.js';
import { identifyKind } from '../identify/typeIdentifier.js';
import type { LexerResolver } from '../lexers/lexerTypes.js';
import { createPygmentsLexerResolver } from '../lexers/pygmentsLexers.js';
import { bindScratchToProcess, createScratchArea, type ProcessLike } from '../scratch/scratchArea.js';
import type { ToolRunner } from '../tools/toolTypes.js';
import { silentLogger, type FilterLogger } from '../utils/logger.js';
import { dispatch, type DispatchResult } from './dispatcher.js';
import type { OutputSink } from './output.js';
import { defaultTransformers } from './registry.js';
import { subjectFromPath } from './subject.js';
import type { FilterMode, Transformer } from './transformerTypes.js';

export interface RunFilterOptions {
  mode: FilterMode;
  path: string;
  config: FilterConfig;
  tools: ToolRunner;
  output: OutputSink;
  logger?: FilterLogger;
  transformers?: readonly Transformer[];
  lexers?: LexerResolver;
  /** Directory the scratch area is created in; the system temp dir by default. */
  scratchRoot?: string;
  process?: ProcessLike;
}

/**
 * Renders (or checks support for) one file: acquires the scratch area,
 * identifies the file once and dispatches. The scratch area is released on
 * every way out, including signals.
 */
export async function runFilter(options: RunFilterOptions): Promise<DispatchResult> {
  const { config, tools } = options;
  const logger = options.logger ?? silentLogger;
  const scratch = createScratchArea(options.scratchRoot);
  const unbind = bindScratchToProcess(scratch, options.process ?? process);

  try {
    const kind = await identifyKind(options.path, { tools, logger });
    logger.debug(`inferred kind: ${kind ?? 'none'}`);
    const lexers =
      options.lexers ?? createPygmentsLexerResolver({ tools, cacheDir: config.cacheDir, logger });

    return await dispatch({
      mode: options.mode,
      transformers: options.transformers ?? defaultTransformers(),
      output: options.output,
      context: {
        subject: subjectFromPath(options.path),
        kind,
        config,
        tools,
        scratch,
        palette: createPalette(config.colourLevel),
        logger,
        lexers,
      },
    });
  } finally {
    unbind();
    scratch.release();
  }
}
