/**
 * Library entry for the pagerfilter core.
 *
 * Responsibilities:
 * - Expose the pipeline (`runFilter`, `dispatch`) and its building blocks so
 *   other front ends can drive the filter without the CLI.
 * - Surface the transformer registry, file identification, configuration and
 *   the markdown passes for reuse and testing.
 */

export { loadFilterConfig, FilterEnvSchema } from '../config/filterConfig.js';
export type { FilterConfig, LoadFilterConfigOptions } from '../config/filterConfig.js';
export { createPalette, colourLevelForTerm } from '../colour/palette.js';
export type { ColourLevel, Paint, Palette, PaletteRole } from '../colour/palette.js';
export { applySubstitutions } from '../colour/substitution.js';
export type { LineRange, SubstitutionRule } from '../colour/substitution.js';
export * from '../constants.js';
export { ScratchAreaError, SymlinkLoopError, describeError } from '../errors.js';
export { INFERRED_KINDS } from '../identify/kinds.js';
export type { InferredKind } from '../identify/kinds.js';
export { identifyKind, kindFromDescription, refineKindByName } from '../identify/typeIdentifier.js';
export { createLexerCache } from '../lexers/lexerCache.js';
export type { LexerCache } from '../lexers/lexerCache.js';
export { findLexer, parseLexerListing } from '../lexers/lexerCatalog.js';
export { overrideLexerFor } from '../lexers/lexerOverrides.js';
export type { LexerCatalogEntry, LexerResolver } from '../lexers/lexerTypes.js';
export { createPygmentsLexerResolver } from '../lexers/pygmentsLexers.js';
export { dispatch } from '../pipeline/dispatcher.js';
export type { DispatchOptions, DispatchResult } from '../pipeline/dispatcher.js';
export { createStreamSink } from '../pipeline/output.js';
export type { OutputSink } from '../pipeline/output.js';
export { defaultTransformers } from '../pipeline/registry.js';
export { runFilter } from '../pipeline/runFilter.js';
export type { RunFilterOptions } from '../pipeline/runFilter.js';
export { subjectFromPath } from '../pipeline/subject.js';
export type { SubjectFile } from '../pipeline/subject.js';
export type {
  FilterMode,
  PreparedTransform,
  TransformContext,
  TransformOutcome,
  Transformer,
  TransformerStage,
} from '../pipeline/transformerTypes.js';
export { bindScratchToProcess, createScratchArea } from '../scratch/scratchArea.js';
export type { ProcessLike, ScratchArea } from '../scratch/scratchArea.js';
export { createProcessToolRunner } from '../tools/toolRunner.js';
export type { ToolInvocation, ToolResult, ToolRunner } from '../tools/toolTypes.js';
export { colourMarkdown } from '../transformers/markdown/markdownColour.js';
export { rewrapMarkdown } from '../transformers/markdown/markdownWrap.js';
export { createConsoleLogger, silentLogger } from '../utils/logger.js';
export type { FilterLogger } from '../utils/logger.js';
export { resolveRealPath } from '../utils/realPath.js';
