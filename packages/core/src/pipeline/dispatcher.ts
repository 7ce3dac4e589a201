import { describeError } from '../errors.js';
import { streamFileTo, writeContent, type OutputSink } from './output.js';
import type { SubjectFile } from './subject.js';
import type { FilterMode, PreparedTransform, TransformContext, Transformer, TransformerStage } from './transformerTypes.js';

const STAGE_ORDER: readonly TransformerStage[] = ['reformat', 'colourize'];

export interface DispatchResult {
  /** 0 when the file was (or would be) rendered, 1 when unsupported. */
  exitCode: 0 | 1;
  /** Transformer that ended the run, or the last reformatter when its artifact was emitted. */
  handledBy: string | null;
  reformattedBy: string[];
}

export interface DispatchOptions {
  mode: FilterMode;
  /** Context for the user's file; `subject` is replaced as artifacts appear. */
  context: TransformContext;
  transformers: readonly Transformer[];
  output: OutputSink;
}

async function matchQuietly(transformer: Transformer, context: TransformContext): Promise<PreparedTransform | null> {
  try {
    return await transformer.match(context);
  } catch (error) {
    context.logger.debug(`${transformer.id}: match failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * Walks the reformatters and then the colourizers in priority order. The
 * first transformer that produces terminal output ends the run; artifacts
 * become the subject the remaining transformers see. A matched transformer
 * always renders, so an error from `apply` is not a decline and propagates
 * to the caller.
 */
export async function dispatch({ mode, context, transformers, output }: DispatchOptions): Promise<DispatchResult> {
  let subject: SubjectFile = context.subject;
  const reformattedBy: string[] = [];

  for (const stage of STAGE_ORDER) {
    for (const transformer of transformers.filter((candidate) => candidate.stage === stage)) {
      const current: TransformContext = { ...context, subject };
      const prepared = await matchQuietly(transformer, current);
      if (!prepared) {
        continue;
      }
      if (mode === 'check-support') {
        return { exitCode: 0, handledBy: transformer.id, reformattedBy };
      }

      context.logger.debug(`${transformer.id}: ${transformer.description}`);
      const outcome = await prepared.apply();
      if (outcome.type === 'output') {
        await writeContent(output, outcome.content);
        return { exitCode: 0, handledBy: transformer.id, reformattedBy };
      }
      subject = outcome.subject;
      reformattedBy.push(transformer.id);
    }
  }

  if (reformattedBy.length > 0) {
    await streamFileTo(subject.path, output);
    return { exitCode: 0, handledBy: reformattedBy[reformattedBy.length - 1], reformattedBy };
  }
  return { exitCode: 1, handledBy: null, reformattedBy };
}
