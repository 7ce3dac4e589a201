import { writeFile } from 'node:fs/promises';

import { kindSuffix } from '../identify/kinds.js';
import { artifactSubject, type SubjectFile } from '../pipeline/subject.js';
import { lineBatches } from '../pipeline/output.js';
import type { RenderedContent, TransformContext, TransformOutcome } from '../pipeline/transformerTypes.js';
import type { ToolInvocation, ToolResult } from '../tools/toolTypes.js';
import { matchesCasePattern } from '../utils/casePattern.js';

export interface CandidateOptions {
  /** Also try the format hint and the inferred kind as `.<kind>`. */
  inferred?: boolean;
}

/** Names a transformer matches against, most specific first. */
export function candidateNames(context: TransformContext, { inferred = true }: CandidateOptions = {}): string[] {
  const names = [context.subject.path];
  if (!inferred) {
    return names;
  }
  if (context.subject.formatHint) {
    names.push(context.subject.formatHint);
  }
  if (context.kind) {
    names.push(kindSuffix(context.kind));
  }
  return names;
}

export const matchesAnyCandidate = (
  context: TransformContext,
  patterns: readonly string[],
  options?: CandidateOptions,
): boolean => candidateNames(context, options).some((name) => matchesCasePattern(name, patterns));

export interface PatternRule<T> {
  patterns: readonly string[];
  value: T;
}

/** Tries every rule against the first candidate, then the next, and so on. */
export function firstMatchingRule<T>(
  context: TransformContext,
  rules: readonly PatternRule<T>[],
  options?: CandidateOptions,
): T | null {
  for (const name of candidateNames(context, options)) {
    for (const rule of rules) {
      if (matchesCasePattern(name, rule.patterns)) {
        return rule.value;
      }
    }
  }
  return null;
}

/** First of `commands` present on this system, checked afresh on every call. */
export async function selectTool(context: TransformContext, commands: readonly string[]): Promise<string | null> {
  for (const command of commands) {
    if (await context.tools.locate(command)) {
      return command;
    }
  }
  context.logger.debug(`none of ${commands.join(', ')} available`);
  return null;
}

/** Runs a tool, keeping whatever it printed even when it exits non-zero. */
export async function runTool(
  context: TransformContext,
  command: string,
  args: readonly string[],
  invocation?: ToolInvocation,
): Promise<ToolResult> {
  const result = await context.tools.run(command, args, invocation);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    context.logger.debug(
      `${command} exited with ${result.exitCode ?? 'no status'}${detail ? `: ${detail}` : ''}`,
    );
  }
  return result;
}

export async function writeArtifact(
  context: TransformContext,
  suffix: string,
  content: RenderedContent,
  formatHint: string | null = null,
): Promise<SubjectFile> {
  const path = context.scratch.artifactPath(context.subject.path, suffix);
  if (typeof content === 'string' || content instanceof Uint8Array) {
    await writeFile(path, content);
  } else {
    await writeFile(path, lineBatches(content));
  }
  return artifactSubject(path, formatHint);
}

export const artifactOutcome = (subject: SubjectFile): TransformOutcome => ({ type: 'artifact', subject });

export const outputOutcome = (content: RenderedContent): TransformOutcome => ({ type: 'output', content });
