import { decodeLines } from '../utils/text.js';

export interface ToolInvocation {
  /** Bytes or text written to the tool's stdin, which is then closed. */
  input?: string | Uint8Array;
  cwd?: string;
}

export interface ToolResult {
  /** Raw bytes; decode only where the text is edited. */
  stdout: Buffer;
  stderr: string;
  /** Null when the process could not be started or died from a signal. */
  exitCode: number | null;
}

/**
 * Boundary to every external program the filter drives. Tests substitute an
 * in-process implementation.
 */
export interface ToolRunner {
  locate(command: string): Promise<string | null>;
  run(command: string, args: readonly string[], invocation?: ToolInvocation): Promise<ToolResult>;
}

export const stdoutText = (result: ToolResult): string => result.stdout.toString('utf8');

export const stdoutLines = (result: ToolResult): string[] => decodeLines(result.stdout);
