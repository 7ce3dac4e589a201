export const appendLine = (existing: string, line: string): string => {
  if (!line) {
    return existing;
  }
  return existing ? `${existing}\n${line}` : line;
};

/**
 * Splits text into lines, dropping the empty entry a trailing newline leaves
 * behind.
 */
export const splitLines = (text: string): string[] => {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

export const joinLines = (lines: readonly string[]): string =>
  lines.map((line) => `${line}\n`).join('');

export function expandTabs(line: string, tabSize = 8): string {
  if (!line.includes('\t')) {
    return line;
  }
  let result = '';
  for (const ch of line) {
    if (ch === '\t') {
      result += ' '.repeat(tabSize - (result.length % tabSize));
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * Splits raw bytes on LF and decodes each line separately, so output larger
 * than the biggest possible string can still be processed line by line.
 */
export function decodeLines(bytes: Uint8Array): string[] {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const lines: string[] = [];
  let start = 0;
  while (start < buffer.length) {
    const end = buffer.indexOf(0x0a, start);
    if (end === -1) {
      lines.push(buffer.toString('utf8', start));
      break;
    }
    lines.push(buffer.toString('utf8', start, end));
    start = end + 1;
  }
  return lines;
}
