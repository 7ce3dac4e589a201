import chalk from 'chalk';

export interface FilterLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  debug: boolean;
  write?: (line: string) => void;
  colourLevel?: 0 | 1 | 2 | 3;
}

/**
 * Logger that writes to stderr so stdout stays reserved for the rendering
 * the pager displays.
 */
export function createConsoleLogger({
  debug,
  write = (line) => process.stderr.write(`${line}\n`),
  colourLevel = 1,
}: ConsoleLoggerOptions): FilterLogger {
  const ink = new chalk.Instance({ level: colourLevel });
  return {
    debug(message) {
      if (debug) {
        write(ink.gray(`pagerfilter: ${message}`));
      }
    },
    warn(message) {
      write(`pagerfilter: ${message}`);
    },
  };
}

export const silentLogger: FilterLogger = {
  debug() {},
  warn() {},
};
