/**
 * Console and file I/O for the command-line tools.
 *
 * @module cli/io
 */
import { readFile, writeFile } from 'fs/promises';
import { withFileContext } from '../errors';

/** Output sinks for a CLI run. Tests substitute collecting functions. */
export interface CliIo {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export const consoleIo: CliIo = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function readTextFile(filePath: string): Promise<string> {
  return withFileContext(filePath, () => readFile(filePath, 'utf8'));
}

export function readBinaryFile(filePath: string): Promise<Buffer> {
  return withFileContext(filePath, () => readFile(filePath));
}

/** Write a complete result. Text is written as UTF-8. */
export function writeOutputFile(filePath: string, content: string | Buffer): Promise<void> {
  return withFileContext(filePath, () => writeFile(filePath, content));
}

/** Print an error and return the failure exit code. */
export function reportError(error: unknown, io: CliIo): number {
  const message = error instanceof Error ? error.message : String(error);
  io.error(`Error: ${message}`);
  return 1;
}
