import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CliIo } from '../../src/cli/io';

export interface CollectedIo extends CliIo {
  logs: string[];
  warnings: string[];
  errors: string[];
}

/** A CliIo that records every line instead of printing it. */
export function collectingIo(): CollectedIo {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    warnings,
    errors,
    log: (line) => logs.push(line),
    warn: (line) => warnings.push(line),
    error: (line) => errors.push(line),
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'markdown-tools-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
