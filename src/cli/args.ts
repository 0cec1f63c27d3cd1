/**
 * Argument parsing shared by the command-line tools.
 *
 * @module cli/args
 */
import { parseArgs, type ParseArgsConfig } from 'util';
import { InvalidArgumentsError } from '../errors';

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

/**
 * Parse `argv` strictly: unknown flags and missing flag values are errors.
 *
 * @throws {InvalidArgumentsError}
 */
export function parseCliArgs<T extends OptionsConfig>(
  argv: string[],
  options: T,
): ReturnType<typeof parseArgs<{ args: string[]; options: T; allowPositionals: true; strict: true }>> {
  try {
    return parseArgs({ args: argv, options, allowPositionals: true, strict: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentsError(reason);
  }
}

/**
 * Require exactly two positional arguments.
 *
 * @param names - Names used in the error message, e.g. `['file', 'action']`.
 */
export function requirePair(positionals: string[], names: readonly [string, string]): [string, string] {
  const [first, second, ...rest] = positionals;
  if (first === undefined || second === undefined) {
    throw new InvalidArgumentsError(`Missing arguments: expected <${names[0]}> <${names[1]}>`);
  }
  if (rest.length > 0) {
    throw new InvalidArgumentsError(`Unexpected arguments: ${rest.join(' ')}`);
  }
  return [first, second];
}
