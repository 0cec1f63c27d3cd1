import { parseCliArgs, requirePair } from '../../src/cli/args';
import { InvalidArgumentsError } from '../../src/errors';

const OPTIONS = {
  output: { type: 'string', short: 'o' },
  verbose: { type: 'boolean' },
} as const;

describe('parseCliArgs', () => {
  it('separates flags from positionals', () => {
    const { values, positionals } = parseCliArgs(['a.md', '-o', 'b.md', 'html', '--verbose'], OPTIONS);
    expect(values).toEqual({ output: 'b.md', verbose: true });
    expect(positionals).toEqual(['a.md', 'html']);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--colour'], OPTIONS)).toThrow(InvalidArgumentsError);
  });

  it('rejects a string flag without a value', () => {
    expect(() => parseCliArgs(['a.md', '--output'], OPTIONS)).toThrow(InvalidArgumentsError);
  });
});

describe('requirePair', () => {
  it('returns exactly two positionals', () => {
    expect(requirePair(['a.md', 'upgrade'], ['file', 'action'])).toEqual(['a.md', 'upgrade']);
  });

  it('names the missing arguments', () => {
    expect(() => requirePair([], ['file', 'format'])).toThrow('Missing arguments: expected <file> <format>');
  });

  it('rejects extras', () => {
    expect(() => requirePair(['a', 'b', 'c', 'd'], ['file', 'action'])).toThrow('Unexpected arguments: c d');
  });
});
