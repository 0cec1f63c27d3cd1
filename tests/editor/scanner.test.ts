import {
  detectLineEnding,
  headingsOf,
  parseHeadingLine,
  scanDocument,
  splitLines,
} from '../../src/editor/scanner';

describe('parseHeadingLine', () => {
  it('parses level, gap and title', () => {
    expect(parseHeadingLine('## Title', 4)).toEqual({
      kind: 'heading',
      lineIndex: 4,
      level: 2,
      gap: ' ',
      text: 'Title',
      title: 'Title',
    });
  });

  it('records a numbering prefix', () => {
    const heading = parseHeadingLine('### 1.2.1 Scope', 0);
    expect(heading?.numberPrefix).toBe('1.2.1');
    expect(heading?.title).toBe('Scope');
    expect(heading?.text).toBe('1.2.1 Scope');
  });

  it('keeps a tab gap', () => {
    expect(parseHeadingLine('#\tTabbed', 0)?.gap).toBe('\t');
  });

  it('accepts an empty title', () => {
    expect(parseHeadingLine('# ', 0)?.text).toBe('');
  });

  it.each(['#Title', '####### Seven', '  # Indented', 'Text # not a heading', '#'])(
    'rejects %j',
    (line) => {
      expect(parseHeadingLine(line, 0)).toBeNull();
    },
  );
});

describe('detectLineEnding', () => {
  it('detects CRLF when every newline is CRLF', () => {
    expect(detectLineEnding('a\r\nb\r\n')).toBe('\r\n');
  });

  it('treats mixed endings as LF', () => {
    expect(detectLineEnding('a\r\nb\n')).toBe('\n');
  });

  it('defaults to LF without newlines', () => {
    expect(detectLineEnding('single line')).toBe('\n');
  });
});

describe('splitLines', () => {
  it('records the terminator of every line', () => {
    expect(splitLines('a\r\nb\nc')).toEqual({ lines: ['a', 'b', 'c'], breaks: ['\r\n', '\n'] });
  });

  it('returns one empty line for empty input', () => {
    expect(splitLines('')).toEqual({ lines: [''], breaks: [] });
  });
});

describe('scanDocument', () => {
  it('produces one record per line, including the trailing empty line', () => {
    const doc = scanDocument('# A\ntext\n');
    expect(doc.lines.map((l) => l.kind)).toEqual(['heading', 'content', 'content']);
    expect(doc.lines[2]).toEqual({ kind: 'content', lineIndex: 2, raw: '' });
  });

  it('treats # lines in code fences as headings by default', () => {
    const doc = scanDocument('```\n# comment\n```\n# Real');
    expect(headingsOf(doc).map((h) => h.lineIndex)).toEqual([1, 3]);
  });

  it('skips fenced code when ignoreFencedCode is set', () => {
    const doc = scanDocument('```\n# comment\n```\n# Real', { ignoreFencedCode: true });
    expect(headingsOf(doc).map((h) => h.lineIndex)).toEqual([3]);
  });

  it('closes a fence only with the same marker character', () => {
    const doc = scanDocument('~~~\n```\n# inside\n~~~\n# after', { ignoreFencedCode: true });
    expect(headingsOf(doc).map((h) => h.text)).toEqual(['after']);
  });

  it('splits CRLF documents without leaving carriage returns', () => {
    const doc = scanDocument('# A\r\nbody\r\n');
    expect(doc.lineEnding).toBe('\r\n');
    expect(doc.lines[1]).toEqual({ kind: 'content', lineIndex: 1, raw: 'body' });
  });

  it('finds CRLF headings in a document that mixes line endings', () => {
    const doc = scanDocument('# A\r\n## B\nbody\n');
    expect(headingsOf(doc).map((h) => [h.level, h.text])).toEqual([
      [1, 'A'],
      [2, 'B'],
    ]);
    expect(doc.breaks).toEqual(['\r\n', '\n', '\n']);
    expect(doc.lineEnding).toBe('\n');
  });
});
