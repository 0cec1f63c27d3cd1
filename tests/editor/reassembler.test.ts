import { reassemble, renderHeading, renderLine } from '../../src/editor/reassembler';
import { parseHeadingLine, scanDocument } from '../../src/editor/scanner';

describe('renderHeading', () => {
  it('rebuilds marker, gap and text', () => {
    const heading = parseHeadingLine('###\t1.1 Scope', 0);
    expect(heading && renderHeading(heading)).toBe('###\t1.1 Scope');
  });
});

describe('renderLine', () => {
  it('returns content verbatim', () => {
    expect(renderLine({ kind: 'content', lineIndex: 0, raw: '  indented  ' })).toBe('  indented  ');
  });
});

describe('reassemble', () => {
  it('reproduces the input exactly', () => {
    const text = '# A\n\n  text  \n## B\n';
    const doc = scanDocument(text);
    expect(reassemble(doc.lines, doc.breaks)).toBe(text);
  });

  it('keeps CRLF endings', () => {
    const text = '# A\r\nbody\r\n';
    const doc = scanDocument(text);
    expect(reassemble(doc.lines, doc.breaks)).toBe(text);
  });

  it('keeps each line terminator of a mixed LF/CRLF document', () => {
    const text = '# A\r\n## B\nbody\r\n\n';
    const doc = scanDocument(text);
    expect(reassemble(doc.lines, doc.breaks)).toBe(text);
  });

  it('applies a single terminator to every line', () => {
    const doc = scanDocument('a\r\nb\nc');
    expect(reassemble(doc.lines, '\n')).toBe('a\nb\nc');
  });

  it('emits records in line order', () => {
    const doc = scanDocument('first\nsecond');
    expect(reassemble([...doc.lines].reverse(), '\n')).toBe('first\nsecond');
  });
});
