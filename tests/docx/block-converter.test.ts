import { Lexer } from 'marked';
import { Paragraph, Table } from 'docx';
import { convertTokens, type ConversionContext } from '../../src/docx/block-converter';
import { DEFAULT_STYLE_MAP } from '../../src/docx/builder';
import { OrderedListNumbering } from '../../src/docx/numbering';

function context(): ConversionContext {
  return { styles: DEFAULT_STYLE_MAP, numbering: new OrderedListNumbering() };
}

function convert(md: string, ctx: ConversionContext = context()) {
  return convertTokens(Lexer.lex(md), ctx);
}

describe('convertTokens', () => {
  it('emits one paragraph per heading and paragraph', () => {
    const blocks = convert('# Title\n\nBody text');
    expect(blocks).toHaveLength(2);
    expect(blocks.every((b) => b instanceof Paragraph)).toBe(true);
  });

  it('splits code blocks into one paragraph per line', () => {
    expect(convert('```\nline 1\nline 2\nline 3\n```')).toHaveLength(3);
  });

  it('flattens nested lists', () => {
    expect(convert('- a\n  - b\n- c')).toHaveLength(3);
  });

  it('registers a numbering definition per ordered list', () => {
    const ctx = context();
    convert('1. a\n   1. nested\n2. b\n\nText\n\n5. c', ctx);
    expect(ctx.numbering.size).toBe(3);
  });

  it('does not register numbering for bullet lists', () => {
    const ctx = context();
    convert('- a\n- b', ctx);
    expect(ctx.numbering.size).toBe(0);
  });

  it('converts tables', () => {
    const [table] = convert('| A | B |\n|---|---|\n| 1 | 2 |');
    expect(table).toBeInstanceOf(Table);
  });

  it('converts block quotes and rules to paragraphs', () => {
    expect(convert('> one\n>\n> two\n\n---')).toHaveLength(3);
  });

  it('skips blank space', () => {
    expect(convert('\n\n\n')).toHaveLength(0);
  });
});
