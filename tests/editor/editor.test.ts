import { editMarkdown, isEditAction } from '../../src/editor/editor';
import {
  InvalidActionError,
  MissingStyleError,
  UnknownStyleError,
  ErrorCode,
} from '../../src/errors';

describe('isEditAction', () => {
  it('accepts the four actions', () => {
    expect(['upgrade', 'downgrade', 'remove_numbers', 'add_numbers'].every(isEditAction)).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isEditAction('renumber')).toBe(false);
  });
});

describe('editMarkdown', () => {
  describe('upgrade / downgrade', () => {
    it('clamps at level 1', () => {
      const result = editMarkdown('# Top\n', { action: 'upgrade' });
      expect(result.text).toBe('# Top\n');
      expect(result.headingCount).toBe(1);
      expect(result.changedCount).toBe(0);
    });

    it('promotes headings and keeps content', () => {
      const result = editMarkdown('## A\ntext\n### B\n', { action: 'upgrade' });
      expect(result.text).toBe('# A\ntext\n## B\n');
      expect(result.changedCount).toBe(2);
    });

    it('upgrade then downgrade restores unclamped levels', () => {
      const source = '## A\n### B\nbody\n';
      const up = editMarkdown(source, { action: 'upgrade' }).text;
      expect(editMarkdown(up, { action: 'downgrade' }).text).toBe(source);
    });

    it('loses the distinction when the first step clamps', () => {
      const up = editMarkdown('# A\n## B', { action: 'upgrade' }).text;
      expect(up).toBe('# A\n# B');
      expect(editMarkdown(up, { action: 'downgrade' }).text).toBe('## A\n## B');
    });

    it('clamps at level 6', () => {
      expect(editMarkdown('###### Deep', { action: 'downgrade' }).text).toBe('###### Deep');
    });
  });

  describe('numbering', () => {
    it('adds technical numbers', () => {
      const result = editMarkdown('# A\n## B\n## C\n# D\n', { action: 'add_numbers', style: 'technical' });
      expect(result.text).toBe('# 1 A\n## 1.1 B\n## 1.2 C\n# 2 D\n');
      expect(result.action).toBe('add_numbers');
      expect(result.headingCount).toBe(4);
      expect(result.changedCount).toBe(4);
    });

    it('counts only headings that changed', () => {
      const result = editMarkdown('# 1 A\n## B\n', { action: 'add_numbers', style: 'tech' });
      expect(result.text).toBe('# 1 A\n## 1.1 B\n');
      expect(result.changedCount).toBe(1);
    });

    it('removes numbers', () => {
      const result = editMarkdown('# 一、 总则\n## (一) 目的\n正文\n', { action: 'remove_numbers' });
      expect(result.text).toBe('# 总则\n## 目的\n正文\n');
    });

    it('numbers # lines in code blocks unless told to ignore them', () => {
      const source = '# A\n```\n# shell comment\n```\n';
      expect(editMarkdown(source, { action: 'add_numbers', style: 'technical' }).text).toBe(
        '# 1 A\n```\n# 2 shell comment\n```\n',
      );
      expect(
        editMarkdown(source, { action: 'add_numbers', style: 'technical', ignoreFencedCode: true }).text,
      ).toBe('# 1 A\n```\n# shell comment\n```\n');
    });

    it('removes a prefix with no space before the title', () => {
      const result = editMarkdown('# 1.Intro\n## A.Scope\n', { action: 'remove_numbers' });
      expect(result.text).toBe('# Intro\n## Scope\n');
      expect(result.changedCount).toBe(2);
    });

    it('replaces a prefix with no space before the title', () => {
      expect(editMarkdown('# 1.Intro\n', { action: 'add_numbers', style: 'technical' }).text).toBe(
        '# 1 Intro\n',
      );
    });

    it('edits CRLF headings in a document that mixes line endings', () => {
      const result = editMarkdown('# A\r\n## B\nbody\n', { action: 'downgrade' });
      expect(result.text).toBe('## A\r\n### B\nbody\n');
      expect(result.headingCount).toBe(2);
      expect(result.changedCount).toBe(2);
    });

    it('preserves CRLF line endings', () => {
      expect(editMarkdown('# A\r\n## B\r\n', { action: 'add_numbers', style: 'academic' }).text).toBe(
        '# 1. A\r\n## 1.1. B\r\n',
      );
    });
  });

  describe('errors', () => {
    it('rejects an unknown action', () => {
      expect(() => editMarkdown('# A', { action: 'sideways' })).toThrow(InvalidActionError);
      expect(() => editMarkdown('# A', { action: 'sideways' })).toThrow(
        "Invalid action 'sideways'. Expected one of: upgrade, downgrade, remove_numbers, add_numbers",
      );
    });

    it('requires a style for add_numbers', () => {
      expect(() => editMarkdown('# A', { action: 'add_numbers' })).toThrow(MissingStyleError);
    });

    it('rejects an unknown style', () => {
      try {
        editMarkdown('# A', { action: 'add_numbers', style: 'fancy' });
        throw new Error('expected editMarkdown to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownStyleError);
        expect(error).toMatchObject({ code: ErrorCode.UNKNOWN_STYLE, context: { style: 'fancy' } });
      }
    });
  });
});
