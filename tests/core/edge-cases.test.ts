/**
 * Integration tests for edge cases that span the HTML pipeline
 * (preprocessor -> renderer -> sanitizer -> postprocessor).
 */
import { preprocessMarkdown } from '../../src/core/preprocessor';
import { HtmlRenderer } from '../../src/core/renderer';
import { sanitizeHtml } from '../../src/core/sanitizer';
import { postprocessHtml } from '../../src/core/postprocessor';

const renderer = new HtmlRenderer();

function fullPipeline(markdown: string): string {
  const preprocessed = preprocessMarkdown(markdown);
  const html = renderer.render(preprocessed);
  return postprocessHtml(sanitizeHtml(html));
}

describe('Edge cases - full pipeline', () => {
  describe('code blocks with markdown syntax', () => {
    it('does not render markdown inside fenced code blocks', () => {
      expect(fullPipeline('```\n# Not a heading\n**not bold**\n```')).toBe(
        '<pre><code># Not a heading\n**not bold**</code></pre>\n',
      );
    });

    it('keeps dollar signs inside code', () => {
      expect(fullPipeline('```js\nconst x = `$a$`;\n```')).toBe(
        '<pre><code class="language-js">const x = `$a$`;</code></pre>\n',
      );
    });
  });

  describe('math expressions', () => {
    it('renders display math as a code block', () => {
      expect(fullPipeline('$$E = mc^2$$')).toBe('<pre><code class="language-math">E = mc^2</code></pre>\n');
    });

    it('renders inline math as inline code', () => {
      expect(fullPipeline('The formula $x^2 + y^2 = z^2$ is Pythagorean.')).toBe(
        '<p>The formula <code>x^2 + y^2 = z^2</code> is Pythagorean.</p>\n',
      );
    });
  });

  describe('checkboxes', () => {
    it('shows check marks in list items', () => {
      const result = fullPipeline('- [x] Done\n- [ ] Todo');
      expect(result).toContain('<li>✅ Done</li>');
      expect(result).toContain('<li>⬜ Todo</li>');
    });
  });

  describe('footnotes', () => {
    it('expands footnotes inline', () => {
      expect(fullPipeline('Important[^1] fact.\n\n[^1]: Source: Manual')).toBe(
        '<p>Important(<em>Source: Manual</em>) fact.</p>\n',
      );
    });
  });

  describe('tables', () => {
    it('wraps tables in a scroll container', () => {
      const result = fullPipeline('| Col1 | Col2 |\n|------|------|\n| a | b |');
      expect(result.startsWith('<div class="table-wrapper"><table>\n')).toBe(true);
      expect(result.endsWith('</table></div>\n')).toBe(true);
    });
  });

  describe('HTML mixed into markdown', () => {
    it('removes inline scripts', () => {
      const result = fullPipeline('Text with <script>alert("xss")</script> injection.');
      expect(result).not.toContain('<script');
      expect(result).not.toContain('alert');
      expect(result).toContain('injection.');
    });

    it('keeps safe HTML tags', () => {
      expect(fullPipeline('Text with <strong>bold</strong>.')).toBe('<p>Text with <strong>bold</strong>.</p>\n');
    });
  });

  describe('CJK text', () => {
    it('keeps Chinese headings and uses them as anchors', () => {
      expect(fullPipeline('# 中文测试\n\n这是文本。')).toBe(
        '<h1 id="中文测试">中文测试</h1>\n<p>这是文本。</p>\n',
      );
    });
  });

  describe('consecutive blank lines', () => {
    it('renders two paragraphs', () => {
      expect(fullPipeline('Paragraph 1\n\n\n\n\nParagraph 2')).toBe('<p>Paragraph 1</p>\n<p>Paragraph 2</p>\n');
    });
  });

  describe('indented code blocks', () => {
    it('renders 4-space indented code', () => {
      const result = fullPipeline('Normal text\n\n    indented code\n    more code\n\nNormal again');
      expect(result).toContain('<pre><code>indented code\nmore code</code></pre>');
    });
  });

  describe('performance', () => {
    it('handles large input within 5 seconds', () => {
      const largeMd = '# Title\n\n' + 'Paragraph text here. '.repeat(10000);
      const start = Date.now();
      const result = fullPipeline(largeMd);
      expect(Date.now() - start).toBeLessThan(5000);
      expect(result.startsWith('<h1 id="title">Title</h1>\n')).toBe(true);
    });
  });

  describe('deeply nested structures', () => {
    it('handles 10-level nested lists', () => {
      const md = Array.from({ length: 10 }, (_, i) => '  '.repeat(i) + '- item ' + (i + 1)).join('\n');
      expect(() => fullPipeline(md)).not.toThrow();
    });

    it('handles 5-level nested blockquotes', () => {
      const md = Array.from({ length: 5 }, (_, i) => '>'.repeat(i + 1) + ' level ' + (i + 1)).join('\n');
      expect(() => fullPipeline(md)).not.toThrow();
    });
  });
});
