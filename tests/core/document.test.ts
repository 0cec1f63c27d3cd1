import { wrapHtmlDocument } from '../../src/core/document';

describe('wrapHtmlDocument', () => {
  it('produces a complete page', () => {
    const page = wrapHtmlDocument('<p>x</p>\n', { title: 'Report' });
    const lines = page.split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '<!DOCTYPE html>',
      '<html>',
      '<head>',
      '<meta charset="utf-8" />',
      '<meta name="viewport" content="width=device-width, initial-scale=1" />',
      '<title>Report</title>',
    ]);
    expect(page.endsWith('<body>\n<p>x</p>\n</body>\n</html>\n')).toBe(true);
  });

  it('escapes the title and sets lang', () => {
    const page = wrapHtmlDocument('', { title: 'A & B', lang: 'zh-CN' });
    expect(page).toContain('<html lang="zh-CN">');
    expect(page).toContain('<title>A &amp; B</title>');
  });

  it('embeds the selected theme', () => {
    const page = wrapHtmlDocument('', { title: 't', theme: 'enhanced' });
    expect(page).toContain('\nh1 { font-size: 1.8em; border-bottom: 2px solid #2f6fde; padding-bottom: 6px; }\n');
  });

  it('uses the minimal theme for unknown names', () => {
    const page = wrapHtmlDocument('', { title: 't', theme: 'unknown' });
    expect(page).toContain('\ntable { border-collapse: collapse; }\n');
  });
});
