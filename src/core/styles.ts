/**
 * Stylesheet themes for HTML export.
 *
 * A theme maps element selectors to CSS declarations. `buildStylesheet()`
 * turns one into the `<style>` body of the exported page.
 */

export type StyleTemplateName = 'minimal' | 'enhanced' | 'document';

export interface StyleTemplate {
  name: StyleTemplateName;
  label: string;
  description: string;
  styles: Record<string, string>;
}

const BASE_FONT =
  "-apple-system, 'Segoe UI', 'PingFang SC', 'Microsoft YaHei', 'Noto Sans CJK SC', sans-serif";

const minimal: StyleTemplate = {
  name: 'minimal',
  label: 'Minimal',
  description: 'Plain page with light table and code styling.',
  styles: {
    body: `font-family: ${BASE_FONT}; line-height: 1.6; max-width: 860px; margin: 0 auto; padding: 24px;`,
    table: 'border-collapse: collapse;',
    'th,td': 'border: 1px solid #d0d0d0; padding: 6px 10px;',
    blockquote: 'border-left: 4px solid #d0d0d0; margin-left: 0; padding-left: 16px; color: #555;',
    pre: 'background: #f6f6f6; padding: 12px; overflow-x: auto;',
    code: "font-family: Consolas, 'Courier New', monospace;",
    'inline-code': 'background: #f0f0f0; padding: 1px 4px; border-radius: 3px;',
    '.table-wrapper': 'overflow-x: auto;',
  },
};

const enhanced: StyleTemplate = {
  name: 'enhanced',
  label: 'Enhanced',
  description: 'Ruled headings, tinted table headers and a dark code theme.',
  styles: {
    body: `font-family: ${BASE_FONT}; line-height: 1.7; max-width: 900px; margin: 0 auto; padding: 32px; color: #222;`,
    h1: 'font-size: 1.8em; border-bottom: 2px solid #2f6fde; padding-bottom: 6px;',
    h2: 'font-size: 1.45em; border-bottom: 1px solid #e2e2e2; padding-bottom: 4px;',
    h3: 'font-size: 1.2em;',
    table: 'border-collapse: collapse; width: 100%;',
    'th,td': 'border: 1px solid #d0d0d0; padding: 8px 12px;',
    th: 'background-color: #eef3fc;',
    blockquote:
      'border-left: 4px solid #2f6fde; margin-left: 0; padding: 8px 16px; background: #f7f9fe; color: #444;',
    pre: 'background: #1f2329; color: #e6e6e6; padding: 16px; border-radius: 6px; overflow-x: auto;',
    code: "font-family: Consolas, 'Courier New', monospace;",
    'inline-code': 'background: #e9effa; color: #1d4fa8; padding: 1px 5px; border-radius: 3px;',
    a: 'color: #2f6fde;',
    '.table-wrapper': 'overflow-x: auto;',
  },
};

const document_: StyleTemplate = {
  name: 'document',
  label: 'Document',
  description: 'Serif body with wide spacing for formal documents.',
  styles: {
    body: "font-family: 'Times New Roman', SimSun, serif; font-size: 12pt; line-height: 1.8; max-width: 780px; margin: 0 auto; padding: 40px;",
    h1: 'font-size: 1.8em; text-align: center; margin: 18px 0 10px;',
    h2: 'font-size: 1.4em; margin: 16px 0 8px;',
    h3: 'font-size: 1.2em; margin: 12px 0 6px;',
    p: 'margin: 8px 0; text-align: justify;',
    table: 'border-collapse: collapse; width: 100%; margin: 12px 0;',
    'th,td': 'border: 1px solid #333; padding: 6px 10px;',
    th: 'font-weight: bold;',
    blockquote: 'border-left: 3px solid #999; margin-left: 0; padding-left: 20px; font-style: italic;',
    pre: 'border: 1px solid #ccc; padding: 12px; overflow-x: auto;',
    code: "font-family: 'Courier New', monospace;",
    'inline-code': 'padding: 0 2px;',
    li: 'margin: 4px 0;',
    '.table-wrapper': 'overflow-x: auto;',
  },
};

export const STYLE_TEMPLATES: Record<StyleTemplateName, StyleTemplate> = {
  minimal,
  enhanced,
  document: document_,
};

export const STYLE_TEMPLATE_NAMES: readonly StyleTemplateName[] = ['minimal', 'enhanced', 'document'];

export function isStyleTemplateName(name: string): name is StyleTemplateName {
  return STYLE_TEMPLATE_NAMES.some((candidate) => candidate === name);
}

/**
 * Get a style template by name. Falls back to 'minimal' for unknown names.
 */
export function getStyleTemplate(name: string): StyleTemplate {
  return isStyleTemplateName(name) ? STYLE_TEMPLATES[name] : STYLE_TEMPLATES.minimal;
}

/**
 * Get the declarations for one selector, or `''` when the template has none.
 */
export function getElementStyle(template: StyleTemplate, element: string): string {
  return template.styles[element] ?? '';
}

/** Map template keys to CSS selectors. */
function toSelector(key: string): string {
  if (key === 'inline-code') return ':not(pre) > code';
  return key.split(',').join(', ');
}

/**
 * Render a template as a stylesheet, one rule per line.
 *
 * @example
 * ```ts
 * buildStylesheet(getStyleTemplate('minimal')).split('\n')[1];
 * // => 'table { border-collapse: collapse; }'
 * ```
 */
export function buildStylesheet(template: StyleTemplate): string {
  return Object.entries(template.styles)
    .map(([key, declarations]) => `${toSelector(key)} { ${declarations} }`)
    .join('\n');
}
