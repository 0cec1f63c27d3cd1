/**
 * DOCX document builder.
 *
 * Assembles converted body elements into a Word document and packs it. With
 * a usable template the template's styles part replaces the built-in styles;
 * otherwise the built-in styles plus "Source Code" and "Quote" are used.
 *
 * @module docx/builder
 */

import { Document, Packer, type IStylesOptions } from 'docx';
import type { Token } from 'marked';
import { MalformedTemplateError } from '../errors';
import { convertTokens } from './block-converter';
import { CODE_FONT } from './inline-parser';
import { OrderedListNumbering } from './numbering';
import { loadTemplate } from './template';
import type { DocxBuildOptions, DocxBuildResult, DocxStyleMap, LoadedTemplate } from './types';

/** Style ids of the built-in style set. */
export const DEFAULT_STYLE_MAP: DocxStyleMap = {
  headings: ['Heading1', 'Heading2', 'Heading3', 'Heading4', 'Heading5', 'Heading6'],
  code: 'SourceCode',
  quote: 'Quote',
  listParagraph: 'ListParagraph',
  hyperlink: 'Hyperlink',
};

const DEFAULT_STYLES: IStylesOptions = {
  paragraphStyles: [
    {
      id: 'SourceCode',
      name: 'Source Code',
      basedOn: 'Normal',
      next: 'Normal',
      quickFormat: true,
      run: { font: CODE_FONT, size: 20 },
      paragraph: { spacing: { before: 0, after: 0 } },
    },
    {
      id: 'Quote',
      name: 'Quote',
      basedOn: 'Normal',
      next: 'Normal',
      quickFormat: true,
      run: { italics: true, color: '595959' },
      paragraph: { indent: { left: 720 } },
    },
  ],
};

interface ResolvedStyles {
  template?: LoadedTemplate;
  warnings: string[];
}

/**
 * Load the template if one was given. An unusable template is reported as a
 * warning and the built-in styles are used instead.
 */
async function resolveTemplate(template: Buffer | undefined): Promise<ResolvedStyles> {
  if (!template) return { warnings: [] };
  try {
    return { template: await loadTemplate(template), warnings: [] };
  } catch (error) {
    if (error instanceof MalformedTemplateError) {
      return { warnings: [`${error.message}; using default styles`] };
    }
    throw error;
  }
}

/**
 * Build a `.docx` file from block tokens.
 *
 * @param tokens - Tokens from `parseMarkdown()` or `Lexer.lex()`.
 */
export async function buildDocx(tokens: Token[], options: DocxBuildOptions = {}): Promise<DocxBuildResult> {
  const { template, warnings } = await resolveTemplate(options.template);
  const numbering = new OrderedListNumbering();
  const styles = template?.styles ?? DEFAULT_STYLE_MAP;

  const children = convertTokens(tokens, { styles, numbering });

  const doc = new Document({
    title: options.title,
    externalStyles: template?.stylesXml,
    styles: template ? undefined : DEFAULT_STYLES,
    numbering: { config: numbering.toConfig() },
    sections: [{ properties: {}, children }],
  });

  const buffer = await Packer.toBuffer(doc);
  return { buffer, warnings };
}
