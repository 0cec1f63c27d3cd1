/**
 * DOCX template loading.
 *
 * A template contributes only its `word/styles.xml`. Style ids differ between
 * Word locales and authoring tools, so every style the converter needs is
 * looked up by its display name, case-insensitively, against a list of
 * accepted names.
 *
 * @module docx/template
 */

import JSZip from 'jszip';
import { DOMParser } from '@xmldom/xmldom';
import { MalformedTemplateError } from '../errors';
import type { DocxStyleMap, LoadedTemplate, StyleCatalogEntry } from './types';

export const STYLES_PART_PATH = 'word/styles.xml';

/** Accepted display names per style role. */
export const STYLE_NAME_CANDIDATES = {
  code: ['Source Code', 'Code', '代码块'],
  quote: ['Quote', '引用'],
  listParagraph: ['List Paragraph'],
  tableHeader: ['表头', 'Table Header'],
  tableContents: ['表内', 'Table Contents'],
  hyperlink: ['Hyperlink', '超链接'],
} as const;

function headingNames(depth: number): string[] {
  return [`Heading ${depth}`, `标题 ${depth}`];
}

/**
 * Parse a styles part into its style entries.
 *
 * @throws {MalformedTemplateError} When the XML does not parse.
 */
export function readStyleCatalog(xml: string): StyleCatalogEntry[] {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => problems.push(msg),
      fatalError: (msg: string) => problems.push(msg),
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, 'application/xml');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedTemplateError(`${STYLES_PART_PATH} is not well-formed XML (${reason})`);
  }

  if (problems.length > 0 || !doc.documentElement) {
    throw new MalformedTemplateError(`${STYLES_PART_PATH} is not well-formed XML`);
  }

  const entries: StyleCatalogEntry[] = [];
  const styles = doc.getElementsByTagName('w:style');
  for (let i = 0; i < styles.length; i++) {
    const el = styles.item(i);
    if (!el) continue;
    const id = el.getAttribute('w:styleId');
    if (!id) continue;
    const name = el.getElementsByTagName('w:name').item(0)?.getAttribute('w:val') ?? id;
    entries.push({ id, name, type: el.getAttribute('w:type') ?? 'paragraph' });
  }
  return entries;
}

/**
 * Find the id of the first style whose name matches one of `names`.
 * Candidates are tried in order; matching ignores case.
 */
export function resolveStyleId(
  catalog: readonly StyleCatalogEntry[],
  names: readonly string[],
  type = 'paragraph',
): string | undefined {
  for (const name of names) {
    const wanted = name.toLowerCase();
    const hit = catalog.find((entry) => entry.type === type && entry.name.toLowerCase() === wanted);
    if (hit) return hit.id;
  }
  return undefined;
}

/**
 * Build the converter's style map from a catalog.
 *
 * @throws {MalformedTemplateError} When any of the six heading styles is
 *   missing.
 */
export function styleMapFromCatalog(catalog: readonly StyleCatalogEntry[]): DocxStyleMap {
  const headings: string[] = [];
  const missing: string[] = [];
  for (let depth = 1; depth <= 6; depth++) {
    const id = resolveStyleId(catalog, headingNames(depth));
    if (id) headings.push(id);
    else missing.push(`Heading ${depth}`);
  }

  const [h1, h2, h3, h4, h5, h6] = headings;
  if (missing.length > 0 || !h1 || !h2 || !h3 || !h4 || !h5 || !h6) {
    throw new MalformedTemplateError(`missing heading styles: ${missing.join(', ')}`);
  }

  return {
    headings: [h1, h2, h3, h4, h5, h6],
    code: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.code),
    quote: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.quote),
    listParagraph: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.listParagraph),
    tableHeader: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.tableHeader),
    tableContents: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.tableContents),
    hyperlink: resolveStyleId(catalog, STYLE_NAME_CANDIDATES.hyperlink, 'character'),
  };
}

/** Read the styles part out of a DOCX archive. */
export async function readStylesXml(buffer: Buffer): Promise<string> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedTemplateError(`not a readable DOCX archive (${reason})`);
  }

  const part = zip.file(STYLES_PART_PATH);
  if (!part) {
    throw new MalformedTemplateError(`${STYLES_PART_PATH} not found`);
  }
  return part.async('string');
}

/**
 * Load a template and resolve the styles the converter uses.
 *
 * @throws {MalformedTemplateError} When the template cannot be used.
 */
export async function loadTemplate(buffer: Buffer): Promise<LoadedTemplate> {
  const stylesXml = await readStylesXml(buffer);
  const styles = styleMapFromCatalog(readStyleCatalog(stylesXml));
  return { stylesXml, styles };
}
