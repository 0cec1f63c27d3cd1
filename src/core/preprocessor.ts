/**
 * Markdown preprocessor.
 *
 * Rewrites source constructs that none of the output formats can express
 * (LaTeX, task checkboxes, footnotes, spacing placeholders) into plain
 * Markdown before the lexer sees them.
 *
 * @module core/preprocessor
 */

/** Ideographic (full-width) space, U+3000. */
const IDEOGRAPHIC_SPACE = '　';

/** Toggles for the individual passes. All default to `true`. */
export interface PreprocessOptions {
  normalizeBlankLines?: boolean;
  expandSpacingPlaceholders?: boolean;
  convertMath?: boolean;
  convertCheckboxes?: boolean;
  expandFootnotes?: boolean;
}

/** Collapse runs of three or more newlines to a single blank line. */
function normalizeBlankLines(markdown: string): string {
  return markdown.replace(/\n{3,}/g, '\n\n');
}

/**
 * Expand `[FULLWIDTH SPACES:n]` placeholders to `n` ideographic spaces.
 *
 * Authors use the placeholder for first-line indentation in Chinese prose,
 * which Markdown would otherwise collapse. `FULLWIDTH_SPACES:n` and
 * `FULLWIDTHSPACES:n` are accepted too, in any letter case.
 */
function expandSpacingPlaceholders(markdown: string): string {
  return markdown.replace(
    /\[FULLWIDTH[ _]?SPACES:(\d+)\]/gi,
    (_match, count: string) => IDEOGRAPHIC_SPACE.repeat(parseInt(count, 10)),
  );
}

/**
 * Convert LaTeX math to code so it survives as literal text.
 *
 * - Display math `$$...$$` becomes a fenced block tagged `math`
 * - Inline math `$...$` becomes inline code
 *
 * Amounts such as `$10` or `$5.00` are left alone.
 */
function convertMath(markdown: string): string {
  let result = markdown.replace(
    /\$\$([\s\S]*?)\$\$/g,
    (_match, expr: string) => `\`\`\`math\n${expr.trim()}\n\`\`\``,
  );

  result = result.replace(
    /(?<![\\$])\$([^\s$](?:[^$]*?[^\s$])?)\$(?!\d)/g,
    (_match, expr: string) => `\`${expr}\``,
  );

  return result;
}

/**
 * Replace task-list checkboxes with ✅ / ⬜ so the state stays visible in
 * Word and plain text.
 */
function convertCheckboxes(markdown: string): string {
  let result = markdown.replace(/^(\s*[-*+]\s)\[x\]/gim, '$1✅');
  result = result.replace(/^(\s*[-*+]\s)\[ \]/gm, '$1⬜');
  return result;
}

/**
 * Inline footnotes: `[^id]: text` definitions are removed and each `[^id]`
 * reference becomes `(*text*)`.
 */
function expandFootnotes(markdown: string): string {
  const footnotes = new Map<string, string>();
  const withoutDefs = markdown.replace(
    /^\[\^(\w+)\]:\s*(.+)$/gm,
    (_match, id: string, text: string) => {
      footnotes.set(id, text.trim());
      return '';
    },
  );

  if (footnotes.size === 0) return markdown;

  let result = withoutDefs;
  for (const [id, text] of footnotes) {
    result = result.split(`[^${id}]`).join(`(*${text}*)`);
  }
  return result;
}

/**
 * Run the enabled preprocessor passes.
 *
 * Fenced and inline code are masked first so no pass rewrites them. Order:
 * blank lines, spacing placeholders, math (before the lexer misreads `$`),
 * checkboxes, footnotes.
 *
 * @param markdown - Raw Markdown input.
 * @param options - Pass toggles.
 * @returns Markdown ready for the parser.
 */
export function preprocessMarkdown(markdown: string, options: PreprocessOptions = {}): string {
  const masked: string[] = [];
  const mask = (match: string): string => {
    masked.push(match);
    return `\x00CODE${masked.length - 1}\x00`;
  };

  let result = markdown.replace(/```[\s\S]*?```/g, mask).replace(/`[^`\n]+`/g, mask);

  if (options.normalizeBlankLines ?? true) result = normalizeBlankLines(result);
  if (options.expandSpacingPlaceholders ?? true) result = expandSpacingPlaceholders(result);
  if (options.convertMath ?? true) result = convertMath(result);
  if (options.convertCheckboxes ?? true) result = convertCheckboxes(result);
  if (options.expandFootnotes ?? true) result = expandFootnotes(result);

  return result.replace(/\x00CODE(\d+)\x00/g, (_match, idx: string) => masked[parseInt(idx, 10)]);
}
