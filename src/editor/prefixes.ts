/**
 * Numbering prefix recognizers.
 *
 * A recognizer inspects the start of a heading title and returns the
 * numbering token it finds there, or `null`. Recognizers are tried in the
 * order of {@link PREFIX_RECOGNIZERS}; the first match wins.
 *
 * @module editor/prefixes
 */

import { CHINESE_NUMERAL_CHARS, CHINESE_UPPER_NUMERAL_CHARS } from './numerals';

export interface PrefixRecognizer {
  /** Short identifier, used in tests and diagnostics. */
  name: string;
  /** Return the matched prefix token, or `null` if the title does not start with one. */
  match(title: string): string | null;
}

/** A detected prefix and the title that remains once it is removed. */
export interface PrefixMatch {
  recognizer: string;
  /** The numbering token, without the whitespace that follows it. */
  prefix: string;
  /** Title with the prefix and following whitespace removed. */
  title: string;
}

const CN = `[${CHINESE_NUMERAL_CHARS}]+`;
const CN_UPPER = `[${CHINESE_UPPER_NUMERAL_CHARS}]+`;
const DIGITS = '[0-9０-９]+';
const ROMAN = '[IVXLCDM]+';

/**
 * Build a recognizer from an anchored pattern.
 *
 * When `needsBoundary` is set, the token must be followed by whitespace or
 * the end of the title, or end in `.` with no digit after it. `1.Intro` is
 * numbered; `2024年` and `1.5x` are not.
 */
function patternRecognizer(
  name: string,
  source: string,
  options: { flags?: string; needsBoundary?: boolean } = {},
): PrefixRecognizer {
  const boundary = options.needsBoundary ? '(?:(?<=\\.)(?![0-9])|(?=\\s|$))' : '';
  const re = new RegExp(`^(?:${source})${boundary}`, options.flags ?? '');
  return {
    name,
    match(title: string): string | null {
      const m = re.exec(title);
      return m ? m[0] : null;
    },
  };
}

/**
 * Recognizers in priority order. More specific shapes come first so that,
 * for example, `(1)` is not read as a dotted number and `第一章` is not read
 * as a bare Chinese numeral.
 */
export const PREFIX_RECOGNIZERS: readonly PrefixRecognizer[] = [
  // 第一章 / 第2篇 / 第三节 / 第一部分
  patternRecognizer('chinese-chapter', `第(?:${CN}|${DIGITS})(?:章|篇|节|部分)、?`),
  // 一、 十二、
  patternRecognizer('chinese-enumerated', `${CN}、`),
  // 壹、 贰、
  patternRecognizer('chinese-upper-enumerated', `${CN_UPPER}、`),
  // (一) （二） (1) (iv) (A)
  patternRecognizer(
    'parenthesized',
    `[(（](?:${CN}|${DIGITS}|${ROMAN}|[A-Za-z])[)）]`,
    { flags: 'i' },
  ),
  // 1) 1） 一）
  patternRecognizer('closing-paren', `(?:${DIGITS}|${CN})[)）]`),
  // 1、 １、
  patternRecognizer('arabic-enumerated', `${DIGITS}、`),
  // 1  1.  1.2  1.2.3.
  patternRecognizer('dotted-decimal', '[0-9]+(?:\\.[0-9]+)*\\.?', { needsBoundary: true }),
  // I. iv.
  patternRecognizer('roman', `${ROMAN}\\.`, { flags: 'i', needsBoundary: true }),
  // A. b.
  patternRecognizer('letter', '[A-Za-z]\\.', { needsBoundary: true }),
];

/**
 * Find the numbering prefix at the start of a heading title.
 *
 * @param title - Heading title, without the `#` marker.
 * @param recognizers - Recognizers to try, in priority order.
 * @returns The first match, or `null` when the title carries no prefix.
 *
 * @example
 * ```ts
 * detectPrefix('1.2 Scope');
 * // => { recognizer: 'dotted-decimal', prefix: '1.2', title: 'Scope' }
 * ```
 */
export function detectPrefix(
  title: string,
  recognizers: readonly PrefixRecognizer[] = PREFIX_RECOGNIZERS,
): PrefixMatch | null {
  for (const recognizer of recognizers) {
    const prefix = recognizer.match(title);
    if (prefix !== null) {
      return {
        recognizer: recognizer.name,
        prefix,
        title: title.slice(prefix.length).replace(/^\s+/, ''),
      };
    }
  }
  return null;
}

/** Remove the numbering prefix from a title, if it has one. */
export function stripPrefix(title: string): string {
  return detectPrefix(title)?.title ?? title;
}
