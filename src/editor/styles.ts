/**
 * Heading numbering styles.
 *
 * Each style is a variant of the {@link NumberingStyle} union and knows how
 * to render the prefix for a heading level from the running counters.
 * Adding a style means adding a variant and an entry to
 * {@link NUMBERING_STYLES}.
 *
 * @module editor/styles
 */

import { UnknownStyleError } from '../errors';
import { toChineseNumeral } from './numerals';
import type { HeadingLevel } from './types';

/**
 * Running counters, one per heading level. `counters[0]` is level 1.
 */
export type NumberingCounters = readonly number[];

interface StyleBase {
  /** Human-readable label. */
  label: string;
  /** Example of the rendered shape, for help output. */
  example: string;
  /** Render the prefix for a heading at `level`. */
  render(level: HeadingLevel, counters: NumberingCounters): string;
}

export interface ChineseBiddingStyle extends StyleBase {
  kind: 'chinese_bidding';
}

export interface TechnicalStyle extends StyleBase {
  kind: 'technical';
}

export interface AcademicStyle extends StyleBase {
  kind: 'academic';
}

export type NumberingStyle = ChineseBiddingStyle | TechnicalStyle | AcademicStyle;

export type NumberingStyleName = NumberingStyle['kind'];

/** Dotted decimal of all counters up to and including `level`: `1.0.2`. */
export function dotted(level: HeadingLevel, counters: NumberingCounters): string {
  return counters.slice(0, level).join('.');
}

const chineseBidding: ChineseBiddingStyle = {
  kind: 'chinese_bidding',
  label: 'Chinese bidding document',
  example: '一、 (一) 1.1.1',
  render(level, counters) {
    if (level === 1) return `${toChineseNumeral(counters[0])}、`;
    if (level === 2) return `(${toChineseNumeral(counters[1])})`;
    return dotted(level, counters);
  },
};

const technical: TechnicalStyle = {
  kind: 'technical',
  label: 'Technical documentation',
  example: '1 1.1 1.1.1',
  render: dotted,
};

const academic: AcademicStyle = {
  kind: 'academic',
  label: 'Academic paper',
  example: '1. 1.1. 1.1.1.',
  render(level, counters) {
    return `${dotted(level, counters)}.`;
  },
};

export const NUMBERING_STYLES: Record<NumberingStyleName, NumberingStyle> = {
  chinese_bidding: chineseBidding,
  technical,
  academic,
};

/** Accepted alternative spellings. */
const STYLE_ALIASES = new Map<string, NumberingStyleName>([['tech', 'technical']]);

export const NUMBERING_STYLE_NAMES: readonly NumberingStyleName[] = [
  'chinese_bidding',
  'technical',
  'academic',
];

function isStyleName(name: string): name is NumberingStyleName {
  return Object.prototype.hasOwnProperty.call(NUMBERING_STYLES, name);
}

/**
 * Look up a numbering style by name or alias.
 *
 * @throws {UnknownStyleError} If the name is not a known style.
 */
export function getNumberingStyle(name: string): NumberingStyle {
  const key = STYLE_ALIASES.get(name) ?? name;
  if (!isStyleName(key)) {
    throw new UnknownStyleError(name, NUMBERING_STYLE_NAMES);
  }
  return NUMBERING_STYLES[key];
}
